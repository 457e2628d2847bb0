/**
 * Export Engine
 *
 * validate -> resolve -> convert (cached) -> render -> serialize -> optional write.
 *
 * Failures come back as `{ ok: false, errors }`: every validation error at
 * once, or the single resolution, conversion, rendering, encoding or write
 * error. Errors that are not ProtocolErrors propagate.
 */

import * as path from 'path';

import { fingerprint } from './canonical';
import { EXPORTERS } from './formats';
import { ArtifactByFormat, ExportContext, ExportFormat, FormatExporter } from './formats/types';
import { createLogger } from './logger';
import { encodeText, TextEncoding, writeArtifact } from './output_writer';
import { Protocol } from './protocol_model';
import { ConvertedSequence, convert } from './rate_converter';
import { ResolutionCache } from './resolution_cache';
import { resolve } from './sequence_resolver';
import { ProtocolError, StructuralError, StructuredError, isProtocolError } from './structured_error';
import { validate } from './validator';

const log = createLogger('export_engine');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ExportSuccess<F extends ExportFormat = ExportFormat> {
    ok: true;
    format: F;
    artifact: ArtifactByFormat[F];
    text: string;
    encoding: TextEncoding;
    advisories: StructuredError[];
    written_path?: string;
}

export interface ExportFailure<F extends ExportFormat = ExportFormat> {
    ok: false;
    format: F;
    errors: ProtocolError[];
}

export type ExportResult<F extends ExportFormat = ExportFormat> = ExportSuccess<F> | ExportFailure<F>;

export type ExportAllResult = { [F in ExportFormat]?: ExportResult<F> };

interface Prepared {
    sequence: ConvertedSequence;
    fingerprint: string;
    advisories: StructuredError[];
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function mergeAdvisories(...lists: StructuredError[][]): StructuredError[] {
    const seen = new Set<string>();
    const out: StructuredError[] = [];
    for (const advisory of lists.flat()) {
        const key = `${advisory.code}:${advisory.message}`;
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(advisory);
    }
    return out;
}

function fail<F extends ExportFormat>(format: F, errors: ProtocolError[]): ExportFailure<F> {
    log.warn('Export failed', { format, codes: errors.map(e => e.code) });
    return { ok: false, format, errors };
}

/* -------------------------------------------------------------------------- */
/* Engine                                                                     */
/* -------------------------------------------------------------------------- */

export class ExportEngine {
    constructor(readonly cache: ResolutionCache = new ResolutionCache()) {}

    /** Validates against the export-time capacity, then resolves and converts through the cache. */
    private prepare(protocol: Protocol, ctx: ExportContext): Prepared | ProtocolError[] {
        const validation = validate(protocol, { capacity_mAh: ctx.capacity_mAh });
        if (!validation.ok) return validation.errors;

        try {
            const fp = fingerprint(protocol);
            const sequence = this.cache.getOrCompute(fp, ctx.capacity_mAh, () => convert(resolve(protocol), ctx.capacity_mAh));
            return { sequence, fingerprint: fp, advisories: validation.advisories };
        } catch (e: unknown) {
            if (isProtocolError(e)) return [e];
            throw e;
        }
    }

    private run<F extends ExportFormat>(
        exporter: FormatExporter<F>,
        prepared: Prepared,
        ctx: ExportContext,
        savePath: string | undefined
    ): ExportResult<F> {
        const format = exporter.format;
        if (exporter.requires_sample_name && ctx.sample_name.trim() === '') {
            return fail(format, [StructuralError.single('MISSING_SAMPLE_NAME', `${format} export needs a sample name`, 'sample_name')]);
        }

        try {
            const rendered = exporter.render({ sequence: prepared.sequence, fingerprint: prepared.fingerprint }, ctx);
            const text = exporter.serialize(rendered.artifact);
            // Fails here for characters the target encoding cannot carry, saved or not
            encodeText(text, exporter.encoding);

            const result: ExportSuccess<F> = {
                ok: true,
                format,
                artifact: rendered.artifact,
                text,
                encoding: exporter.encoding,
                advisories: mergeAdvisories(prepared.advisories, rendered.advisories),
            };

            if (savePath !== undefined) {
                const written = writeArtifact({ file_path: savePath, text, encoding: exporter.encoding });
                result.written_path = written.path;
                log.info('Wrote artifact', { format, path: written.path, bytes: written.bytes, sha256: written.sha256 });
            }

            log.debug('Exported protocol', { format, steps: prepared.sequence.steps.length, advisories: result.advisories.length });
            return result;
        } catch (e: unknown) {
            if (isProtocolError(e)) return fail(format, [e]);
            throw e;
        }
    }

    exportProtocol<F extends ExportFormat>(protocol: Protocol, format: F, ctx: ExportContext): ExportResult<F> {
        const prepared = this.prepare(protocol, ctx);
        if (Array.isArray(prepared)) return fail(format, prepared);
        return this.run(EXPORTERS[format], prepared, ctx, ctx.save_path);
    }

    /**
     * Exports several formats from one resolution. With a save_path, each
     * artifact is written into that directory as `<format><extension>`.
     */
    exportAll(protocol: Protocol, formats: readonly ExportFormat[], ctx: ExportContext): ExportAllResult {
        const results: ExportAllResult = {};
        const prepared = this.prepare(protocol, ctx);

        const exportOne = <F extends ExportFormat>(format: F): ExportResult<F> => {
            if (Array.isArray(prepared)) return fail(format, prepared);
            const exporter = EXPORTERS[format];
            const savePath = ctx.save_path === undefined
                ? undefined
                : path.join(ctx.save_path, `${format}${exporter.extension}`);
            return this.run(exporter, prepared, ctx, savePath);
        };

        for (const format of formats) {
            switch (format) {
                case 'biologic_mps': results.biologic_mps = exportOne(format); break;
                case 'neware_xml': results.neware_xml = exportOne(format); break;
                case 'tomato_json': results.tomato_json = exportOne(format); break;
                case 'pybamm_experiment': results.pybamm_experiment = exportOne(format); break;
                case 'battinfo_jsonld': results.battinfo_jsonld = exportOne(format); break;
            }
        }
        return results;
    }
}

/* -------------------------------------------------------------------------- */
/* Default engine                                                             */
/* -------------------------------------------------------------------------- */

const defaultEngine = new ExportEngine();

export function exportProtocol<F extends ExportFormat>(protocol: Protocol, format: F, ctx: ExportContext): ExportResult<F> {
    return defaultEngine.exportProtocol(protocol, format, ctx);
}

export function exportAll(protocol: Protocol, formats: readonly ExportFormat[], ctx: ExportContext): ExportAllResult {
    return defaultEngine.exportAll(protocol, formats, ctx);
}
