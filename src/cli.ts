#!/usr/bin/env node
/**
 * CLI Entry Point for the cycling protocol compiler
 *
 *   cyclerc validate <protocol.json> [--capacity <mAh>]
 *   cyclerc export <protocol.json> --format <id>... | --all --sample <name> [options]
 *   cyclerc formats
 */

import * as fs from 'fs';

import { parseCanonical } from './canonical';
import { ExportEngine, ExportResult } from './export_engine';
import { EXPORT_FORMATS, ExportContext, ExportFormat, ExportOptions, isExportFormat, listFormats } from './formats';
import { Protocol } from './protocol_model';
import { ProtocolError, StructuralError, StructuredError, isProtocolError } from './structured_error';
import { validate } from './validator';

export const EXIT = {
    OK: 0,
    PROTOCOL_ERROR: 1,
    USAGE: 2,
} as const;

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

const consoleIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line),
};

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

/* -------------------------------------------------------------------------- */
/* Argument helpers                                                           */
/* -------------------------------------------------------------------------- */

function optionValue(args: string[], flag: string): string | undefined {
    const i = args.indexOf(flag);
    if (i === -1) return undefined;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} requires a value`);
    return value;
}

function optionValues(args: string[], flag: string): string[] {
    const values: string[] = [];
    args.forEach((arg, i) => {
        if (arg !== flag) return;
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} requires a value`);
        values.push(value);
    });
    return values;
}

function numberOption(args: string[], flag: string): number | undefined {
    const raw = optionValue(args, flag);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) throw new UsageError(`${flag} must be a number, got '${raw}'`);
    return value;
}

function voltageRange(raw: string | undefined): readonly [number, number] | undefined {
    if (raw === undefined) return undefined;
    const parts = raw.split(',').map(p => Number(p.trim()));
    if (parts.length !== 2 || parts.some(p => !Number.isFinite(p))) {
        throw new UsageError(`--voltage-range expects <min>,<max>, got '${raw}'`);
    }
    return [parts[0], parts[1]];
}

function describe(e: StructuredError): string {
    const at = e.step_index === undefined ? '' : ` (step ${e.step_index})`;
    return `${e.severity} ${e.code}${at}: ${e.message}`;
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

class ProtocolCompilerCLI {
    constructor(
        private readonly io: CliIO = consoleIO,
        private readonly engine: ExportEngine = new ExportEngine()
    ) { }

    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        try {
            switch (command) {
                case 'validate':
                    return this.runValidate(rest);
                case 'export':
                    return this.runExport(rest);
                case 'formats':
                    this.showFormats();
                    return EXIT.OK;
                case 'help':
                case '--help':
                    this.showHelp();
                    return EXIT.OK;
                default:
                    this.io.err(`Error: Unknown command: ${command}`);
                    this.showHelp();
                    return EXIT.USAGE;
            }
        } catch (e: unknown) {
            if (e instanceof UsageError) {
                this.io.err(`Error: ${e.message}`);
                return EXIT.USAGE;
            }
            if (isProtocolError(e)) {
                this.reportErrors([e]);
                return EXIT.PROTOCOL_ERROR;
            }
            throw e;
        }
    }

    private loadProtocol(file: string | undefined): Protocol {
        if (!file || file.startsWith('--')) throw new UsageError('Protocol file required');
        if (!fs.existsSync(file)) throw new UsageError(`File not found: ${file}`);
        return parseCanonical(fs.readFileSync(file, 'utf-8'));
    }

    private reportErrors(errors: ProtocolError[]): void {
        for (const error of errors) {
            const json = error.toJSON();
            if (error instanceof StructuralError && error.issues.length > 1) {
                for (const issue of error.issues) {
                    this.io.err(`ERROR ${issue.code}${issue.path ? ` at ${issue.path}` : ''}: ${issue.message}`);
                }
            } else {
                this.io.err(describe(json));
            }
        }
    }

    private runValidate(args: string[]): number {
        const protocol = this.loadProtocol(args[0]);
        const result = validate(protocol, { capacity_mAh: numberOption(args, '--capacity') });

        for (const advisory of result.advisories) this.io.err(describe(advisory));
        if (!result.ok) {
            this.reportErrors(result.errors);
            return EXIT.PROTOCOL_ERROR;
        }
        this.io.out(`OK: ${protocol.method.length} step(s)`);
        return EXIT.OK;
    }

    private exportFormats(args: string[]): ExportFormat[] {
        if (args.includes('--all')) return [...EXPORT_FORMATS];
        const requested = optionValues(args, '--format');
        if (requested.length === 0) throw new UsageError('At least one --format (or --all) is required');
        return requested.map(f => {
            if (!isExportFormat(f)) throw new UsageError(`Unknown format: ${f}. Valid formats: ${EXPORT_FORMATS.join(', ')}`);
            return f;
        });
    }

    private runExport(args: string[]): number {
        const protocol = this.loadProtocol(args[0]);
        const formats = this.exportFormats(args);
        const out = optionValue(args, '--out');
        if (formats.length > 1 && out === undefined) {
            throw new UsageError('--out <directory> is required when exporting more than one format');
        }

        const options: ExportOptions = {};
        const range = voltageRange(optionValue(args, '--voltage-range'));
        if (range) options.biologic = { voltage_range_V: range };
        const tomatoOutput = optionValue(args, '--tomato-output');
        if (tomatoOutput) options.tomato = { output_dir: tomatoOutput };
        if (args.includes('--include-context')) options.battinfo = { include_context: true };
        const createdAt = optionValue(args, '--created-at');
        if (createdAt) options.neware = { created_at: createdAt };

        const ctx: ExportContext = {
            sample_name: optionValue(args, '--sample') ?? '',
            capacity_mAh: numberOption(args, '--capacity'),
            save_path: out,
            options,
        };

        let results: ExportResult[];
        if (formats.length === 1) {
            results = [this.engine.exportProtocol(protocol, formats[0], ctx)];
        } else {
            const all = this.engine.exportAll(protocol, formats, ctx);
            results = formats.flatMap((format): ExportResult[] => {
                const result = all[format];
                return result ? [result] : [];
            });
        }

        let failed = false;
        for (const result of results) {
            if (!result.ok) {
                failed = true;
                this.io.err(`[${result.format}] export failed`);
                this.reportErrors(result.errors);
                continue;
            }
            for (const advisory of result.advisories) this.io.err(describe(advisory));
            if (result.written_path) {
                this.io.out(`[${result.format}] wrote ${result.written_path}`);
            } else {
                this.io.out(result.text);
            }
        }
        return failed ? EXIT.PROTOCOL_ERROR : EXIT.OK;
    }

    private showFormats(): void {
        for (const exporter of listFormats()) {
            this.io.out(`${exporter.format.padEnd(20)}${exporter.encoding.padEnd(8)}${exporter.description}`);
        }
    }

    private showHelp(): void {
        this.io.out(`
cyclerc - battery cycling protocol compiler

USAGE:
  cyclerc <command> [options]

COMMANDS:
  validate <protocol.json>     Check a protocol against its safety limits
  export <protocol.json>       Compile a protocol for one or more targets
  formats                      List the supported formats
  help                         Show this help

EXPORT OPTIONS:
  --format <id>                Target format (repeatable)
  --all                        Every format
  --sample <name>              Sample name written into the artifact
  --capacity <mAh>             Sample capacity, needed for C-rate steps
  --out <path>                 Output file (one format) or directory (several)
  --voltage-range <min>,<max>  Biologic Ewe control range in V (default 0,5)
  --tomato-output <dir>        Where tomato stores measured data
  --include-context            Add @context to BattINFO JSON-LD
  --created-at <timestamp>     Date written into Neware step files

EXAMPLES:
  cyclerc validate formation.json --capacity 45
  cyclerc export formation.json --format biologic_mps --sample cell-01 --capacity 45 --out cell-01.mps
  cyclerc export formation.json --all --sample cell-01 --capacity 45 --out build/
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new ProtocolCompilerCLI();
    cli.run(process.argv).then(code => {
        process.exitCode = code;
    }).catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exit(1);
    });
}

export { ProtocolCompilerCLI };
