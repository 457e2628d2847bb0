// src/formats/types.ts

import type { TextEncoding } from '../output_writer/text_encoding';
import type { ConvertedSequence } from '../rate_converter';
import type { StructuredError } from '../structured_error';
import type { BattinfoNode } from './battinfo_jsonld';
import type { BiologicSettings } from './biologic_mps';
import type { XmlElement } from './xml_builder';
import type { PybammExperiment } from './pybamm_experiment';
import type { TomatoJob } from './tomato_json';

export const EXPORT_FORMATS = [
    'biologic_mps',
    'neware_xml',
    'tomato_json',
    'pybamm_experiment',
    'battinfo_jsonld',
] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some(f => f === value);
}

export interface ExportOptions {
    biologic?: {
        /** Ewe control range; defaults to [0, 5]. */
        voltage_range_V?: readonly [number, number];
    };
    tomato?: {
        /** Where tomato stores its data files. */
        output_dir?: string;
    };
    battinfo?: {
        include_context?: boolean;
    };
    neware?: {
        /** Timestamp for the `date` attribute; omitted when not given. */
        created_at?: Date | string;
    };
}

export interface ExportContext {
    sample_name: string;
    capacity_mAh?: number;
    save_path?: string;
    options?: ExportOptions;
}

/** What every exporter renders from. */
export interface ExportInput {
    sequence: ConvertedSequence;
    /** SHA-256 of the canonical protocol. */
    fingerprint: string;
}

export interface ArtifactByFormat {
    biologic_mps: BiologicSettings;
    neware_xml: XmlElement;
    tomato_json: TomatoJob;
    pybamm_experiment: PybammExperiment;
    battinfo_jsonld: BattinfoNode;
}

export interface Rendered<A> {
    artifact: A;
    advisories: StructuredError[];
}

export interface FormatExporter<F extends ExportFormat> {
    readonly format: F;
    readonly description: string;
    readonly extension: string;
    readonly encoding: TextEncoding;
    readonly requires_sample_name: boolean;
    render(input: ExportInput, ctx: ExportContext): Rendered<ArtifactByFormat[F]>;
    serialize(artifact: ArtifactByFormat[F]): string;
}
