// src/formats/index.ts

import { battinfoJsonld } from './battinfo_jsonld';
import { biologicMps } from './biologic_mps';
import { newareXml } from './neware_xml';
import { pybammExperiment } from './pybamm_experiment';
import { tomatoJson } from './tomato_json';
import { EXPORT_FORMATS, ExportFormat, FormatExporter } from './types';

export const EXPORTERS: { readonly [F in ExportFormat]: FormatExporter<F> } = {
    biologic_mps: biologicMps,
    neware_xml: newareXml,
    tomato_json: tomatoJson,
    pybamm_experiment: pybammExperiment,
    battinfo_jsonld: battinfoJsonld,
};

export function getExporter<F extends ExportFormat>(format: F): FormatExporter<F> {
    return EXPORTERS[format];
}

export function listFormats(): FormatExporter<ExportFormat>[] {
    return EXPORT_FORMATS.map(f => EXPORTERS[f]);
}

export { flattenPybammExperiment } from './pybamm_experiment';
export type { PybammExperiment, PybammRepeat, PybammStep } from './pybamm_experiment';
export type { BattinfoNode, BattinfoQuantity } from './battinfo_jsonld';
export type { BiologicColumn, BiologicSettings } from './biologic_mps';
export type { TomatoJob, TomatoStep } from './tomato_json';
export type { XmlElement } from './xml_builder';
export * from './types';
