/**
 * tomato job file for a Biologic MPG2 driver: a flat instruction list.
 * Currents are absolute values in amps. Safety limits are set on the
 * instrument itself and are not part of the job.
 */

import { TOMATO } from '../config';
import { MeasurementParams } from '../protocol_model';
import { ConvertedStep } from '../rate_converter';
import { UnsupportedFeatureError } from '../structured_error';
import { ExportContext, ExportInput, FormatExporter, Rendered } from './types';

export interface TomatoStep {
    device: string;
    technique: string;
    measure_every_dt?: number;
    measure_every_dI?: number;
    measure_every_dE?: number;
    I_range?: string;
    E_range?: string;
    time?: number;
    current?: number;
    voltage?: number;
    limit_voltage_max?: number;
    limit_voltage_min?: number;
    limit_current_max?: number;
    limit_current_min?: number;
    goto?: number;
    n_gotos?: number;
}

export interface TomatoJob {
    version: string;
    sample: { name: string; capacity_mAh: number | null };
    method: TomatoStep[];
    tomato: {
        unlock_when_done: boolean;
        verbosity: string;
        output: { path: string; prefix: string };
    };
}

function measured(measurement: MeasurementParams): Partial<TomatoStep> {
    const out: Partial<TomatoStep> = {};
    if (measurement.time_s) out.measure_every_dt = measurement.time_s;
    if (measurement.current_mA) out.measure_every_dI = measurement.current_mA;
    if (measurement.voltage_V) out.measure_every_dE = measurement.voltage_V;
    out.I_range = TOMATO.I_RANGE;
    out.E_range = TOMATO.E_RANGE;
    return out;
}

function toTomatoStep(s: ConvertedStep, measurement: MeasurementParams): TomatoStep {
    if (s.kind === 'loop') {
        return {
            device: TOMATO.DEVICE,
            technique: 'loop',
            goto: s.goto,
            n_gotos: s.step.cycle_count - 1,
        };
    }

    const step = s.step;
    switch (step.step) {
        case 'open_circuit_voltage':
            return { device: TOMATO.DEVICE, technique: step.step, ...measured(measurement), time: step.until_time_s };

        case 'constant_current': {
            const out: TomatoStep = {
                device: TOMATO.DEVICE,
                technique: step.step,
                ...measured(measurement),
                current: step.current_mA / 1000,
            };
            if (step.until_time_s) out.time = step.until_time_s;
            if (step.until_voltage_V) {
                if (step.current_mA > 0) out.limit_voltage_max = step.until_voltage_V;
                else out.limit_voltage_min = step.until_voltage_V;
            }
            return out;
        }

        case 'constant_voltage': {
            const out: TomatoStep = {
                device: TOMATO.DEVICE,
                technique: step.step,
                ...measured(measurement),
                voltage: step.voltage_V,
            };
            if (step.until_time_s) out.time = step.until_time_s;
            if (step.until_current_mA) {
                // Charging holds stop when the current falls below the limit
                if (step.until_current_mA > 0) out.limit_current_min = step.until_current_mA / 1000;
                else out.limit_current_max = step.until_current_mA / 1000;
            }
            return out;
        }

        case 'impedance_spectroscopy':
            throw new UnsupportedFeatureError(
                `Step ${s.index}: tomato jobs do not support impedance spectroscopy`,
                s.index,
                { format: 'tomato_json', step: step.step }
            );
    }
}

function render(input: ExportInput, ctx: ExportContext): Rendered<TomatoJob> {
    const { sequence } = input;
    const job: TomatoJob = {
        version: TOMATO.VERSION,
        sample: { name: ctx.sample_name, capacity_mAh: sequence.capacity_mAh ?? null },
        method: sequence.steps.map(s => toTomatoStep(s, sequence.protocol.measurement)),
        tomato: {
            unlock_when_done: true,
            verbosity: 'DEBUG',
            output: {
                path: ctx.options?.tomato?.output_dir ?? TOMATO.OUTPUT_DIR,
                prefix: ctx.sample_name,
            },
        },
    };
    return { artifact: job, advisories: [] };
}

export const tomatoJson: FormatExporter<'tomato_json'> = {
    format: 'tomato_json',
    description: 'tomato job for the Biologic MPG2 driver (.json)',
    extension: '.json',
    encoding: 'utf-8',
    requires_sample_name: true,
    render,
    serialize: job => JSON.stringify(job, null, 4),
};
