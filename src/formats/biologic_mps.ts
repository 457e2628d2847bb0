/**
 * Biologic EC-Lab settings (.mps) using the ModuloBatt technique.
 *
 * The body is a table: one row per parameter key, one 20-character column
 * per executable step. Current ranges are fixed for CC and GEIS steps (the
 * instrument has no Auto option for them) and may only change directly after
 * an open-circuit-voltage step.
 */

import { BIOLOGIC } from '../config';
import { createLogger } from '../logger';
import { MeasurementParams, SafetyParams } from '../protocol_model';
import {
    ConvertedConstantCurrent,
    ConvertedConstantVoltage,
    ConvertedSequence,
    ConvertedTaskStep,
} from '../rate_converter';
import { unrollPositions } from '../sequence_resolver';
import { AdvisoryFactory, EncodingError, StructuredError } from '../structured_error';
import { effectiveCurrentLimit, hasAsymmetricCurrentLimit } from '../validator';
import DEFAULT_COLUMN from './biologic_mps_columns.json';
import { ExportContext, ExportInput, FormatExporter, Rendered } from './types';

const log = createLogger('biologic_mps');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type BiologicKey = keyof typeof DEFAULT_COLUMN;
export type BiologicColumn = Record<BiologicKey, string>;

export interface BiologicSettings {
    header: string[];
    columns: BiologicColumn[];
}

interface Quantity {
    type: string;
    comp?: string;
    value: string;
    unit: string;
}

const LIMIT_KEYS = [
    { type: 'lim1_type', comp: 'lim1_comp', value: 'lim1_value', unit: 'lim1_value_unit' },
    { type: 'lim2_type', comp: 'lim2_comp', value: 'lim2_value', unit: 'lim2_value_unit' },
] as const satisfies readonly { type: BiologicKey; comp: BiologicKey; value: BiologicKey; unit: BiologicKey }[];

const RECORD_KEYS = [
    { type: 'rec1_type', value: 'rec1_value', unit: 'rec1_value_unit' },
    { type: 'rec2_type', value: 'rec2_value', unit: 'rec2_value_unit' },
] as const satisfies readonly { type: BiologicKey; value: BiologicKey; unit: BiologicKey }[];

function isBiologicKey(key: string): key is BiologicKey {
    return key in DEFAULT_COLUMN;
}

const COLUMN_KEYS: readonly BiologicKey[] = Object.keys(DEFAULT_COLUMN).filter(isBiologicKey);

const f3 = (x: number): string => x.toFixed(3);

/* -------------------------------------------------------------------------- */
/* Column helpers                                                             */
/* -------------------------------------------------------------------------- */

function setLimits(column: BiologicColumn, limits: Quantity[]): void {
    limits.forEach((limit, i) => {
        const keys = LIMIT_KEYS[i];
        column[keys.type] = limit.type;
        column[keys.comp] = limit.comp ?? '>';
        column[keys.value] = limit.value;
        column[keys.unit] = limit.unit;
    });
    column.lim_nb = String(limits.length);
}

function setRecords(column: BiologicColumn, records: Quantity[]): void {
    records.forEach((record, i) => {
        const keys = RECORD_KEYS[i];
        column[keys.type] = record.type;
        column[keys.value] = record.value;
        column[keys.unit] = record.unit;
    });
    column.rec_nb = String(records.length);
}

function timeRecord(measurement: MeasurementParams): Quantity[] {
    return measurement.time_s ? [{ type: 'Time', value: f3(measurement.time_s), unit: 's' }] : [];
}

/** Smallest range whose full scale covers the current, or undefined. */
function rangeFor(current_mA: number, max_mA: number): string | undefined {
    const range = BIOLOGIC.CURRENT_RANGES_MA.find(r => r.max_mA <= max_mA && Math.abs(current_mA) <= r.max_mA);
    return range?.label;
}

function ccRange(step: ConvertedConstantCurrent, index: number): string {
    const range = rangeFor(step.current_mA, BIOLOGIC.MAX_CC_RANGE_MA);
    if (!range) {
        throw new EncodingError(
            `Step ${index}: no current range supports ${step.current_mA} mA (maximum ${BIOLOGIC.MAX_CC_RANGE_MA} mA)`,
            'CURRENT_RANGE_UNSUPPORTED',
            index,
            { current_mA: step.current_mA }
        );
    }
    return range;
}

/** Fixed current range per position; undefined means Auto. */
function currentRanges(sequence: ConvertedSequence): (string | undefined)[] {
    const ranges: (string | undefined)[] = [];
    sequence.steps.forEach((s, p) => {
        if (s.kind === 'loop') {
            ranges.push(undefined);
            return;
        }
        const step = s.step;
        switch (step.step) {
            case 'constant_current':
                ranges.push(ccRange(step, s.index));
                return;
            case 'constant_voltage': {
                const prev = p > 0 ? sequence.steps[p - 1] : undefined;
                const inherits = prev?.kind === 'task'
                    && prev.step.step === 'constant_current'
                    && prev.step.until_voltage_V === step.voltage_V;
                ranges.push(inherits ? ranges[p - 1] : undefined);
                return;
            }
            case 'impedance_spectroscopy': {
                if (step.amplitude_mA === undefined) {
                    ranges.push(undefined);
                    return;
                }
                // GEIS: the 1 mA range allows at most 0.5 mA amplitude
                const range = rangeFor(step.amplitude_mA * 2, Infinity);
                if (!range) {
                    throw new EncodingError(
                        `Step ${s.index}: no current range supports an amplitude of ${step.amplitude_mA} mA`,
                        'CURRENT_RANGE_UNSUPPORTED',
                        s.index,
                        { amplitude_mA: step.amplitude_mA }
                    );
                }
                ranges.push(range);
                return;
            }
            case 'open_circuit_voltage':
                ranges.push(undefined);
                return;
        }
    });
    return ranges;
}

/**
 * Walks the execution order with each loop capped at two cycles, which visits
 * every wrap-around transition once.
 */
function checkRangeChanges(sequence: ConvertedSequence, ranges: readonly (string | undefined)[]): void {
    let inEffect: string | undefined;
    let previous: ConvertedTaskStep | undefined;
    for (const p of unrollPositions(sequence, { cycleCap: 2 })) {
        const s = sequence.steps[p];
        if (s.kind !== 'task') continue;
        const range = ranges[p];
        if (range !== undefined) {
            if (inEffect !== undefined && range !== inEffect && previous?.step !== 'open_circuit_voltage') {
                throw new EncodingError(
                    `Step ${s.index}: current range changes from ${inEffect} to ${range}; ` +
                    'a range change must directly follow an open circuit voltage step',
                    'RANGE_CHANGE_NOT_AFTER_OCV',
                    s.index,
                    { from: inEffect, to: range }
                );
            }
            inEffect = range;
        }
        previous = s.step;
    }
}

function checkVoltage(value: number, index: number, range: readonly [number, number]): void {
    const [min, max] = range;
    if (value < min || value > max) {
        throw new EncodingError(
            `Step ${index}: ${value} V is outside the Ewe control range ${min} V to ${max} V`,
            'VOLTAGE_OUT_OF_RANGE',
            index,
            { voltage_V: value, min_V: min, max_V: max }
        );
    }
}

/* -------------------------------------------------------------------------- */
/* Steps                                                                      */
/* -------------------------------------------------------------------------- */

function constantCurrent(column: BiologicColumn, step: ConvertedConstantCurrent, measurement: MeasurementParams): void {
    const I = step.current_mA;
    column.ctrl_type = 'CC';
    if (Math.abs(I) < 1) {
        column.ctrl1_val = f3(I * 1e3);
        column.ctrl1_val_unit = 'uA';
    } else {
        column.ctrl1_val = f3(I);
        column.ctrl1_val_unit = 'mA';
    }
    column.ctrl1_val_vs = '<None>';

    const limits: Quantity[] = [];
    if (step.until_time_s) limits.push({ type: 'Time', value: f3(step.until_time_s), unit: 's' });
    if (step.until_voltage_V) {
        limits.push({ type: 'Ewe', comp: I > 0 ? '>' : '<', value: f3(step.until_voltage_V), unit: 'V' });
    }
    setLimits(column, limits);

    const records = timeRecord(measurement);
    if (measurement.voltage_V) records.push({ type: 'Ewe', value: f3(measurement.voltage_V), unit: 'V' });
    setRecords(column, records);
}

function constantVoltage(column: BiologicColumn, step: ConvertedConstantVoltage, measurement: MeasurementParams): void {
    column.ctrl_type = 'CV';
    column.ctrl1_val = f3(step.voltage_V);
    column.ctrl1_val_unit = 'V';
    column.ctrl1_val_vs = 'Ref';

    const limits: Quantity[] = [];
    if (step.until_time_s) limits.push({ type: 'Time', value: f3(step.until_time_s), unit: 's' });
    if (step.until_current_mA) {
        limits.push({ type: '|I|', comp: '<', value: f3(Math.abs(step.until_current_mA)), unit: 'mA' });
    }
    setLimits(column, limits);

    const records = timeRecord(measurement);
    if (measurement.current_mA) records.push({ type: 'I', value: f3(measurement.current_mA), unit: 'mA' });
    setRecords(column, records);
}

function frequency(column: BiologicColumn, valueKey: 'ctrl2_val' | 'ctrl3_val', unitKey: 'ctrl2_val_unit' | 'ctrl3_val_unit', hz: number): void {
    if (hz >= 1e3) {
        column[valueKey] = f3(hz / 1e3);
        column[unitKey] = 'kHz';
    } else if (hz >= 1) {
        column[valueKey] = f3(hz);
        column[unitKey] = 'Hz';
    } else {
        column[valueKey] = f3(hz * 1e3);
        column[unitKey] = 'mHz';
    }
}

function impedance(column: BiologicColumn, step: Extract<ConvertedTaskStep, { step: 'impedance_spectroscopy' }>): void {
    if (step.amplitude_V !== undefined) {
        const a = step.amplitude_V;
        column.ctrl_type = 'PEIS';
        if (a >= 0.1) {
            column.ctrl1_val = f3(a);
            column.ctrl1_val_unit = 'V';
        } else if (a >= 0.001) {
            column.ctrl1_val = f3(a * 1e3);
            column.ctrl1_val_unit = 'mV';
        } else {
            column.ctrl1_val = f3(a * 1e6);
            column.ctrl1_val_unit = 'uV';
        }
    } else if (step.amplitude_mA !== undefined) {
        const a = step.amplitude_mA;
        column.ctrl_type = 'GEIS';
        if (a >= 1000) {
            column.ctrl1_val = f3(a / 1000);
            column.ctrl1_val_unit = 'A';
        } else if (a >= 1) {
            column.ctrl1_val = f3(a);
            column.ctrl1_val_unit = 'mA';
        } else {
            column.ctrl1_val = f3(a * 1000);
            column.ctrl1_val_unit = 'uA';
        }
    }
    frequency(column, 'ctrl2_val', 'ctrl2_val_unit', step.start_frequency_Hz);
    frequency(column, 'ctrl3_val', 'ctrl3_val_unit', step.end_frequency_Hz);
    column.ctrl_Nd = String(step.points_per_decade);
    column.ctrl_Na = String(step.measures_per_point);
    column.ctrl_corr = step.drift_correction ? '1' : '0';
}

/* -------------------------------------------------------------------------- */
/* Header                                                                     */
/* -------------------------------------------------------------------------- */

function safetyLines(safety: SafetyParams): string[] {
    const lines: string[] = [];
    if (safety.min_voltage_V !== undefined) lines.push(`\tEwe min = ${safety.min_voltage_V.toFixed(5)} V`);
    if (safety.max_voltage_V !== undefined) lines.push(`\tEwe max = ${safety.max_voltage_V.toFixed(5)} V`);
    // The instrument takes a single absolute current limit
    const limit = effectiveCurrentLimit(safety);
    if (limit !== undefined) lines.push(`\t|I| = ${limit.toFixed(5)} mA`);
    if (lines.length > 0) {
        const delay = safety.delay_s === undefined ? '0' : (safety.delay_s * 1000).toFixed(1);
        lines.push(`\tfor t > ${delay} ms`);
    }
    return lines;
}

function buildHeader(safety: SafetyParams, sampleName: string, range: readonly [number, number]): string[] {
    const compliance = BIOLOGIC.COMPLIANCE_V;
    return [
        'EC-LAB SETTING FILE',
        '',
        'Number of linked techniques : 1',
        `Device : ${BIOLOGIC.DEVICE}`,
        `CE vs. WE compliance from -${compliance} V to ${compliance} V`,
        'Electrode connection : standard',
        'Potential control : Ewe',
        `Ewe ctrl range : min = ${range[0].toFixed(2)} V, max = ${range[1].toFixed(2)} V`,
        'Safety Limits :',
        ...safetyLines(safety),
        '\tDo not start on E overload',
        `Comments : ${sampleName}`,
        'Cycle Definition : Charge/Discharge alternance',
        'Do not turn to OCV between techniques',
        '',
        'Technique : 1',
        'Modulo Bat',
    ];
}

/* -------------------------------------------------------------------------- */
/* Exporter                                                                   */
/* -------------------------------------------------------------------------- */

function render(input: ExportInput, ctx: ExportContext): Rendered<BiologicSettings> {
    const { sequence } = input;
    const { measurement, safety } = sequence.protocol;
    const advisories: StructuredError[] = [];

    const range = ctx.options?.biologic?.voltage_range_V ?? BIOLOGIC.DEFAULT_VOLTAGE_RANGE_V;
    if (!(range[0] < range[1])) {
        throw new EncodingError(
            `Invalid Ewe control range: min ${range[0]} V must be below max ${range[1]} V`,
            'INVALID_VOLTAGE_RANGE',
            undefined,
            { min_V: range[0], max_V: range[1] }
        );
    }
    if (range[0] < -BIOLOGIC.COMPLIANCE_V || range[1] > BIOLOGIC.COMPLIANCE_V) {
        const advisory = AdvisoryFactory.wideVoltageRange(range[0], range[1], BIOLOGIC.COMPLIANCE_V);
        log.warn(advisory.message, advisory.context);
        advisories.push(advisory);
    }
    if (hasAsymmetricCurrentLimit(safety)) {
        const advisory = AdvisoryFactory.asymmetricCurrentLimit(safety.min_current_mA, safety.max_current_mA);
        log.warn(advisory.message, advisory.context);
        advisories.push(advisory);
    }

    const ranges = currentRanges(sequence);
    checkRangeChanges(sequence, ranges);

    const columns = sequence.steps.map((s, p): BiologicColumn => {
        const column: BiologicColumn = { ...DEFAULT_COLUMN };
        column.Ns = String(p);
        column.lim1_seq = String(p + 1);
        column.lim2_seq = String(p + 1);
        column['E range min (V)'] = f3(range[0]);
        column['E range max (V)'] = f3(range[1]);

        if (s.kind === 'loop') {
            column.ctrl_type = 'Loop';
            column.ctrl_seq = String(s.goto);
            column.ctrl_repeat = String(s.step.cycle_count - 1);
            return column;
        }

        const step = s.step;
        switch (step.step) {
            case 'open_circuit_voltage':
                column.ctrl_type = 'Rest';
                setLimits(column, [{ type: 'Time', value: f3(step.until_time_s), unit: 's' }]);
                setRecords(column, [{ type: 'Time', value: f3(measurement.time_s || 0), unit: 's' }]);
                break;
            case 'constant_current':
                if (step.until_voltage_V !== undefined) checkVoltage(step.until_voltage_V, s.index, range);
                constantCurrent(column, step, measurement);
                break;
            case 'constant_voltage':
                checkVoltage(step.voltage_V, s.index, range);
                constantVoltage(column, step, measurement);
                break;
            case 'impedance_spectroscopy':
                impedance(column, step);
                break;
        }
        column['I Range'] = ranges[p] ?? 'Auto';
        return column;
    });

    return { artifact: { header: buildHeader(safety, ctx.sample_name, range), columns }, advisories };
}

function serialize(settings: BiologicSettings): string {
    const width = BIOLOGIC.COLUMN_WIDTH;
    const rows = COLUMN_KEYS.map(key =>
        key.padEnd(width) + settings.columns.map(column => column[key].padEnd(width)).join('')
    );
    return [...settings.header, ...rows, ''].join('\n');
}

export const biologicMps: FormatExporter<'biologic_mps'> = {
    format: 'biologic_mps',
    description: 'Biologic EC-Lab ModuloBatt settings (.mps)',
    extension: '.mps',
    encoding: 'cp1252',
    requires_sample_name: true,
    render,
    serialize,
};
