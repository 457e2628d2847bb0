/**
 * Neware BTS step file (.xml, version 17).
 *
 * Units on the wire: time in ms, voltage in 0.1 mV, current in mA,
 * capacity in mAs. Steps are numbered from 1 with tags removed and the file
 * ends with an end step.
 */

import * as crypto from 'crypto';

import { CREATOR_NAME, NEWARE } from '../config';
import { MeasurementParams, SafetyParams } from '../protocol_model';
import { ConvertedConstantCurrent, ConvertedConstantVoltage, ConvertedStep } from '../rate_converter';
import { EncodingError, UnsupportedFeatureError } from '../structured_error';
import { ExportContext, ExportInput, FormatExporter, Rendered } from './types';
import { XmlElement, element, subElement, toPrettyXml } from './xml_builder';

const STEP_TYPE = {
    CC_CHARGE: '1',
    CC_DISCHARGE: '2',
    CV_CHARGE: '3',
    REST: '4',
    LOOP: '5',
    END: '6',
    CV_DISCHARGE: '19',
} as const;

// printf %f
const f = (x: number): string => x.toFixed(6);

/* -------------------------------------------------------------------------- */
/* Header values                                                              */
/* -------------------------------------------------------------------------- */

/** Same inputs give the same Guid. */
export function deterministicGuid(input: ExportInput, ctx: ExportContext): string {
    const hex = crypto
        .createHash('sha256')
        .update([input.fingerprint, ctx.sample_name, String(input.sequence.capacity_mAh ?? '')].join('\n'))
        .digest('hex');
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
}

/** YYYYMMDDhhmmss in UTC. */
export function formatDate(value: Date | string): string {
    if (typeof value === 'string' && /^\d{14}$/.test(value)) return value;
    const date = typeof value === 'string' ? new Date(value) : value;
    if (Number.isNaN(date.getTime())) {
        throw new EncodingError(`Invalid created_at timestamp: ${String(value)}`, 'INVALID_NUMBER', undefined, {
            created_at: String(value),
        });
    }
    const two = (n: number): string => String(n).padStart(2, '0');
    return (
        String(date.getUTCFullYear()) +
        two(date.getUTCMonth() + 1) +
        two(date.getUTCDate()) +
        two(date.getUTCHours()) +
        two(date.getUTCMinutes()) +
        two(date.getUTCSeconds())
    );
}

/* -------------------------------------------------------------------------- */
/* Global parameters                                                          */
/* -------------------------------------------------------------------------- */

function protectElement(safety: SafetyParams): XmlElement {
    const protect = element('Protect');
    const main = subElement(protect, 'Main');
    const volt = subElement(main, 'Volt');
    if (safety.max_voltage_V !== undefined) subElement(volt, 'Upper', { Value: f(safety.max_voltage_V * 10000) });
    if (safety.min_voltage_V !== undefined) subElement(volt, 'Lower', { Value: f(safety.min_voltage_V * 10000) });
    const curr = subElement(main, 'Curr');
    if (safety.max_current_mA) subElement(curr, 'Upper', { Value: f(safety.max_current_mA) });
    if (safety.min_current_mA) subElement(curr, 'Lower', { Value: f(safety.min_current_mA) });
    if (safety.delay_s) subElement(main, 'Delay_Time', { Value: f(safety.delay_s * 1000) });
    const cap = subElement(main, 'Cap');
    if (safety.max_capacity_mAh) subElement(cap, 'Upper', { Value: f(safety.max_capacity_mAh * 3600) });
    return protect;
}

function recordElement(measurement: MeasurementParams): XmlElement {
    const record = element('Record');
    const main = subElement(record, 'Main');
    if (measurement.time_s) subElement(main, 'Time', { Value: f(measurement.time_s * 1000) });
    if (measurement.voltage_V) subElement(main, 'Volt', { Value: f(measurement.voltage_V * 10000) });
    if (measurement.current_mA) subElement(main, 'Curr', { Value: f(measurement.current_mA) });
    return record;
}

/* -------------------------------------------------------------------------- */
/* Steps                                                                      */
/* -------------------------------------------------------------------------- */

function stepElement(num: number, type: string): { step: XmlElement; limit: XmlElement } {
    const step = element(`Step${num}`, { Step_ID: String(num), Step_Type: type });
    return { step, limit: subElement(step, 'Limit') };
}

function constantCurrent(num: number, cc: ConvertedConstantCurrent): XmlElement {
    const { step, limit } = stepElement(num, cc.current_mA > 0 ? STEP_TYPE.CC_CHARGE : STEP_TYPE.CC_DISCHARGE);
    const main = subElement(limit, 'Main');
    if (cc.rate_C !== undefined) subElement(main, 'Rate', { Value: f(Math.abs(cc.rate_C)) });
    subElement(main, 'Curr', { Value: f(Math.abs(cc.current_mA)) });
    if (cc.until_time_s !== undefined) subElement(main, 'Time', { Value: f(cc.until_time_s * 1000) });
    if (cc.until_voltage_V !== undefined) subElement(main, 'Stop_Volt', { Value: f(cc.until_voltage_V * 10000) });
    return step;
}

function constantVoltage(num: number, cv: ConvertedConstantVoltage, prev: ConvertedStep | undefined): XmlElement {
    const discharging = cv.until_current_mA !== undefined && cv.until_current_mA < 0;
    const { step, limit } = stepElement(num, discharging ? STEP_TYPE.CV_DISCHARGE : STEP_TYPE.CV_CHARGE);
    const main = subElement(limit, 'Main');
    subElement(main, 'Volt', { Value: f(cv.voltage_V * 10000) });
    if (cv.until_time_s !== undefined) subElement(main, 'Time', { Value: f(cv.until_time_s * 1000) });
    if (cv.until_rate_C !== undefined) subElement(main, 'Stop_Rate', { Value: f(Math.abs(cv.until_rate_C)) });
    if (cv.until_current_mA !== undefined) subElement(main, 'Stop_Curr', { Value: f(Math.abs(cv.until_current_mA)) });

    // A CV that continues a CC at its cutoff voltage keeps the CC current
    if (prev?.kind === 'task' && prev.step.step === 'constant_current' && prev.step.until_voltage_V === cv.voltage_V) {
        if (prev.step.rate_C !== undefined) subElement(main, 'Rate', { Value: f(Math.abs(prev.step.rate_C)) });
        subElement(main, 'Curr', { Value: f(Math.abs(prev.step.current_mA)) });
    }
    return step;
}

function toStepElement(s: ConvertedStep, prev: ConvertedStep | undefined): XmlElement {
    const num = s.position + 1;
    if (s.kind === 'loop') {
        const { step, limit } = stepElement(num, STEP_TYPE.LOOP);
        const other = subElement(limit, 'Other');
        subElement(other, 'Start_Step', { Value: String(s.goto + 1) });
        subElement(other, 'Cycle_Count', { Value: String(s.step.cycle_count) });
        return step;
    }
    const task = s.step;
    switch (task.step) {
        case 'constant_current':
            return constantCurrent(num, task);
        case 'constant_voltage':
            return constantVoltage(num, task, prev);
        case 'open_circuit_voltage': {
            const { step, limit } = stepElement(num, STEP_TYPE.REST);
            subElement(subElement(limit, 'Main'), 'Time', { Value: f(task.until_time_s * 1000) });
            return step;
        }
        case 'impedance_spectroscopy':
            throw new UnsupportedFeatureError(
                `Step ${s.index}: Neware step files do not support impedance spectroscopy`,
                s.index,
                { format: 'neware_xml', step: task.step }
            );
    }
}

/* -------------------------------------------------------------------------- */
/* Exporter                                                                   */
/* -------------------------------------------------------------------------- */

function render(input: ExportInput, ctx: ExportContext): Rendered<XmlElement> {
    const { sequence } = input;
    const { protocol, steps } = sequence;

    const attributes: Record<string, string> = {
        type: 'Step File',
        version: NEWARE.FILE_VERSION,
        client_version: NEWARE.CLIENT_VERSION,
    };
    const createdAt = ctx.options?.neware?.created_at;
    if (createdAt !== undefined) attributes.date = formatDate(createdAt);
    attributes.Guid = deterministicGuid(input, ctx);

    const root = element('root');
    const config = subElement(root, 'config', attributes);

    const head = subElement(config, 'Head_Info');
    subElement(head, 'Operate', { Value: '66' });
    subElement(head, 'Scale', { Value: '1' });
    subElement(head, 'Start_Step', { Value: '1', Hide_Ctrl_Step: '0' });
    subElement(head, 'Creator', { Value: CREATOR_NAME });
    subElement(head, 'Remark', { Value: ctx.sample_name });
    subElement(head, 'RateType', { Value: NEWARE.RATE_TYPE });
    if (sequence.capacity_mAh !== undefined) {
        subElement(head, 'MultCap', { Value: f(sequence.capacity_mAh * 3600) });
    }

    const whole = subElement(config, 'Whole_Prt');
    whole.children.push(protectElement(protocol.safety), recordElement(protocol.measurement));

    const stepInfo = subElement(config, 'Step_Info', { Num: String(steps.length + 1) });
    steps.forEach((s, p) => stepInfo.children.push(toStepElement(s, p > 0 ? steps[p - 1] : undefined)));
    const end = steps.length + 1;
    subElement(stepInfo, `Step${end}`, { Step_ID: String(end), Step_Type: STEP_TYPE.END });

    const smbus = subElement(config, 'SMBUS');
    subElement(smbus, 'SMBUS_Info', { Num: '0', AdjacentInterval: '0' });

    return { artifact: root, advisories: [] };
}

export const newareXml: FormatExporter<'neware_xml'> = {
    format: 'neware_xml',
    description: 'Neware BTS step file (.xml)',
    extension: '.xml',
    encoding: 'utf-8',
    requires_sample_name: true,
    render,
    serialize: root => toPrettyXml(root),
};
