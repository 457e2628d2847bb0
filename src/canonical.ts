/**
 * Canonical form
 *
 * A Protocol serializes to a JSON document with a fixed key order and no
 * undefined members. Reading a document runs the structural schema checks
 * (every issue collected) before the Protocol Model's own checks.
 */

import * as crypto from 'crypto';

import { CANONICAL_SCHEMA_VERSION } from './config';
import { stableStringify } from './output_writer';
import {
    MeasurementParams,
    Protocol,
    ProtocolInit,
    SafetyParams,
    Step,
    StepInit,
    createProtocol,
} from './protocol_model';
import { PROTOCOL_SCHEMA, PROTOCOL_SCHEMA_ID } from './protocol_schema';
import { SchemaValidator } from './schema_validator';
import { StructuralError } from './structured_error';

export interface CanonicalDocument {
    schema_version: typeof CANONICAL_SCHEMA_VERSION;
    measurement: Record<string, number>;
    safety: Record<string, number>;
    method: Record<string, unknown>[];
}

const MEASUREMENT_KEYS = ['time_s', 'voltage_V', 'current_mA'] as const;
const SAFETY_KEYS = [
    'max_voltage_V',
    'min_voltage_V',
    'max_current_mA',
    'min_current_mA',
    'max_capacity_mAh',
    'delay_s',
] as const;

const STEP_KEYS: { [K in Step['step']]: readonly (keyof Extract<Step, { step: K }>)[] } = {
    tag: ['step', 'tag'],
    open_circuit_voltage: ['step', 'id', 'until_time_s'],
    constant_current: ['step', 'id', 'rate_C', 'current_mA', 'until_time_s', 'until_voltage_V'],
    constant_voltage: ['step', 'id', 'voltage_V', 'until_time_s', 'until_rate_C', 'until_current_mA'],
    impedance_spectroscopy: [
        'step',
        'id',
        'amplitude_V',
        'amplitude_mA',
        'start_frequency_Hz',
        'end_frequency_Hz',
        'points_per_decade',
        'measures_per_point',
        'drift_correction',
    ],
    loop: ['step', 'id', 'start_step', 'cycle_count'],
};

const validator = new SchemaValidator();
validator.registerSchema(PROTOCOL_SCHEMA_ID, PROTOCOL_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Writing                                                                    */
/* -------------------------------------------------------------------------- */

function pick<T extends object, K extends keyof T>(obj: T, keys: readonly K[]): Record<string, T[K]> {
    const out: Record<string, T[K]> = {};
    for (const key of keys) {
        const value = obj[key];
        if (value !== undefined) out[String(key)] = value;
    }
    return out;
}

function canonicalStep(step: Step): Record<string, unknown> {
    switch (step.step) {
        case 'tag': return pick(step, STEP_KEYS.tag);
        case 'open_circuit_voltage': return pick(step, STEP_KEYS.open_circuit_voltage);
        case 'constant_current': return pick(step, STEP_KEYS.constant_current);
        case 'constant_voltage': return pick(step, STEP_KEYS.constant_voltage);
        case 'impedance_spectroscopy': return pick(step, STEP_KEYS.impedance_spectroscopy);
        case 'loop': return pick(step, STEP_KEYS.loop);
    }
}

function pickNumbers<T extends object, K extends keyof T>(obj: T, keys: readonly K[]): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [key, value] of Object.entries(pick(obj, keys))) {
        if (typeof value === 'number') out[key] = value;
    }
    return out;
}

export function toCanonical(protocol: Protocol): CanonicalDocument {
    return {
        schema_version: CANONICAL_SCHEMA_VERSION,
        measurement: pickNumbers(protocol.measurement, MEASUREMENT_KEYS),
        safety: pickNumbers(protocol.safety, SAFETY_KEYS),
        method: protocol.method.map(canonicalStep),
    };
}

export function serializeCanonical(protocol: Protocol): string {
    return JSON.stringify(toCanonical(protocol), null, 4);
}

/** SHA-256 over the stable stringification of the canonical document. */
export function fingerprint(protocol: Protocol): string {
    return crypto.createHash('sha256').update(stableStringify(toCanonical(protocol))).digest('hex');
}

export function protocolsEqual(a: Protocol, b: Protocol): boolean {
    return a === b || stableStringify(toCanonical(a)) === stableStringify(toCanonical(b));
}

/* -------------------------------------------------------------------------- */
/* Reading                                                                    */
/* -------------------------------------------------------------------------- */

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(obj: Json, key: string): number | undefined {
    const v = obj[key];
    return typeof v === 'number' ? v : undefined;
}

function str(obj: Json, key: string): string | undefined {
    const v = obj[key];
    return typeof v === 'string' ? v : undefined;
}

function rate(obj: Json, key: string): number | string | undefined {
    const v = obj[key];
    return typeof v === 'number' || typeof v === 'string' ? v : undefined;
}

function bool(obj: Json, key: string): boolean | undefined {
    const v = obj[key];
    return typeof v === 'boolean' ? v : undefined;
}

// Schema-checked input, so required members are present; NaN fails the model's checks otherwise
function req(obj: Json, key: string): number {
    return num(obj, key) ?? Number.NaN;
}

function readStep(obj: Json): StepInit | null {
    const id = str(obj, 'id');
    switch (obj.step) {
        case 'tag':
            return { step: 'tag', tag: str(obj, 'tag') ?? '' };
        case 'open_circuit_voltage':
            return { step: 'open_circuit_voltage', id, until_time_s: req(obj, 'until_time_s') };
        case 'constant_current':
            return {
                step: 'constant_current',
                id,
                rate_C: rate(obj, 'rate_C'),
                current_mA: num(obj, 'current_mA'),
                until_time_s: num(obj, 'until_time_s'),
                until_voltage_V: num(obj, 'until_voltage_V'),
            };
        case 'constant_voltage':
            return {
                step: 'constant_voltage',
                id,
                voltage_V: req(obj, 'voltage_V'),
                until_time_s: num(obj, 'until_time_s'),
                until_rate_C: rate(obj, 'until_rate_C'),
                until_current_mA: num(obj, 'until_current_mA'),
            };
        case 'impedance_spectroscopy':
            return {
                step: 'impedance_spectroscopy',
                id,
                amplitude_V: num(obj, 'amplitude_V'),
                amplitude_mA: num(obj, 'amplitude_mA'),
                start_frequency_Hz: req(obj, 'start_frequency_Hz'),
                end_frequency_Hz: req(obj, 'end_frequency_Hz'),
                points_per_decade: num(obj, 'points_per_decade'),
                measures_per_point: num(obj, 'measures_per_point'),
                drift_correction: bool(obj, 'drift_correction'),
            };
        case 'loop':
            return { step: 'loop', id, start_step: str(obj, 'start_step') ?? '', cycle_count: req(obj, 'cycle_count') };
        default:
            return null;
    }
}

function readNumbers<K extends string>(obj: unknown, keys: readonly K[]): Partial<Record<K, number>> {
    const out: Partial<Record<K, number>> = {};
    if (!isRecord(obj)) return out;
    for (const key of keys) {
        const v = num(obj, key);
        if (v !== undefined) out[key] = v;
    }
    return out;
}

export function fromCanonical(doc: unknown): Protocol {
    const result = validator.validate(doc, PROTOCOL_SCHEMA_ID);
    if (!result.valid || !isRecord(doc)) {
        throw new StructuralError(result.errors.map(e => ({
            code: 'SCHEMA_MISMATCH',
            message: `${e.path || '<root>'}: ${e.message}`,
            path: e.path.replace(/^\./, ''),
        })));
    }

    const measurement: MeasurementParams = { time_s: Number.NaN, ...readNumbers(doc.measurement, MEASUREMENT_KEYS) };
    const safety: SafetyParams = readNumbers(doc.safety, SAFETY_KEYS);
    const method: StepInit[] = [];
    if (Array.isArray(doc.method)) {
        for (const item of doc.method) {
            const step = isRecord(item) ? readStep(item) : null;
            if (step) method.push(step);
        }
    }

    const init: ProtocolInit = { measurement, safety, method };
    return createProtocol(init);
}

export function parseCanonical(text: string): Protocol {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw StructuralError.single('SCHEMA_MISMATCH', `Invalid JSON: ${reason}`);
    }
    return fromCanonical(doc);
}
