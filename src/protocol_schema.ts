/**
 * JSON schema of the canonical protocol document (cycling-protocol-v1).
 */

import { CANONICAL_SCHEMA_VERSION } from './config';
import { JsonSchema } from './schema_validator';

const finite: JsonSchema = { type: 'number' };
const nonNegative: JsonSchema = { type: 'number', minimum: 0 };
const positive: JsonSchema = { type: 'number', exclusiveMinimum: 0 };
const positiveInt: JsonSchema = { type: 'integer', minimum: 1 };
const frequency: JsonSchema = { type: 'number', minimum: 1e-5, maximum: 1e5 };
const cRate: JsonSchema = { type: ['number', 'string'] };
const label: JsonSchema = { type: 'string', pattern: '\\S' };
const id: JsonSchema = { type: 'string' };

function stepSchema(kind: string, properties: Record<string, JsonSchema>, required: string[] = []): JsonSchema {
    return {
        type: 'object',
        required: ['step', ...required],
        additionalProperties: false,
        properties: { step: { type: 'string', enum: [kind] }, ...properties },
    };
}

export const STEP_SCHEMAS: Record<string, JsonSchema> = {
    tag: stepSchema('tag', { tag: label }, ['tag']),
    open_circuit_voltage: stepSchema('open_circuit_voltage', { id, until_time_s: positive }, ['until_time_s']),
    constant_current: stepSchema('constant_current', {
        id,
        rate_C: cRate,
        current_mA: finite,
        until_time_s: nonNegative,
        until_voltage_V: finite,
    }),
    constant_voltage: stepSchema('constant_voltage', {
        id,
        voltage_V: finite,
        until_time_s: nonNegative,
        until_rate_C: cRate,
        until_current_mA: finite,
    }, ['voltage_V']),
    impedance_spectroscopy: stepSchema('impedance_spectroscopy', {
        id,
        amplitude_V: positive,
        amplitude_mA: positive,
        start_frequency_Hz: frequency,
        end_frequency_Hz: frequency,
        points_per_decade: positiveInt,
        measures_per_point: positiveInt,
        drift_correction: { type: 'boolean' },
    }, ['start_frequency_Hz', 'end_frequency_Hz']),
    loop: stepSchema('loop', { id, start_step: label, cycle_count: positiveInt }, ['start_step', 'cycle_count']),
};

export const PROTOCOL_SCHEMA_ID = CANONICAL_SCHEMA_VERSION;

export const PROTOCOL_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['schema_version', 'measurement', 'method'],
    additionalProperties: false,
    properties: {
        schema_version: { type: 'string', enum: [CANONICAL_SCHEMA_VERSION] },
        measurement: {
            type: 'object',
            required: ['time_s'],
            additionalProperties: false,
            properties: { time_s: nonNegative, voltage_V: nonNegative, current_mA: nonNegative },
        },
        safety: {
            type: 'object',
            additionalProperties: false,
            properties: {
                max_voltage_V: finite,
                min_voltage_V: finite,
                max_current_mA: finite,
                min_current_mA: finite,
                max_capacity_mAh: nonNegative,
                delay_s: nonNegative,
            },
        },
        method: {
            type: 'array',
            minItems: 1,
            items: { type: 'object', oneOf: { discriminator: 'step', variants: STEP_SCHEMAS } },
        },
    },
};
