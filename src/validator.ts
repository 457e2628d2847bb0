/**
 * Protocol Validator
 *
 * Checks a Protocol against its own safety parameters and structural rules.
 * Every violation is collected; nothing is thrown and nothing is mutated.
 * Advisories (asymmetric current limits) are reported but never fail the result.
 */

import { createLogger } from './logger';
import { Protocol, SafetyParams, Step, checkSafetyParams } from './protocol_model';
import {
    AdvisoryFactory,
    ErrorCode,
    StructuredError,
    StructuralIssue,
    ValidationError,
} from './structured_error';

const log = createLogger('validator');

export interface ValidateOptions {
    capacity_mAh?: number;
}

export interface ValidationResult {
    ok: boolean;
    errors: ValidationError[];
    advisories: StructuredError[];
}

/* -------------------------------------------------------------------------- */
/* Bounds                                                                     */
/* -------------------------------------------------------------------------- */

interface Bounds {
    min?: number;
    max?: number;
}

function outside(value: number, bounds: Bounds): boolean {
    return (bounds.min !== undefined && value < bounds.min) || (bounds.max !== undefined && value > bounds.max);
}

function describeBounds(bounds: Bounds, unit: string): string {
    const lo = bounds.min === undefined ? '-inf' : `${bounds.min}`;
    const hi = bounds.max === undefined ? '+inf' : `${bounds.max}`;
    return `[${lo}, ${hi}] ${unit}`;
}

/** Symmetric absolute current limit a single-limit device would enforce. */
export function effectiveCurrentLimit(safety: SafetyParams): number | undefined {
    if (safety.min_current_mA === undefined && safety.max_current_mA === undefined) return undefined;
    return Math.max(Math.abs(safety.min_current_mA ?? 0), Math.abs(safety.max_current_mA ?? 0));
}

export function hasAsymmetricCurrentLimit(safety: SafetyParams): boolean {
    const { min_current_mA, max_current_mA } = safety;
    if (min_current_mA === undefined && max_current_mA === undefined) return false;
    if (min_current_mA === undefined || max_current_mA === undefined) return true;
    return min_current_mA !== -max_current_mA;
}

/* -------------------------------------------------------------------------- */
/* Per-step checks                                                            */
/* -------------------------------------------------------------------------- */

class Collector {
    readonly errors: ValidationError[] = [];

    add(code: ErrorCode, message: string, path: string, step_index?: number, context: Record<string, unknown> = {}): void {
        this.errors.push(new ValidationError(message, code, path, step_index, context));
    }

    addIssue(issue: StructuralIssue): void {
        this.add(issue.code, issue.message, issue.path, issue.step_index);
    }
}

function checkVoltage(out: Collector, value: number, field: string, index: number, voltage: Bounds): void {
    if (!outside(value, voltage)) return;
    out.add(
        'VOLTAGE_OUT_OF_BOUNDS',
        `Step ${index}: ${field} ${value} V is outside the safety limits ${describeBounds(voltage, 'V')}`,
        `method[${index}].${field}`,
        index,
        { value, min_voltage_V: voltage.min ?? null, max_voltage_V: voltage.max ?? null }
    );
}

function checkStep(out: Collector, step: Step, index: number, safety: SafetyParams, capacity_mAh: number | undefined, tags: ReadonlySet<string>): void {
    const voltage: Bounds = { min: safety.min_voltage_V, max: safety.max_voltage_V };
    const current: Bounds = { min: safety.min_current_mA, max: safety.max_current_mA };
    const path = `method[${index}]`;

    switch (step.step) {
        case 'tag':
        case 'open_circuit_voltage':
            return;

        case 'impedance_spectroscopy': {
            // The excitation swings both ways, so only the absolute limit applies
            const limit = effectiveCurrentLimit(safety);
            if (limit !== undefined && step.amplitude_mA !== undefined && Math.abs(step.amplitude_mA) > limit) {
                out.add(
                    'CURRENT_OUT_OF_BOUNDS',
                    `Step ${index}: amplitude ${step.amplitude_mA} mA exceeds the absolute limit ${limit} mA`,
                    `${path}.amplitude_mA`,
                    index,
                    { amplitude_mA: step.amplitude_mA, effective_limit_mA: limit }
                );
            }
            return;
        }

        case 'constant_current': {
            if (step.rate_C === undefined && step.current_mA === undefined) {
                out.add('MISSING_SETPOINT', `Step ${index}: constant current needs a non-zero rate_C or current_mA`, path, index);
            }
            if (step.until_time_s === undefined && step.until_voltage_V === undefined) {
                out.add('MISSING_TERMINATION', `Step ${index}: constant current needs until_time_s or until_voltage_V`, path, index);
            }
            if (step.until_voltage_V !== undefined) {
                checkVoltage(out, step.until_voltage_V, 'until_voltage_V', index, voltage);
            }
            const current_mA = step.rate_C !== undefined
                ? (capacity_mAh !== undefined ? step.rate_C * capacity_mAh : undefined)
                : step.current_mA;
            if (current_mA !== undefined && outside(current_mA, current)) {
                out.add(
                    'CURRENT_OUT_OF_BOUNDS',
                    `Step ${index}: current ${current_mA} mA is outside the safety limits ${describeBounds(current, 'mA')}`,
                    step.rate_C !== undefined ? `${path}.rate_C` : `${path}.current_mA`,
                    index,
                    { current_mA, min_current_mA: current.min ?? null, max_current_mA: current.max ?? null }
                );
            }
            return;
        }

        case 'constant_voltage': {
            checkVoltage(out, step.voltage_V, 'voltage_V', index, voltage);
            if (step.until_time_s === undefined && step.until_rate_C === undefined && step.until_current_mA === undefined) {
                out.add(
                    'MISSING_TERMINATION',
                    `Step ${index}: constant voltage needs until_time_s, until_rate_C or until_current_mA`,
                    path,
                    index
                );
            }
            const limit = effectiveCurrentLimit(safety);
            const until_mA = step.until_rate_C !== undefined
                ? (capacity_mAh !== undefined ? step.until_rate_C * capacity_mAh : undefined)
                : step.until_current_mA;
            if (limit !== undefined && until_mA !== undefined && Math.abs(until_mA) > limit) {
                out.add(
                    'CURRENT_OUT_OF_BOUNDS',
                    `Step ${index}: termination current ${until_mA} mA exceeds the absolute limit ${limit} mA`,
                    step.until_rate_C !== undefined ? `${path}.until_rate_C` : `${path}.until_current_mA`,
                    index,
                    { until_current_mA: until_mA, effective_limit_mA: limit }
                );
            }
            return;
        }

        case 'loop': {
            if (!Number.isInteger(step.cycle_count) || step.cycle_count <= 0) {
                out.add('INVALID_CYCLE_COUNT', `Step ${index}: cycle_count must be a positive integer`, `${path}.cycle_count`, index);
            }
            if (!tags.has(step.start_step)) {
                out.add(
                    'MISSING_TAG',
                    `Step ${index}: loop start_step '${step.start_step}' does not name a tag in the method`,
                    `${path}.start_step`,
                    index,
                    { start_step: step.start_step }
                );
            }
            return;
        }

        default: {
            const unhandled: never = step;
            out.add('UNKNOWN_STEP', `Step ${index}: unknown step ${String(Reflect.get(unhandled, 'step'))}`, path, index);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Entry point                                                                */
/* -------------------------------------------------------------------------- */

export function validate(protocol: Protocol, options: ValidateOptions = {}): ValidationResult {
    const out = new Collector();
    const capacity_mAh = options.capacity_mAh !== undefined && Number.isFinite(options.capacity_mAh) && options.capacity_mAh > 0
        ? options.capacity_mAh
        : undefined;

    const safetyIssues: StructuralIssue[] = [];
    checkSafetyParams(protocol.safety, safetyIssues);
    safetyIssues.forEach(issue => out.addIssue(issue));

    const { measurement } = protocol;
    for (const key of ['time_s', 'voltage_V', 'current_mA'] as const) {
        const value = measurement[key];
        if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
            out.add('INVALID_MEASUREMENT', `measurement.${key} must be a non-negative number`, `measurement.${key}`);
        }
    }

    if (protocol.method.length === 0) {
        out.add('EMPTY_METHOD', 'Method must contain at least one step', 'method');
    }

    const tags = new Set<string>();
    protocol.method.forEach((step, index) => {
        if (step.step !== 'tag') return;
        if (tags.has(step.tag)) {
            out.add('DUPLICATE_TAG', `Duplicate tag '${step.tag}' at step ${index}`, `method[${index}].tag`, index, { tag: step.tag });
        }
        tags.add(step.tag);
    });

    protocol.method.forEach((step, index) => checkStep(out, step, index, protocol.safety, capacity_mAh, tags));

    const advisories: StructuredError[] = [];
    if (hasAsymmetricCurrentLimit(protocol.safety)) {
        advisories.push(AdvisoryFactory.asymmetricCurrentLimit(protocol.safety.min_current_mA, protocol.safety.max_current_mA));
    }

    log.debug('Validated protocol', {
        steps: protocol.method.length,
        errors: out.errors.length,
        advisories: advisories.length,
    });

    return { ok: out.errors.length === 0, errors: out.errors, advisories };
}
