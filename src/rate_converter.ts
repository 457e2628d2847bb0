/**
 * Rate Converter
 *
 * Rewrites C-rate quantities to absolute currents for a given sample
 * capacity: current_mA = rate_C * capacity_mAh, sign preserved. The original
 * rate is kept beside the converted current for formats that annotate it.
 */

import {
    ConstantCurrentStep,
    ConstantVoltageStep,
    ImpedanceSpectroscopyStep,
    OpenCircuitVoltageStep,
} from './protocol_model';
import { ResolvedSequence, ResolvedStep, Sequence } from './sequence_resolver';
import { MissingCapacityError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ConvertedConstantCurrent extends Omit<ConstantCurrentStep, 'current_mA'> {
    readonly current_mA: number;
}

export interface ConvertedConstantVoltage extends Omit<ConstantVoltageStep, 'until_current_mA'> {
    readonly until_current_mA?: number;
}

export type ConvertedTaskStep =
    | OpenCircuitVoltageStep
    | ConvertedConstantCurrent
    | ConvertedConstantVoltage
    | ImpedanceSpectroscopyStep;

export type ConvertedStep = ResolvedStep<ConvertedTaskStep>;

export interface ConvertedSequence extends Sequence<ConvertedTaskStep> {
    readonly capacity_mAh?: number;
}

/* -------------------------------------------------------------------------- */
/* Conversion                                                                 */
/* -------------------------------------------------------------------------- */

export function isUsableCapacity(capacity_mAh: number | undefined): capacity_mAh is number {
    return capacity_mAh !== undefined && Number.isFinite(capacity_mAh) && capacity_mAh > 0;
}

/** Method index of the first step that needs a capacity, if any. */
export function firstRateStep(sequence: ResolvedSequence): number | undefined {
    for (const s of sequence.steps) {
        if (s.kind !== 'task') continue;
        if (s.step.step === 'constant_current' && s.step.rate_C !== undefined) return s.index;
        if (s.step.step === 'constant_voltage' && s.step.until_rate_C !== undefined) return s.index;
    }
    return undefined;
}

export function convert(sequence: ResolvedSequence, capacity_mAh?: number): ConvertedSequence {
    const needed = firstRateStep(sequence);
    if (needed !== undefined && !isUsableCapacity(capacity_mAh)) {
        throw new MissingCapacityError(needed, capacity_mAh);
    }
    const capacity = isUsableCapacity(capacity_mAh) ? capacity_mAh : undefined;

    const steps = sequence.steps.map((s): ConvertedStep => {
        if (s.kind === 'loop') return s;
        const step = s.step;
        switch (step.step) {
            case 'constant_current': {
                const current_mA = step.rate_C !== undefined && capacity !== undefined
                    ? step.rate_C * capacity
                    : step.current_mA;
                if (current_mA === undefined) throw new MissingCapacityError(s.index, capacity_mAh);
                return { ...s, step: Object.freeze({ ...step, current_mA }) };
            }
            case 'constant_voltage': {
                const until_current_mA = step.until_rate_C !== undefined && capacity !== undefined
                    ? step.until_rate_C * capacity
                    : step.until_current_mA;
                const converted: ConvertedConstantVoltage = until_current_mA === undefined
                    ? step
                    : { ...step, until_current_mA };
                return { ...s, step: Object.freeze(converted) };
            }
            case 'open_circuit_voltage':
            case 'impedance_spectroscopy':
                return { ...s, step };
        }
    });

    return capacity === undefined
        ? { protocol: sequence.protocol, steps, labels: sequence.labels }
        : { protocol: sequence.protocol, steps, labels: sequence.labels, capacity_mAh: capacity };
}
