/**
 * PyBaMM experiment: one instruction string per step, loops as repeat blocks.
 */

import { MAX_UNROLLED_STEPS } from '../config';
import { ConvertedTaskStep } from '../rate_converter';
import { IterationNode, groupIterations } from '../sequence_resolver';
import { EncodingError, UnsupportedFeatureError } from '../structured_error';
import { ExportInput, FormatExporter, Rendered } from './types';

export interface PybammRepeat {
    repeat: number;
    steps: PybammStep[];
}

export type PybammStep = string | PybammRepeat;

export type PybammExperiment = PybammStep[];

/** Whole hours or minutes; undefined when the duration only reads in seconds. */
function wholeDuration(seconds: number): string | undefined {
    if (seconds % 3600 === 0) return `${seconds / 3600} hours`;
    if (seconds % 60 === 0) return `${seconds / 60} minutes`;
    return undefined;
}

export function describeStep(step: ConvertedTaskStep, index: number): string {
    switch (step.step) {
        case 'open_circuit_voltage':
            return `Rest for ${step.until_time_s} seconds`;

        case 'constant_current': {
            const charging = step.current_mA > 0;
            let text = step.rate_C !== undefined
                ? `${charging ? 'Charge' : 'Discharge'} at ${Math.abs(step.rate_C)}C`
                : `${charging ? 'Charge' : 'Discharge'} at ${Math.abs(step.current_mA)} mA`;
            if (step.until_time_s !== undefined) {
                text += ` for ${wholeDuration(step.until_time_s) ?? `${step.until_time_s} seconds`}`;
            }
            if (step.until_voltage_V !== undefined) text += ` until ${step.until_voltage_V} V`;
            return text;
        }

        case 'constant_voltage': {
            // A whole-hour or whole-minute hold reads as a duration; anything else is one of the alternatives.
            let text = `Hold at ${step.voltage_V} V`;
            const conditions: string[] = [];
            if (step.until_time_s !== undefined) {
                const whole = wholeDuration(step.until_time_s);
                if (whole) text += ` for ${whole}`;
                else conditions.push(`for ${step.until_time_s} seconds`);
            }
            if (step.until_rate_C !== undefined) conditions.push(`until ${step.until_rate_C}C`);
            else if (step.until_current_mA !== undefined) conditions.push(`until ${step.until_current_mA} mA`);
            if (conditions.length > 0) text += ` ${conditions.join(' or ')}`;
            return text;
        }

        case 'impedance_spectroscopy':
            throw new UnsupportedFeatureError(
                `Step ${index}: PyBaMM experiments do not support impedance spectroscopy`,
                index,
                { format: 'pybamm_experiment', step: step.step }
            );
    }
}

function toPybamm(nodes: readonly IterationNode<ConvertedTaskStep>[]): PybammStep[] {
    return nodes.map((node): PybammStep => node.kind === 'task'
        ? describeStep(node.task.step, node.task.index)
        : { repeat: node.loop.step.cycle_count, steps: toPybamm(node.children) });
}

/** Expands repeat blocks into a flat list of instructions. */
export function flattenPybammExperiment(experiment: readonly PybammStep[], maxSteps = MAX_UNROLLED_STEPS): string[] {
    const out: string[] = [];
    const expand = (steps: readonly PybammStep[]): void => {
        for (const step of steps) {
            if (typeof step === 'string') {
                out.push(step);
                if (out.length > maxSteps) {
                    throw new EncodingError(`Flattened experiment exceeds ${maxSteps} steps`, 'TOO_MANY_STEPS', undefined, {
                        max_steps: maxSteps,
                    });
                }
            } else {
                for (let i = 0; i < step.repeat; i++) expand(step.steps);
            }
        }
    };
    expand(experiment);
    return out;
}

function render(input: ExportInput): Rendered<PybammExperiment> {
    return { artifact: toPybamm(groupIterations(input.sequence)), advisories: [] };
}

export const pybammExperiment: FormatExporter<'pybamm_experiment'> = {
    format: 'pybamm_experiment',
    description: 'PyBaMM experiment steps (.json)',
    extension: '.json',
    encoding: 'utf-8',
    requires_sample_name: false,
    render,
    serialize: experiment => JSON.stringify(experiment, null, 4),
};
