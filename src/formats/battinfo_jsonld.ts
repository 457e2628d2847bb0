/**
 * BattINFO / EMMO JSON-LD.
 *
 * Techniques become Resting / Charging / Discharging / Hold nodes chained by
 * hasNext; loops become IterativeWorkflow nodes whose body hangs off hasTask.
 */

import { BATTINFO_CONTEXT_URL } from '../config';
import { ConvertedTaskStep } from '../rate_converter';
import { IterationNode, groupIterations } from '../sequence_resolver';
import { UnsupportedFeatureError } from '../structured_error';
import { ExportContext, ExportInput, FormatExporter, Rendered } from './types';

export interface BattinfoQuantity {
    '@type': string | string[];
    hasNumericalPart: { '@type': 'RealData'; hasNumberValue: number };
    hasMeasurementUnit: string;
}

export interface BattinfoNode {
    '@type': string;
    hasInput: BattinfoQuantity[];
    hasTask?: BattinfoNode;
    hasNext?: BattinfoNode;
    '@context'?: string[];
}

function quantity(type: string | string[], value: number, unit: string): BattinfoQuantity {
    return {
        '@type': type,
        hasNumericalPart: { '@type': 'RealData', hasNumberValue: value },
        hasMeasurementUnit: unit,
    };
}

const duration = (seconds: number): BattinfoQuantity => quantity('Duration', seconds, 'Second');

function technique(step: ConvertedTaskStep, index: number): BattinfoNode {
    switch (step.step) {
        case 'open_circuit_voltage':
            return { '@type': 'Resting', hasInput: [duration(step.until_time_s)] };

        case 'constant_current': {
            const charging = step.current_mA > 0;
            const inputs = [quantity('ElectricCurrent', Math.abs(step.current_mA), 'MilliAmpere')];
            if (step.rate_C !== undefined) inputs.push(quantity('CRate', Math.abs(step.rate_C), 'CRateUnit'));
            if (step.until_voltage_V !== undefined) {
                inputs.push(quantity(
                    [charging ? 'UpperVoltageLimit' : 'LowerVoltageLimit', 'TerminationQuantity'],
                    step.until_voltage_V,
                    'Volt'
                ));
            }
            if (step.until_time_s !== undefined) inputs.push(duration(step.until_time_s));
            return { '@type': charging ? 'Charging' : 'Discharging', hasInput: inputs };
        }

        case 'constant_voltage': {
            const inputs = [quantity('Voltage', step.voltage_V, 'Volt')];
            if (step.until_current_mA !== undefined) {
                inputs.push(quantity(['LowerCurrentLimit', 'TerminationQuantity'], Math.abs(step.until_current_mA), 'MilliAmpere'));
            }
            if (step.until_rate_C !== undefined) {
                inputs.push(quantity(['LowerCRateLimit', 'TerminationQuantity'], Math.abs(step.until_rate_C), 'CRateUnit'));
            }
            if (step.until_time_s !== undefined) inputs.push(duration(step.until_time_s));
            return { '@type': 'Hold', hasInput: inputs };
        }

        case 'impedance_spectroscopy':
            throw new UnsupportedFeatureError(
                `Step ${index}: BattINFO export does not support impedance spectroscopy`,
                index,
                { format: 'battinfo_jsonld', step: step.step }
            );
    }
}

function build(nodes: readonly IterationNode<ConvertedTaskStep>[]): BattinfoNode {
    const [first, ...rest] = nodes;
    const node: BattinfoNode = first.kind === 'task'
        ? technique(first.task.step, first.task.index)
        : {
            '@type': 'IterativeWorkflow',
            hasInput: [quantity('NumberOfIterations', first.loop.step.cycle_count, 'UnitOne')],
            hasTask: build(first.children),
        };
    if (rest.length > 0) node.hasNext = build(rest);
    return node;
}

function render(input: ExportInput, ctx: ExportContext): Rendered<BattinfoNode> {
    const root = build(groupIterations(input.sequence));
    if (ctx.options?.battinfo?.include_context) root['@context'] = [BATTINFO_CONTEXT_URL];
    return { artifact: root, advisories: [] };
}

export const battinfoJsonld: FormatExporter<'battinfo_jsonld'> = {
    format: 'battinfo_jsonld',
    description: 'BattINFO / EMMO JSON-LD (.jsonld)',
    extension: '.jsonld',
    encoding: 'utf-8',
    requires_sample_name: false,
    render,
    serialize: doc => JSON.stringify(doc, null, 4),
};
