import { fingerprint } from '../src/canonical';
import { ExportInput } from '../src/formats/types';
import { Protocol, ProtocolInit, StepInit, createProtocol } from '../src/protocol_model';
import { convert } from '../src/rate_converter';
import { resolve } from '../src/sequence_resolver';

/** Formation-style cycle: charge, hold, discharge, repeated 100 times. */
export const CYCLE_METHOD: StepInit[] = [
    { step: 'tag', tag: 'cycle' },
    { step: 'constant_current', rate_C: 0.5, until_time_s: 10800, until_voltage_V: 4.2 },
    { step: 'constant_voltage', voltage_V: 4.2, until_time_s: 3600, until_rate_C: 0.05 },
    { step: 'constant_current', rate_C: -0.5, until_time_s: 10800, until_voltage_V: 3.5 },
    { step: 'loop', start_step: 'cycle', cycle_count: 100 },
];

export function cycleProtocol(overrides: Partial<ProtocolInit> = {}): Protocol {
    return createProtocol({
        measurement: { time_s: 10, voltage_V: 0.01, current_mA: 0.05 },
        safety: {
            max_voltage_V: 4.5,
            min_voltage_V: 2.5,
            max_current_mA: 50,
            min_current_mA: -50,
            delay_s: 0.1,
        },
        method: CYCLE_METHOD,
        ...overrides,
    });
}

export function simpleProtocol(method: StepInit[], safety: ProtocolInit['safety'] = {}): Protocol {
    return createProtocol({ measurement: { time_s: 10 }, safety, method });
}

export function exportInput(protocol: Protocol, capacity_mAh?: number): ExportInput {
    return { sequence: convert(resolve(protocol), capacity_mAh), fingerprint: fingerprint(protocol) };
}
