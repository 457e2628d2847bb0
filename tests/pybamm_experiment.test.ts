import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { flattenPybammExperiment, pybammExperiment } from '../src/formats/pybamm_experiment';
import { Protocol } from '../src/protocol_model';
import { EncodingError, UnsupportedFeatureError } from '../src/structured_error';
import { cycleProtocol, exportInput, simpleProtocol } from './helpers';

function experiment(protocol: Protocol, capacity?: number) {
    return pybammExperiment.render(exportInput(protocol, capacity), { sample_name: '' }).artifact;
}

describe('PyBaMM experiment export', () => {
    test('writes loops as repeat blocks', () => {
        assert.deepEqual(experiment(cycleProtocol(), 45), [
            {
                repeat: 100,
                steps: [
                    'Charge at 0.5C for 3 hours until 4.2 V',
                    'Hold at 4.2 V for 1 hours until 0.05C',
                    'Discharge at 0.5C for 3 hours until 3.5 V',
                ],
            },
        ]);
    });

    test('flattens to the executed step count', () => {
        const flat = flattenPybammExperiment(experiment(cycleProtocol(), 45));
        assert.equal(flat.length, 300);
        assert.equal(flat[3], 'Charge at 0.5C for 3 hours until 4.2 V');
    });

    test('a loop after a rest repeats the rest', () => {
        const p = simpleProtocol([
            { step: 'tag', tag: 'A' },
            { step: 'open_circuit_voltage', until_time_s: 600 },
            { step: 'loop', start_step: 'A', cycle_count: 123 },
        ]);
        const flat = flattenPybammExperiment(experiment(p));
        assert.equal(flat.length, 123);
        assert.ok(flat.every(s => s === 'Rest for 600 seconds'));
    });

    test('nested loops multiply', () => {
        const p = simpleProtocol([
            { step: 'tag', tag: 'outer' },
            { step: 'tag', tag: 'inner' },
            { step: 'open_circuit_voltage', until_time_s: 90 },
            { step: 'loop', start_step: 'inner', cycle_count: 12 },
            { step: 'loop', start_step: 'outer', cycle_count: 34 },
        ]);
        const exp = experiment(p);
        assert.deepEqual(exp, [{ repeat: 34, steps: [{ repeat: 12, steps: ['Rest for 90 seconds'] }] }]);
        assert.equal(flattenPybammExperiment(exp).length, 408);
    });

    test('describes absolute currents in mA', () => {
        const p = simpleProtocol([
            { step: 'constant_current', current_mA: -2, until_time_s: 45 },
            { step: 'constant_voltage', voltage_V: 4, until_current_mA: 0.5 },
        ]);
        assert.deepEqual(experiment(p), ['Discharge at 2 mA for 45 seconds', 'Hold at 4 V until 0.5 mA']);
    });

    test('a hold of odd seconds is one of the alternatives', () => {
        const p = simpleProtocol([
            { step: 'constant_voltage', voltage_V: 4, until_time_s: 90, until_rate_C: 0.05 },
            { step: 'constant_voltage', voltage_V: 4, until_time_s: 120, until_rate_C: 0.05 },
            { step: 'constant_voltage', voltage_V: 4, until_time_s: 90 },
        ]);
        assert.deepEqual(experiment(p, 10), [
            'Hold at 4 V for 90 seconds or until 0.05C',
            'Hold at 4 V for 2 minutes until 0.05C',
            'Hold at 4 V for 90 seconds',
        ]);
    });

    test('rests are always written in seconds', () => {
        const p = simpleProtocol([
            { step: 'open_circuit_voltage', until_time_s: 3600 },
            { step: 'constant_current', current_mA: 1, until_time_s: 3600 },
        ]);
        assert.deepEqual(experiment(p), ['Rest for 3600 seconds', 'Charge at 1 mA for 1 hours']);
    });

    test('flattening stops at the step limit', () => {
        assert.throws(
            () => flattenPybammExperiment([{ repeat: 5, steps: ['Rest for 1 seconds'] }], 3),
            (e: unknown) => e instanceof EncodingError && e.code === 'TOO_MANY_STEPS'
        );
    });

    test('does not support impedance spectroscopy', () => {
        const p = simpleProtocol([{ step: 'impedance_spectroscopy', amplitude_V: 0.01, start_frequency_Hz: 1e3, end_frequency_Hz: 1 }]);
        assert.throws(() => experiment(p), UnsupportedFeatureError);
    });
});
