import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { biologicMps } from '../src/formats/biologic_mps';
import { ExportContext } from '../src/formats/types';
import { Protocol, StepInit } from '../src/protocol_model';
import { EncodingError } from '../src/structured_error';
import { cycleProtocol, exportInput, simpleProtocol } from './helpers';

const ctx: ExportContext = { sample_name: 'cell-01', capacity_mAh: 45 };

function renderText(protocol: Protocol, capacity?: number, context: ExportContext = ctx): string {
    const { artifact } = biologicMps.render(exportInput(protocol, capacity), context);
    return biologicMps.serialize(artifact);
}

/** Values of one parameter row, one per step. */
function row(text: string, key: string): string[] {
    const line = text.split('\n').find(l => l.startsWith(key.padEnd(20)));
    assert.ok(line !== undefined, `row ${key}`);
    const values: string[] = [];
    for (let i = 20; i < line.length; i += 20) values.push(line.slice(i, i + 20).trim());
    return values;
}

function renderError(method: StepInit[]): EncodingError {
    try {
        renderText(simpleProtocol(method));
    } catch (e) {
        if (e instanceof EncodingError) return e;
        throw e;
    }
    assert.fail('expected an EncodingError');
}

describe('Biologic .mps export', () => {
    test('writes the settings header', () => {
        const lines = renderText(cycleProtocol(), 45).split('\n');
        assert.deepEqual(lines.slice(0, 20), [
            'EC-LAB SETTING FILE',
            '',
            'Number of linked techniques : 1',
            'Device : MPG-2',
            'CE vs. WE compliance from -10 V to 10 V',
            'Electrode connection : standard',
            'Potential control : Ewe',
            'Ewe ctrl range : min = 0.00 V, max = 5.00 V',
            'Safety Limits :',
            '\tEwe min = 2.50000 V',
            '\tEwe max = 4.50000 V',
            '\t|I| = 50.00000 mA',
            '\tfor t > 100.0 ms',
            '\tDo not start on E overload',
            'Comments : cell-01',
            'Cycle Definition : Charge/Discharge alternance',
            'Do not turn to OCV between techniques',
            '',
            'Technique : 1',
            'Modulo Bat',
        ]);
    });

    test('writes one column per executable step', () => {
        const text = renderText(cycleProtocol(), 45);
        assert.deepEqual(row(text, 'Ns'), ['0', '1', '2', '3']);
        assert.deepEqual(row(text, 'ctrl_type'), ['CC', 'CV', 'CC', 'Loop']);
        assert.deepEqual(row(text, 'ctrl1_val'), ['22.500', '4.200', '-22.500', '']);
        assert.deepEqual(row(text, 'ctrl1_val_unit'), ['mA', 'V', 'mA', '']);
        assert.deepEqual(row(text, 'lim_nb'), ['2', '2', '2', '0']);
        assert.deepEqual(row(text, 'lim1_value'), ['10800.000', '3600.000', '10800.000', '0.000']);
        assert.deepEqual(row(text, 'lim2_type'), ['Ewe', '|I|', 'Ewe', '']);
        assert.deepEqual(row(text, 'lim2_comp'), ['>', '<', '<', '']);
        assert.deepEqual(row(text, 'lim2_value'), ['4.200', '2.250', '3.500', '']);
        assert.deepEqual(row(text, 'lim1_seq'), ['1', '2', '3', '4']);
        assert.deepEqual(row(text, 'rec2_type'), ['Ewe', 'I', 'Ewe', '']);
        assert.deepEqual(row(text, 'rec2_value'), ['0.010', '0.050', '0.010', '']);
        assert.deepEqual(row(text, 'I Range'), ['100 mA', '100 mA', '100 mA', 'Auto']);
    });

    test('repeats count - 1 times back to the loop start', () => {
        const text = renderText(cycleProtocol(), 45);
        assert.deepEqual(row(text, 'ctrl_seq'), ['0', '0', '0', '0']);
        assert.deepEqual(row(text, 'ctrl_repeat'), ['0', '0', '0', '99']);
    });

    test('ends with a newline after the last row', () => {
        const text = renderText(cycleProtocol(), 45);
        assert.ok(text.endsWith('\n'));
        const lines = text.split('\n');
        assert.ok(lines[lines.length - 2].startsWith('Bandwidth'));
    });

    test('writes a zero delay only when one is set', () => {
        const unset = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }], { max_voltage_V: 4.5 });
        const zero = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }], { max_voltage_V: 4.5, delay_s: 0 });
        const odd = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }], { max_voltage_V: 4.5, delay_s: 0.123 });
        assert.equal(biologicMps.render(exportInput(unset), ctx).artifact.header[10], '\tfor t > 0 ms');
        assert.equal(biologicMps.render(exportInput(zero), ctx).artifact.header[10], '\tfor t > 0.0 ms');
        assert.equal(biologicMps.render(exportInput(odd), ctx).artifact.header[10], '\tfor t > 123.0 ms');
    });

    test('is deterministic', () => {
        assert.equal(renderText(cycleProtocol(), 45), renderText(cycleProtocol(), 45));
    });

    test('writes the larger current limit and advises when they differ', () => {
        const p = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }], { min_current_mA: -5, max_current_mA: 10 });
        const { artifact, advisories } = biologicMps.render(exportInput(p), ctx);
        assert.deepEqual(artifact.header.slice(9, 12), ['\t|I| = 10.00000 mA', '\tfor t > 0 ms', '\tDo not start on E overload']);
        assert.deepEqual(advisories.map(a => a.code), ['ASYMMETRIC_CURRENT_LIMIT']);
    });

    test('rest steps', () => {
        const text = renderText(simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }]));
        assert.deepEqual(row(text, 'ctrl_type'), ['Rest']);
        assert.deepEqual(row(text, 'lim1_value'), ['600.000']);
        assert.deepEqual(row(text, 'rec1_value'), ['10.000']);
        assert.deepEqual(row(text, 'I Range'), ['Auto']);
    });

    test('small currents use microamps and the smallest range', () => {
        const text = renderText(simpleProtocol([{ step: 'constant_current', current_mA: 0.5, until_time_s: 60 }]));
        assert.deepEqual(row(text, 'ctrl1_val'), ['500.000']);
        assert.deepEqual(row(text, 'ctrl1_val_unit'), ['uA']);
        assert.deepEqual(row(text, 'I Range'), ['1 mA']);
    });

    test('impedance steps', () => {
        const text = renderText(simpleProtocol([
            { step: 'impedance_spectroscopy', amplitude_V: 0.01, start_frequency_Hz: 1e5, end_frequency_Hz: 0.1 },
            { step: 'impedance_spectroscopy', amplitude_mA: 0.4, start_frequency_Hz: 100, end_frequency_Hz: 1, drift_correction: true },
        ]));
        assert.deepEqual(row(text, 'ctrl_type'), ['PEIS', 'GEIS']);
        assert.deepEqual(row(text, 'ctrl1_val'), ['10.000', '400.000']);
        assert.deepEqual(row(text, 'ctrl1_val_unit'), ['mV', 'uA']);
        assert.deepEqual(row(text, 'ctrl2_val'), ['100.000', '100.000']);
        assert.deepEqual(row(text, 'ctrl2_val_unit'), ['kHz', 'Hz']);
        assert.deepEqual(row(text, 'ctrl3_val'), ['100.000', '1.000']);
        assert.deepEqual(row(text, 'ctrl3_val_unit'), ['mHz', 'Hz']);
        assert.deepEqual(row(text, 'ctrl_Nd'), ['10', '10']);
        assert.deepEqual(row(text, 'ctrl_corr'), ['0', '1']);
        assert.deepEqual(row(text, 'I Range'), ['Auto', '1 mA']);
    });

    test('rejects currents above the largest constant-current range', () => {
        const e = renderError([{ step: 'constant_current', current_mA: 150, until_time_s: 60 }]);
        assert.equal(e.code, 'CURRENT_RANGE_UNSUPPORTED');
        assert.equal(e.step_index, 0);
    });

    test('a current range may only change after a rest', () => {
        const e = renderError([
            { step: 'constant_current', current_mA: 5, until_time_s: 60 },
            { step: 'constant_current', current_mA: 50, until_time_s: 60 },
        ]);
        assert.equal(e.code, 'RANGE_CHANGE_NOT_AFTER_OCV');
        assert.equal(e.step_index, 1);
        assert.equal(
            e.message,
            'Step 1: current range changes from 10 mA to 100 mA; a range change must directly follow an open circuit voltage step'
        );

        assert.doesNotThrow(() => renderText(simpleProtocol([
            { step: 'constant_current', current_mA: 5, until_time_s: 60 },
            { step: 'open_circuit_voltage', until_time_s: 60 },
            { step: 'constant_current', current_mA: 50, until_time_s: 60 },
        ])));
    });

    test('checks the range change when a loop wraps around', () => {
        const e = renderError([
            { step: 'tag', tag: 'a' },
            { step: 'constant_current', current_mA: 5, until_time_s: 60 },
            { step: 'open_circuit_voltage', until_time_s: 60 },
            { step: 'constant_current', current_mA: 50, until_time_s: 60 },
            { step: 'loop', start_step: 'a', cycle_count: 2 },
        ]);
        assert.equal(e.code, 'RANGE_CHANGE_NOT_AFTER_OCV');
        assert.equal(e.step_index, 1);
    });

    test('checks voltages against the control range', () => {
        const method: StepInit[] = [{ step: 'constant_voltage', voltage_V: 5.5, until_time_s: 60 }];
        assert.equal(renderError(method).code, 'VOLTAGE_OUT_OF_RANGE');

        const text = renderText(simpleProtocol(method), undefined, {
            sample_name: 'cell-01',
            options: { biologic: { voltage_range_V: [0, 6] } },
        });
        assert.deepEqual(row(text, 'E range max (V)'), ['6.000']);
    });

    test('rejects an inverted control range', () => {
        const p = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 60 }]);
        assert.throws(
            () => renderText(p, undefined, { sample_name: 'x', options: { biologic: { voltage_range_V: [5, 0] } } }),
            (e: unknown) => e instanceof EncodingError && e.code === 'INVALID_VOLTAGE_RANGE'
        );
    });

    test('advises on a range wider than the compliance', () => {
        const p = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 60 }]);
        const { artifact, advisories } = biologicMps.render(exportInput(p), {
            sample_name: 'x',
            options: { biologic: { voltage_range_V: [-12, 12] } },
        });
        assert.equal(artifact.header[7], 'Ewe ctrl range : min = -12.00 V, max = 12.00 V');
        assert.deepEqual(advisories.map(a => a.code), ['WIDE_VOLTAGE_RANGE']);
    });
});
