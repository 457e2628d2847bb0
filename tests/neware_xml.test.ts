import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { deterministicGuid, formatDate, newareXml } from '../src/formats/neware_xml';
import { ExportContext } from '../src/formats/types';
import { Protocol } from '../src/protocol_model';
import { EncodingError, UnsupportedFeatureError } from '../src/structured_error';
import { cycleProtocol, exportInput, simpleProtocol } from './helpers';

const ctx: ExportContext = {
    sample_name: 'cell-01',
    capacity_mAh: 45,
    options: { neware: { created_at: '2024-01-02T03:04:05Z' } },
};

function renderText(protocol: Protocol, capacity?: number, context: ExportContext = ctx): string {
    return newareXml.serialize(newareXml.render(exportInput(protocol, capacity), context).artifact);
}

function lines(text: string): string[] {
    return text.split('\n');
}

function block(text: string, first: string, count: number): string[] {
    const all = lines(text);
    const start = all.indexOf(first);
    assert.ok(start >= 0, first);
    return all.slice(start, start + count);
}

describe('Neware .xml export', () => {
    test('writes the prolog and header', () => {
        const text = renderText(cycleProtocol(), 45);
        const all = lines(text);
        assert.equal(all[0], '<?xml version="1.0" ?>');
        assert.equal(all[1], '<root>');
        assert.match(
            all[2],
            /^ {2}<config type="Step File" version="17" client_version="BTS Client 8\.0\.0\.478\(2024\.06\.24\)\(R3\)" date="20240102030405" Guid="[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}">$/
        );
        assert.deepEqual(all.slice(3, 12), [
            '    <Head_Info>',
            '      <Operate Value="66"/>',
            '      <Scale Value="1"/>',
            '      <Start_Step Value="1" Hide_Ctrl_Step="0"/>',
            '      <Creator Value="cycling-protocol-compiler"/>',
            '      <Remark Value="cell-01"/>',
            '      <RateType Value="103"/>',
            '      <MultCap Value="162000.000000"/>',
            '    </Head_Info>',
        ]);
        assert.ok(text.endsWith('</root>\n'));
    });

    test('writes protection and record limits in device units', () => {
        const text = renderText(cycleProtocol(), 45);
        assert.deepEqual(block(text, '      <Protect>', 15), [
            '      <Protect>',
            '        <Main>',
            '          <Volt>',
            '            <Upper Value="45000.000000"/>',
            '            <Lower Value="25000.000000"/>',
            '          </Volt>',
            '          <Curr>',
            '            <Upper Value="50.000000"/>',
            '            <Lower Value="-50.000000"/>',
            '          </Curr>',
            '          <Delay_Time Value="100.000000"/>',
            '          <Cap/>',
            '        </Main>',
            '      </Protect>',
            '      <Record>',
        ]);
        assert.deepEqual(block(text, '      <Record>', 7), [
            '      <Record>',
            '        <Main>',
            '          <Time Value="10000.000000"/>',
            '          <Volt Value="100.000000"/>',
            '          <Curr Value="0.050000"/>',
            '        </Main>',
            '      </Record>',
        ]);
    });

    test('writes charge, hold, discharge and loop steps', () => {
        const text = renderText(cycleProtocol(), 45);
        assert.ok(lines(text).includes('    <Step_Info Num="5">'));
        assert.deepEqual(block(text, '      <Step1 Step_ID="1" Step_Type="1">', 10), [
            '      <Step1 Step_ID="1" Step_Type="1">',
            '        <Limit>',
            '          <Main>',
            '            <Rate Value="0.500000"/>',
            '            <Curr Value="22.500000"/>',
            '            <Time Value="10800000.000000"/>',
            '            <Stop_Volt Value="42000.000000"/>',
            '          </Main>',
            '        </Limit>',
            '      </Step1>',
        ]);
        assert.deepEqual(block(text, '      <Step2 Step_ID="2" Step_Type="3">', 10), [
            '      <Step2 Step_ID="2" Step_Type="3">',
            '        <Limit>',
            '          <Main>',
            '            <Volt Value="42000.000000"/>',
            '            <Time Value="3600000.000000"/>',
            '            <Stop_Rate Value="0.050000"/>',
            '            <Stop_Curr Value="2.250000"/>',
            '            <Rate Value="0.500000"/>',
            '            <Curr Value="22.500000"/>',
            '          </Main>',
        ]);
        assert.deepEqual(block(text, '      <Step3 Step_ID="3" Step_Type="2">', 7).slice(3), [
            '            <Rate Value="0.500000"/>',
            '            <Curr Value="22.500000"/>',
            '            <Time Value="10800000.000000"/>',
            '            <Stop_Volt Value="35000.000000"/>',
        ]);
        assert.deepEqual(block(text, '      <Step4 Step_ID="4" Step_Type="5">', 8), [
            '      <Step4 Step_ID="4" Step_Type="5">',
            '        <Limit>',
            '          <Other>',
            '            <Start_Step Value="1"/>',
            '            <Cycle_Count Value="100"/>',
            '          </Other>',
            '        </Limit>',
            '      </Step4>',
        ]);
        assert.ok(lines(text).includes('      <Step5 Step_ID="5" Step_Type="6"/>'));
    });

    test('rest steps', () => {
        const text = renderText(simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 600 }]));
        assert.deepEqual(block(text, '      <Step1 Step_ID="1" Step_Type="4">', 4).slice(3), [
            '            <Time Value="600000.000000"/>',
        ]);
    });

    test('discharging holds use their own step type', () => {
        const text = renderText(simpleProtocol([{ step: 'constant_voltage', voltage_V: 3, until_current_mA: -1 }]));
        assert.ok(lines(text).includes('      <Step1 Step_ID="1" Step_Type="19">'));
        assert.ok(lines(text).includes('            <Stop_Curr Value="1.000000"/>'));
    });

    test('omits the date unless one is given and keeps the Guid stable', () => {
        const p = cycleProtocol();
        const context: ExportContext = { sample_name: 'cell-01', capacity_mAh: 45 };
        const first = renderText(p, 45, context);
        assert.equal(renderText(p, 45, context), first);
        assert.ok(!lines(first)[2].includes('date='));

        const input = exportInput(p, 45);
        assert.equal(deterministicGuid(input, context), deterministicGuid(exportInput(p, 45), context));
        assert.notEqual(deterministicGuid(input, context), deterministicGuid(input, { sample_name: 'cell-02' }));
    });

    test('escapes attribute values', () => {
        const text = renderText(cycleProtocol(), 45, { sample_name: 'A&B "x" <1>' });
        assert.ok(lines(text).includes('      <Remark Value="A&amp;B &quot;x&quot; &lt;1&gt;"/>'));
    });

    test('keeps whitespace controls as character references', () => {
        const text = renderText(cycleProtocol(), 45, { ...ctx, sample_name: 'cell\t01\r\nrun 2' });
        assert.ok(lines(text).includes('      <Remark Value="cell&#9;01&#13;&#10;run 2"/>'));
    });

    test('rejects other control characters', () => {
        assert.throws(() => renderText(cycleProtocol(), 45, { ...ctx, sample_name: 'cell\u000701' }), (e: unknown) => {
            assert.ok(e instanceof EncodingError);
            assert.equal(e.code, 'UNENCODABLE_CHARACTER');
            assert.equal(e.message, 'Control character U+0007 at offset 4 cannot appear in XML');
            return true;
        });
    });

    test('formats dates in UTC', () => {
        assert.equal(formatDate(new Date(Date.UTC(2023, 11, 31, 23, 59, 58))), '20231231235958');
        assert.equal(formatDate('20240102030405'), '20240102030405');
        assert.throws(() => formatDate('yesterday'), EncodingError);
    });

    test('does not support impedance spectroscopy', () => {
        const p = simpleProtocol([
            { step: 'open_circuit_voltage', until_time_s: 60 },
            { step: 'impedance_spectroscopy', amplitude_V: 0.01, start_frequency_Hz: 1e4, end_frequency_Hz: 1 },
        ]);
        assert.throws(() => renderText(p), (e: unknown) => {
            assert.ok(e instanceof UnsupportedFeatureError);
            assert.equal(e.code, 'UNSUPPORTED_STEP');
            assert.equal(e.step_index, 1);
            return true;
        });
    });
});
