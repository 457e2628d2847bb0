import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import path from 'path';
import os from 'os';

import { serializeCanonical } from '../src/canonical';
import { CliIO, EXIT, ProtocolCompilerCLI } from '../src/cli';
import { CYCLE_METHOD, cycleProtocol } from './helpers';

class CapturingIO implements CliIO {
    readonly stdout: string[] = [];
    readonly stderr: string[] = [];
    out(line: string): void {
        this.stdout.push(line);
    }
    err(line: string): void {
        this.stderr.push(line);
    }
}

describe('ProtocolCompilerCLI', () => {
    let tmpRoot: string;
    let io: CapturingIO;
    let cli: ProtocolCompilerCLI;
    let protocolFile: string;

    const run = (...args: string[]) => cli.run(['node', 'cyclerc', ...args]);

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'protocol-cli-test-'));
        io = new CapturingIO();
        cli = new ProtocolCompilerCLI(io);
        protocolFile = path.join(tmpRoot, 'formation.json');
        fs.writeFileSync(protocolFile, serializeCanonical(cycleProtocol()));
    });

    afterEach(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    test('validate accepts a protocol', async () => {
        assert.equal(await run('validate', protocolFile, '--capacity', '45'), EXIT.OK);
        assert.deepEqual(io.stdout, ['OK: 5 step(s)']);
    });

    test('validate reports each error with its step', async () => {
        const method = CYCLE_METHOD.map(s => s.step === 'constant_voltage' ? { ...s, voltage_V: 4.6 } : s);
        fs.writeFileSync(protocolFile, serializeCanonical(cycleProtocol({ method })));
        assert.equal(await run('validate', protocolFile), EXIT.PROTOCOL_ERROR);
        assert.deepEqual(io.stderr, [
            'ERROR VOLTAGE_OUT_OF_BOUNDS (step 2): Step 2: voltage_V 4.6 V is outside the safety limits [2.5, 4.5] V',
        ]);
    });

    test('malformed files are protocol errors', async () => {
        fs.writeFileSync(protocolFile, '{');
        assert.equal(await run('validate', protocolFile), EXIT.PROTOCOL_ERROR);
        assert.ok(io.stderr[0].startsWith('ERROR SCHEMA_MISMATCH: Invalid JSON: '));
    });

    test('export prints a single artifact to stdout', async () => {
        assert.equal(await run('export', protocolFile, '--format', 'pybamm_experiment', '--capacity', '45'), EXIT.OK);
        assert.equal(io.stdout.length, 1);
        assert.deepEqual(JSON.parse(io.stdout[0]), [
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

    test('export --all writes into a directory', async () => {
        const out = path.join(tmpRoot, 'build');
        const code = await run('export', protocolFile, '--all', '--sample', 'cell-01', '--capacity', '45', '--out', out);
        assert.equal(code, EXIT.OK);
        assert.equal(io.stdout.length, 5);
        assert.equal(io.stdout[0], `[biologic_mps] wrote ${path.join(out, 'biologic_mps.mps')}`);
        assert.ok(fs.existsSync(path.join(out, 'neware_xml.xml')));
    });

    test('export passes format options through', async () => {
        const code = await run(
            'export', protocolFile,
            '--format', 'neware_xml',
            '--sample', 'cell-01',
            '--capacity', '45',
            '--created-at', '2024-01-02T03:04:05Z'
        );
        assert.equal(code, EXIT.OK);
        assert.ok(io.stdout[0].includes('date="20240102030405"'));
    });

    test('export reports failures per format', async () => {
        assert.equal(await run('export', protocolFile, '--format', 'biologic_mps', '--capacity', '45'), EXIT.PROTOCOL_ERROR);
        assert.deepEqual(io.stderr, [
            '[biologic_mps] export failed',
            'ERROR MISSING_SAMPLE_NAME: biologic_mps export needs a sample name',
        ]);
    });

    test('usage errors', async () => {
        assert.equal(await run('export', protocolFile, '--all', '--sample', 'x'), EXIT.USAGE);
        assert.deepEqual(io.stderr, ['Error: --out <directory> is required when exporting more than one format']);

        assert.equal(await run('export', protocolFile, '--format', 'csv'), EXIT.USAGE);
        assert.equal(
            io.stderr[1],
            'Error: Unknown format: csv. Valid formats: biologic_mps, neware_xml, tomato_json, pybamm_experiment, battinfo_jsonld'
        );

        const missing = path.join(tmpRoot, 'missing.json');
        assert.equal(await run('validate', missing), EXIT.USAGE);
        assert.equal(io.stderr[2], `Error: File not found: ${missing}`);

        assert.equal(await run('validate', protocolFile, '--capacity', 'lots'), EXIT.USAGE);
        assert.equal(io.stderr[3], "Error: --capacity must be a number, got 'lots'");
    });

    test('unknown commands print help', async () => {
        assert.equal(await run('frobnicate'), EXIT.USAGE);
        assert.deepEqual(io.stderr, ['Error: Unknown command: frobnicate']);
        assert.ok(io.stdout[0].includes('USAGE:'));
    });

    test('formats lists every exporter', async () => {
        assert.equal(await run('formats'), EXIT.OK);
        assert.equal(io.stdout.length, 5);
        assert.ok(io.stdout[0].startsWith('biologic_mps        cp1252  '));
    });
});
