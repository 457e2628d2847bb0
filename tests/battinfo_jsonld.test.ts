import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { battinfoJsonld } from '../src/formats/battinfo_jsonld';
import { cycleProtocol, exportInput, simpleProtocol } from './helpers';

function q(type: string | string[], value: number, unit: string) {
    return { '@type': type, hasNumericalPart: { '@type': 'RealData', hasNumberValue: value }, hasMeasurementUnit: unit };
}

describe('BattINFO JSON-LD export', () => {
    test('nests loop bodies under an iterative workflow', () => {
        const { artifact } = battinfoJsonld.render(exportInput(cycleProtocol(), 45), { sample_name: '' });
        assert.deepEqual(artifact, {
            '@type': 'IterativeWorkflow',
            hasInput: [q('NumberOfIterations', 100, 'UnitOne')],
            hasTask: {
                '@type': 'Charging',
                hasInput: [
                    q('ElectricCurrent', 22.5, 'MilliAmpere'),
                    q('CRate', 0.5, 'CRateUnit'),
                    q(['UpperVoltageLimit', 'TerminationQuantity'], 4.2, 'Volt'),
                    q('Duration', 10800, 'Second'),
                ],
                hasNext: {
                    '@type': 'Hold',
                    hasInput: [
                        q('Voltage', 4.2, 'Volt'),
                        q(['LowerCurrentLimit', 'TerminationQuantity'], 2.25, 'MilliAmpere'),
                        q(['LowerCRateLimit', 'TerminationQuantity'], 0.05, 'CRateUnit'),
                        q('Duration', 3600, 'Second'),
                    ],
                    hasNext: {
                        '@type': 'Discharging',
                        hasInput: [
                            q('ElectricCurrent', 22.5, 'MilliAmpere'),
                            q('CRate', 0.5, 'CRateUnit'),
                            q(['LowerVoltageLimit', 'TerminationQuantity'], 3.5, 'Volt'),
                            q('Duration', 10800, 'Second'),
                        ],
                    },
                },
            },
        });
    });

    test('chains sequential steps with hasNext', () => {
        const p = simpleProtocol([
            { step: 'open_circuit_voltage', until_time_s: 60 },
            { step: 'constant_current', current_mA: 1, until_time_s: 30 },
        ]);
        const { artifact } = battinfoJsonld.render(exportInput(p), { sample_name: '' });
        assert.deepEqual(artifact, {
            '@type': 'Resting',
            hasInput: [q('Duration', 60, 'Second')],
            hasNext: {
                '@type': 'Charging',
                hasInput: [q('ElectricCurrent', 1, 'MilliAmpere'), q('Duration', 30, 'Second')],
            },
        });
    });

    test('adds the context on request', () => {
        const p = simpleProtocol([{ step: 'open_circuit_voltage', until_time_s: 60 }]);
        const { artifact } = battinfoJsonld.render(exportInput(p), {
            sample_name: '',
            options: { battinfo: { include_context: true } },
        });
        assert.deepEqual(artifact['@context'], ['https://w3id.org/emmo/domain/battery/context']);
        assert.equal(JSON.parse(battinfoJsonld.serialize(artifact))['@type'], 'Resting');
    });
});
