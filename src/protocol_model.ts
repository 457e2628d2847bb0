/**
 * Protocol Model: immutable in-memory cycling protocol
 *
 * A Protocol owns its measurement policy, safety limits and an ordered method
 * of steps. Construction checks only what can be checked locally (numeric
 * ranges, non-empty method, unique tag labels, per-step invariants) and throws
 * a StructuralError listing every issue found. Safety compliance belongs to the
 * validator; loop targets are checked when the sequence is resolved.
 *
 * Instances are deeply frozen. Every modification returns a new Protocol.
 */

import { parseCRate } from './c_rate';
import { StructuralError, StructuralIssue } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface MeasurementParams {
    /** Minimum time between records. */
    readonly time_s: number;
    /** Minimum voltage change that triggers a record. */
    readonly voltage_V?: number;
    /** Minimum current change that triggers a record. */
    readonly current_mA?: number;
}

export interface SafetyParams {
    readonly max_voltage_V?: number;
    readonly min_voltage_V?: number;
    readonly max_current_mA?: number;
    readonly min_current_mA?: number;
    readonly max_capacity_mAh?: number;
    /** How long a limit may be exceeded before the experiment is aborted. */
    readonly delay_s?: number;
}

export interface TagStep {
    readonly step: 'tag';
    readonly tag: string;
}

export interface OpenCircuitVoltageStep {
    readonly step: 'open_circuit_voltage';
    readonly id?: string;
    readonly until_time_s: number;
}

/** Termination: time, then voltage. rate_C takes priority over current_mA. */
export interface ConstantCurrentStep {
    readonly step: 'constant_current';
    readonly id?: string;
    readonly rate_C?: number;
    readonly current_mA?: number;
    readonly until_time_s?: number;
    readonly until_voltage_V?: number;
}

/** Termination: time, then current (until_rate_C takes priority over until_current_mA). */
export interface ConstantVoltageStep {
    readonly step: 'constant_voltage';
    readonly id?: string;
    readonly voltage_V: number;
    readonly until_time_s?: number;
    readonly until_rate_C?: number;
    readonly until_current_mA?: number;
}

/** PEIS when amplitude_V is set, GEIS when amplitude_mA is set. */
export interface ImpedanceSpectroscopyStep {
    readonly step: 'impedance_spectroscopy';
    readonly id?: string;
    readonly amplitude_V?: number;
    readonly amplitude_mA?: number;
    readonly start_frequency_Hz: number;
    readonly end_frequency_Hz: number;
    readonly points_per_decade: number;
    readonly measures_per_point: number;
    readonly drift_correction: boolean;
}

/** Repeats from the step after the named tag; cycle_count is the total number of cycles. */
export interface LoopStep {
    readonly step: 'loop';
    readonly id?: string;
    readonly start_step: string;
    readonly cycle_count: number;
}

export type Step =
    | TagStep
    | OpenCircuitVoltageStep
    | ConstantCurrentStep
    | ConstantVoltageStep
    | ImpedanceSpectroscopyStep
    | LoopStep;

export type StepKind = Step['step'];

export type ExecutableStep = Exclude<Step, TagStep>;

export interface Protocol {
    readonly measurement: MeasurementParams;
    readonly safety: SafetyParams;
    readonly method: readonly Step[];
}

export const STEP_KINDS: readonly StepKind[] = [
    'tag',
    'open_circuit_voltage',
    'constant_current',
    'constant_voltage',
    'impedance_spectroscopy',
    'loop',
];

/* -------------------------------------------------------------------------- */
/* Construction inputs                                                        */
/* -------------------------------------------------------------------------- */

export type CRateInput = number | string;

export interface TagInit { tag: string }
export interface OpenCircuitVoltageInit { id?: string; until_time_s: number }
export interface ConstantCurrentInit {
    id?: string;
    rate_C?: CRateInput;
    current_mA?: number;
    until_time_s?: number;
    until_voltage_V?: number;
}
export interface ConstantVoltageInit {
    id?: string;
    voltage_V: number;
    until_time_s?: number;
    until_rate_C?: CRateInput;
    until_current_mA?: number;
}
export interface ImpedanceSpectroscopyInit {
    id?: string;
    amplitude_V?: number;
    amplitude_mA?: number;
    start_frequency_Hz: number;
    end_frequency_Hz: number;
    points_per_decade?: number;
    measures_per_point?: number;
    drift_correction?: boolean;
}
export interface LoopInit { id?: string; start_step: string; cycle_count: number }

export type StepInit =
    | ({ step: 'tag' } & TagInit)
    | ({ step: 'open_circuit_voltage' } & OpenCircuitVoltageInit)
    | ({ step: 'constant_current' } & ConstantCurrentInit)
    | ({ step: 'constant_voltage' } & ConstantVoltageInit)
    | ({ step: 'impedance_spectroscopy' } & ImpedanceSpectroscopyInit)
    | ({ step: 'loop' } & LoopInit);

export interface ProtocolInit {
    measurement: MeasurementParams;
    safety?: SafetyParams;
    method: readonly StepInit[];
}

/* -------------------------------------------------------------------------- */
/* Local checks                                                               */
/* -------------------------------------------------------------------------- */

type Issues = StructuralIssue[];

interface NumberRule {
    min?: number;
    max?: number;
    exclusiveMin?: boolean;
    integer?: boolean;
}

function checkNumber(
    value: unknown,
    path: string,
    issues: Issues,
    rule: NumberRule = {},
    step_index?: number
): value is number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        issues.push({ code: 'INVALID_NUMBER', message: `${path} must be a finite number`, path, step_index });
        return false;
    }
    if (rule.integer && !Number.isInteger(value)) {
        issues.push({ code: 'INVALID_NUMBER', message: `${path} must be an integer`, path, step_index });
        return false;
    }
    if (rule.min !== undefined) {
        const below = rule.exclusiveMin ? value <= rule.min : value < rule.min;
        if (below) {
            const op = rule.exclusiveMin ? '>' : '>=';
            issues.push({ code: 'INVALID_NUMBER', message: `${path} must be ${op} ${rule.min}, got ${value}`, path, step_index });
            return false;
        }
    }
    if (rule.max !== undefined && value > rule.max) {
        issues.push({ code: 'INVALID_NUMBER', message: `${path} must be <= ${rule.max}, got ${value}`, path, step_index });
        return false;
    }
    return true;
}

function optionalNumber(
    value: number | undefined,
    path: string,
    issues: Issues,
    rule: NumberRule = {},
    step_index?: number
): number | undefined {
    if (value === undefined) return undefined;
    return checkNumber(value, path, issues, rule, step_index) ? value : undefined;
}

// Zero terminations and set-points mean "not set"
function nonZero(value: number | undefined): number | undefined {
    return value === undefined || value === 0 ? undefined : value;
}

function optionalRate(value: CRateInput | undefined, path: string, issues: Issues, step_index?: number): number | undefined {
    try {
        return parseCRate(value, path);
    } catch (e) {
        if (e instanceof StructuralError) {
            issues.push(...e.issues.map(i => ({ ...i, step_index })));
            return undefined;
        }
        throw e;
    }
}

function optionalId(id: string | undefined): { id?: string } {
    return id === undefined ? {} : { id };
}

// Drops undefined keys so frozen objects compare and serialize cleanly
function compact<T extends object>(obj: T): Readonly<T> {
    for (const key of Object.keys(obj)) {
        if (Reflect.get(obj, key) === undefined) Reflect.deleteProperty(obj, key);
    }
    return Object.freeze(obj);
}

/* -------------------------------------------------------------------------- */
/* Step builders                                                              */
/* -------------------------------------------------------------------------- */

function buildTag(init: TagInit, path: string, issues: Issues, index?: number): TagStep {
    if (typeof init.tag !== 'string' || init.tag.trim() === '') {
        issues.push({ code: 'BLANK_TAG', message: 'Tag must not be empty', path: `${path}.tag`, step_index: index });
    }
    return compact({ step: 'tag' as const, tag: init.tag });
}

function buildOpenCircuitVoltage(init: OpenCircuitVoltageInit, path: string, issues: Issues, index?: number): OpenCircuitVoltageStep {
    checkNumber(init.until_time_s, `${path}.until_time_s`, issues, { min: 0, exclusiveMin: true }, index);
    return compact({ step: 'open_circuit_voltage' as const, ...optionalId(init.id), until_time_s: init.until_time_s });
}

function buildConstantCurrent(init: ConstantCurrentInit, path: string, issues: Issues, index?: number): ConstantCurrentStep {
    const before = issues.length;
    const rate_C = nonZero(optionalRate(init.rate_C, `${path}.rate_C`, issues, index));
    const current_mA = nonZero(optionalNumber(init.current_mA, `${path}.current_mA`, issues, {}, index));
    const setpointInvalid = issues.length > before;
    const until_time_s = nonZero(optionalNumber(init.until_time_s, `${path}.until_time_s`, issues, { min: 0 }, index));
    const until_voltage_V = nonZero(optionalNumber(init.until_voltage_V, `${path}.until_voltage_V`, issues, {}, index));

    if (rate_C === undefined && current_mA === undefined && !setpointInvalid) {
        issues.push({
            code: 'MISSING_SETPOINT',
            message: 'Either rate_C or current_mA must be set and non-zero',
            path,
            step_index: index,
        });
    }
    if (until_time_s === undefined && until_voltage_V === undefined) {
        issues.push({
            code: 'MISSING_TERMINATION',
            message: 'Either until_time_s or until_voltage_V must be set and non-zero',
            path,
            step_index: index,
        });
    }

    return compact({
        step: 'constant_current' as const,
        ...optionalId(init.id),
        rate_C,
        current_mA,
        until_time_s,
        until_voltage_V,
    });
}

function buildConstantVoltage(init: ConstantVoltageInit, path: string, issues: Issues, index?: number): ConstantVoltageStep {
    checkNumber(init.voltage_V, `${path}.voltage_V`, issues, {}, index);
    const until_time_s = nonZero(optionalNumber(init.until_time_s, `${path}.until_time_s`, issues, { min: 0 }, index));
    const until_rate_C = nonZero(optionalRate(init.until_rate_C, `${path}.until_rate_C`, issues, index));
    const until_current_mA = nonZero(optionalNumber(init.until_current_mA, `${path}.until_current_mA`, issues, {}, index));

    if (until_time_s === undefined && until_rate_C === undefined && until_current_mA === undefined) {
        issues.push({
            code: 'MISSING_TERMINATION',
            message: 'Either until_time_s, until_rate_C, or until_current_mA must be set and non-zero',
            path,
            step_index: index,
        });
    }

    return compact({
        step: 'constant_voltage' as const,
        ...optionalId(init.id),
        voltage_V: init.voltage_V,
        until_time_s,
        until_rate_C,
        until_current_mA,
    });
}

function buildImpedanceSpectroscopy(init: ImpedanceSpectroscopyInit, path: string, issues: Issues, index?: number): ImpedanceSpectroscopyStep {
    const amplitude_V = optionalNumber(init.amplitude_V, `${path}.amplitude_V`, issues, { min: 0, exclusiveMin: true }, index);
    const amplitude_mA = optionalNumber(init.amplitude_mA, `${path}.amplitude_mA`, issues, { min: 0, exclusiveMin: true }, index);
    if (init.amplitude_V !== undefined && init.amplitude_mA !== undefined) {
        issues.push({ code: 'INVALID_AMPLITUDE', message: 'Cannot set both amplitude_V and amplitude_mA', path, step_index: index });
    } else if (init.amplitude_V === undefined && init.amplitude_mA === undefined) {
        issues.push({ code: 'INVALID_AMPLITUDE', message: 'Either amplitude_V or amplitude_mA must be set', path, step_index: index });
    }

    const frequency: NumberRule = { min: 1e-5, max: 1e5 };
    checkNumber(init.start_frequency_Hz, `${path}.start_frequency_Hz`, issues, frequency, index);
    checkNumber(init.end_frequency_Hz, `${path}.end_frequency_Hz`, issues, frequency, index);

    const points_per_decade = init.points_per_decade ?? 10;
    const measures_per_point = init.measures_per_point ?? 1;
    const positiveInt: NumberRule = { min: 0, exclusiveMin: true, integer: true };
    checkNumber(points_per_decade, `${path}.points_per_decade`, issues, positiveInt, index);
    checkNumber(measures_per_point, `${path}.measures_per_point`, issues, positiveInt, index);

    return compact({
        step: 'impedance_spectroscopy' as const,
        ...optionalId(init.id),
        amplitude_V,
        amplitude_mA,
        start_frequency_Hz: init.start_frequency_Hz,
        end_frequency_Hz: init.end_frequency_Hz,
        points_per_decade,
        measures_per_point,
        drift_correction: init.drift_correction ?? false,
    });
}

function buildLoop(init: LoopInit, path: string, issues: Issues, index?: number): LoopStep {
    if (typeof init.start_step !== 'string' || init.start_step.trim() === '') {
        issues.push({ code: 'BLANK_TAG', message: 'Loop start_step cannot be empty', path: `${path}.start_step`, step_index: index });
    }
    if (typeof init.cycle_count !== 'number' || !Number.isInteger(init.cycle_count) || init.cycle_count <= 0) {
        issues.push({
            code: 'INVALID_CYCLE_COUNT',
            message: `cycle_count must be a positive integer, got ${String(init.cycle_count)}`,
            path: `${path}.cycle_count`,
            step_index: index,
        });
    }
    return compact({
        step: 'loop' as const,
        ...optionalId(init.id),
        start_step: init.start_step,
        cycle_count: init.cycle_count,
    });
}

function buildStep(init: StepInit, path: string, issues: Issues, index?: number): Step | null {
    switch (init.step) {
        case 'tag': return buildTag(init, path, issues, index);
        case 'open_circuit_voltage': return buildOpenCircuitVoltage(init, path, issues, index);
        case 'constant_current': return buildConstantCurrent(init, path, issues, index);
        case 'constant_voltage': return buildConstantVoltage(init, path, issues, index);
        case 'impedance_spectroscopy': return buildImpedanceSpectroscopy(init, path, issues, index);
        case 'loop': return buildLoop(init, path, issues, index);
        default: {
            const unknownStep: unknown = Reflect.get(init, 'step');
            issues.push({ code: 'UNKNOWN_STEP', message: `Unknown step type: ${String(unknownStep)}`, path: `${path}.step`, step_index: index });
            return null;
        }
    }
}

function single<T>(build: (issues: Issues) => T): T {
    const issues: Issues = [];
    const step = build(issues);
    if (issues.length > 0) throw new StructuralError(issues);
    return step;
}

export function tag(label: string): TagStep {
    return single(issues => buildTag({ tag: label }, 'tag', issues));
}

export function openCircuitVoltage(init: OpenCircuitVoltageInit): OpenCircuitVoltageStep {
    return single(issues => buildOpenCircuitVoltage(init, 'open_circuit_voltage', issues));
}

export function constantCurrent(init: ConstantCurrentInit): ConstantCurrentStep {
    return single(issues => buildConstantCurrent(init, 'constant_current', issues));
}

export function constantVoltage(init: ConstantVoltageInit): ConstantVoltageStep {
    return single(issues => buildConstantVoltage(init, 'constant_voltage', issues));
}

export function impedanceSpectroscopy(init: ImpedanceSpectroscopyInit): ImpedanceSpectroscopyStep {
    return single(issues => buildImpedanceSpectroscopy(init, 'impedance_spectroscopy', issues));
}

export function loop(start_step: string, cycle_count: number, id?: string): LoopStep {
    return single(issues => buildLoop({ ...optionalId(id), start_step, cycle_count }, 'loop', issues));
}

/* -------------------------------------------------------------------------- */
/* Protocol construction                                                      */
/* -------------------------------------------------------------------------- */

function buildMeasurement(init: MeasurementParams, issues: Issues): MeasurementParams {
    checkNumber(init.time_s, 'measurement.time_s', issues, { min: 0 });
    const voltage_V = optionalNumber(init.voltage_V, 'measurement.voltage_V', issues, { min: 0 });
    const current_mA = optionalNumber(init.current_mA, 'measurement.current_mA', issues, { min: 0 });
    return compact({ time_s: init.time_s, voltage_V, current_mA });
}

export function checkSafetyParams(safety: SafetyParams, issues: Issues): void {
    optionalNumber(safety.max_voltage_V, 'safety.max_voltage_V', issues);
    optionalNumber(safety.min_voltage_V, 'safety.min_voltage_V', issues);
    optionalNumber(safety.max_current_mA, 'safety.max_current_mA', issues);
    optionalNumber(safety.min_current_mA, 'safety.min_current_mA', issues);
    optionalNumber(safety.max_capacity_mAh, 'safety.max_capacity_mAh', issues, { min: 0 });
    optionalNumber(safety.delay_s, 'safety.delay_s', issues, { min: 0 });

    const { max_voltage_V, min_voltage_V, max_current_mA, min_current_mA } = safety;
    if (max_voltage_V !== undefined && min_voltage_V !== undefined && max_voltage_V < min_voltage_V) {
        issues.push({
            code: 'INVALID_SAFETY_LIMITS',
            message: `Max voltage (${max_voltage_V} V) must not be below min voltage (${min_voltage_V} V)`,
            path: 'safety.max_voltage_V',
        });
    }
    if (max_current_mA !== undefined && min_current_mA !== undefined && max_current_mA < min_current_mA) {
        issues.push({
            code: 'INVALID_SAFETY_LIMITS',
            message: `Max current (${max_current_mA} mA) must not be below min current (${min_current_mA} mA)`,
            path: 'safety.max_current_mA',
        });
    }
}

function buildSafety(init: SafetyParams, issues: Issues): SafetyParams {
    checkSafetyParams(init, issues);
    return compact({
        max_voltage_V: init.max_voltage_V,
        min_voltage_V: init.min_voltage_V,
        max_current_mA: init.max_current_mA,
        min_current_mA: init.min_current_mA,
        max_capacity_mAh: init.max_capacity_mAh,
        delay_s: init.delay_s,
    });
}

export function createProtocol(init: ProtocolInit): Protocol {
    const issues: Issues = [];

    const measurement = buildMeasurement(init.measurement, issues);
    const safety = buildSafety(init.safety ?? {}, issues);

    const steps: readonly StepInit[] = Array.isArray(init.method) ? init.method : [];
    if (steps.length === 0) {
        issues.push({ code: 'EMPTY_METHOD', message: 'Method must contain at least one step', path: 'method' });
    }

    const method: Step[] = [];
    const seenTags = new Map<string, number>();
    steps.forEach((stepInit, i) => {
        const step = buildStep(stepInit, `method[${i}]`, issues, i);
        if (!step) return;
        if (step.step === 'tag') {
            const first = seenTags.get(step.tag);
            if (first !== undefined) {
                issues.push({
                    code: 'DUPLICATE_TAG',
                    message: `Duplicate tag '${step.tag}' at steps ${first} and ${i}`,
                    path: `method[${i}].tag`,
                    step_index: i,
                });
            } else {
                seenTags.set(step.tag, i);
            }
        }
        method.push(step);
    });

    if (issues.length > 0) throw new StructuralError(issues);

    return Object.freeze({
        measurement,
        safety,
        method: Object.freeze(method),
    });
}

/* -------------------------------------------------------------------------- */
/* Derived instances                                                          */
/* -------------------------------------------------------------------------- */

export function toInit(protocol: Protocol): ProtocolInit {
    return {
        measurement: protocol.measurement,
        safety: protocol.safety,
        method: protocol.method,
    };
}

export function updateProtocol(protocol: Protocol, patch: Partial<ProtocolInit>): Protocol {
    return createProtocol({ ...toInit(protocol), ...patch });
}

export function withMethod(protocol: Protocol, method: readonly StepInit[]): Protocol {
    return updateProtocol(protocol, { method });
}

export function insertStep(protocol: Protocol, index: number, step: StepInit): Protocol {
    const method: StepInit[] = [...protocol.method];
    method.splice(index, 0, step);
    return withMethod(protocol, method);
}

export function replaceStep(protocol: Protocol, index: number, step: StepInit): Protocol {
    if (index < 0 || index >= protocol.method.length) {
        throw new RangeError(`Step index ${index} out of range (method has ${protocol.method.length} steps)`);
    }
    const method: StepInit[] = [...protocol.method];
    method[index] = step;
    return withMethod(protocol, method);
}

export function removeStep(protocol: Protocol, index: number): Protocol {
    if (index < 0 || index >= protocol.method.length) {
        throw new RangeError(`Step index ${index} out of range (method has ${protocol.method.length} steps)`);
    }
    return withMethod(protocol, protocol.method.filter((_, i) => i !== index));
}

export function isExecutable(step: Step): step is ExecutableStep {
    return step.step !== 'tag';
}
