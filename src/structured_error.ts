/**
 * Structured Errors for protocol compilation
 *
 * Every failure carries a machine-readable code, the index of the offending
 * step (when one exists) and a JSON-safe context record, so callers can
 * surface every violated constraint at once.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorKind =
    | 'STRUCTURAL'
    | 'VALIDATION'
    | 'UNRESOLVED_REFERENCE'
    | 'MISSING_CAPACITY'
    | 'UNSUPPORTED_FEATURE'
    | 'ENCODING'
    | 'FILESYSTEM';

export type ErrorCode =
    // Structural (malformed protocol)
    | 'EMPTY_METHOD'
    | 'DUPLICATE_TAG'
    | 'BLANK_TAG'
    | 'MISSING_TERMINATION'
    | 'MISSING_SETPOINT'
    | 'INVALID_NUMBER'
    | 'INVALID_C_RATE'
    | 'INVALID_AMPLITUDE'
    | 'INVALID_CYCLE_COUNT'
    | 'INVALID_SAFETY_LIMITS'
    | 'INVALID_MEASUREMENT'
    | 'INTERSECTING_LOOPS'
    | 'UNKNOWN_STEP'
    | 'SCHEMA_MISMATCH'
    | 'MISSING_SAMPLE_NAME'

    // Validation (bounds)
    | 'VOLTAGE_OUT_OF_BOUNDS'
    | 'CURRENT_OUT_OF_BOUNDS'

    // References
    | 'MISSING_TAG'
    | 'FORWARD_LOOP'
    | 'EMPTY_LOOP_BODY'

    // Capacity
    | 'MISSING_CAPACITY'

    // Target-format constraints
    | 'UNSUPPORTED_STEP'
    | 'RANGE_CHANGE_NOT_AFTER_OCV'
    | 'CURRENT_RANGE_UNSUPPORTED'
    | 'VOLTAGE_OUT_OF_RANGE'
    | 'INVALID_VOLTAGE_RANGE'
    | 'UNENCODABLE_CHARACTER'
    | 'TOO_MANY_STEPS'

    // Advisories
    | 'ASYMMETRIC_CURRENT_LIMIT'
    | 'WIDE_VOLTAGE_RANGE'

    // Infrastructure
    | 'FILESYSTEM_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    kind: ErrorKind;
    code: ErrorCode;
    message: string;
    severity: Severity;
    step_index?: number;
    context: Record<string, unknown>;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export abstract class ProtocolError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly step_index?: number,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
    }

    toJSON(): StructuredError {
        return createStructuredError(this.kind, this.code, this.message, this.step_index, this.context);
    }
}

export interface StructuralIssue {
    code: ErrorCode;
    message: string;
    path: string;
    step_index?: number;
}

export class StructuralError extends ProtocolError {
    readonly kind = 'STRUCTURAL';
    readonly issues: readonly StructuralIssue[];

    constructor(issues: StructuralIssue[]) {
        const first = issues[0] ?? { code: 'SCHEMA_MISMATCH', message: 'Malformed protocol', path: '' };
        const message = issues.length > 1
            ? `${first.message} (and ${issues.length - 1} more issue${issues.length > 2 ? 's' : ''})`
            : first.message;
        super(message, first.code, first.step_index, { issues: issues.map(i => ({ ...i })) });
        this.name = 'StructuralError';
        this.issues = issues;
    }

    static single(code: ErrorCode, message: string, path = '', step_index?: number): StructuralError {
        return new StructuralError([{ code, message, path, step_index }]);
    }
}

export class ValidationError extends ProtocolError {
    readonly kind = 'VALIDATION';

    constructor(
        message: string,
        code: ErrorCode,
        public readonly path: string,
        step_index?: number,
        context: Record<string, unknown> = {}
    ) {
        super(message, code, step_index, context);
        this.name = 'ValidationError';
    }
}

export class UnresolvedReferenceError extends ProtocolError {
    readonly kind = 'UNRESOLVED_REFERENCE';

    constructor(message: string, code: ErrorCode, step_index: number, context: Record<string, unknown> = {}) {
        super(message, code, step_index, context);
        this.name = 'UnresolvedReferenceError';
    }
}

export class MissingCapacityError extends ProtocolError {
    readonly kind = 'MISSING_CAPACITY';

    constructor(step_index: number, capacity: unknown) {
        super(
            `Step ${step_index} is defined by C-rate; a positive sample capacity (mAh) is required`,
            'MISSING_CAPACITY',
            step_index,
            { capacity_mAh: capacity === undefined ? null : String(capacity) }
        );
        this.name = 'MissingCapacityError';
    }
}

export class UnsupportedFeatureError extends ProtocolError {
    readonly kind = 'UNSUPPORTED_FEATURE';

    constructor(message: string, step_index: number, context: Record<string, unknown> = {}) {
        super(message, 'UNSUPPORTED_STEP', step_index, context);
        this.name = 'UnsupportedFeatureError';
    }
}

export class EncodingError extends ProtocolError {
    readonly kind = 'ENCODING';

    constructor(message: string, code: ErrorCode, step_index?: number, context: Record<string, unknown> = {}) {
        super(message, code, step_index, context);
        this.name = 'EncodingError';
    }
}

export class ArtifactWriteError extends ProtocolError {
    readonly kind = 'FILESYSTEM';

    constructor(message: string, public readonly errno?: string, public readonly cause?: unknown) {
        super(message, 'FILESYSTEM_ERROR', undefined, errno ? { errno } : {});
        this.name = 'ArtifactWriteError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    kind: ErrorKind,
    code: ErrorCode,
    message: string,
    step_index?: number,
    context: Record<string, unknown> = {}
): StructuredError {
    const error: StructuredError = {
        kind,
        code,
        message,
        severity: getSeverity(code),
        context,
    };
    if (step_index !== undefined) error.step_index = step_index;
    return error;
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['FILESYSTEM_ERROR'];
    const warningCodes: ErrorCode[] = ['ASYMMETRIC_CURRENT_LIMIT', 'WIDE_VOLTAGE_RANGE'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

export function isProtocolError(e: unknown): e is ProtocolError {
    return e instanceof ProtocolError;
}

/* -------------------------------------------------------------------------- */
/* Advisory Factory Methods                                                   */
/* -------------------------------------------------------------------------- */

export class AdvisoryFactory {
    static asymmetricCurrentLimit(min_current_mA: number | undefined, max_current_mA: number | undefined): StructuredError {
        const effective = Math.max(Math.abs(min_current_mA ?? 0), Math.abs(max_current_mA ?? 0));
        return createStructuredError(
            'VALIDATION',
            'ASYMMETRIC_CURRENT_LIMIT',
            `Current limits are asymmetric (min ${min_current_mA ?? 'unset'} mA, max ${max_current_mA ?? 'unset'} mA); ` +
            `devices with a single limit enforce ${effective} mA in both directions`,
            undefined,
            { min_current_mA: min_current_mA ?? null, max_current_mA: max_current_mA ?? null, effective_limit_mA: effective }
        );
    }

    static wideVoltageRange(min_V: number, max_V: number, compliance_V: number): StructuredError {
        return createStructuredError(
            'ENCODING',
            'WIDE_VOLTAGE_RANGE',
            `Voltage range ${min_V} V to ${max_V} V exceeds the +-${compliance_V} V compliance; max voltage may not be reachable`,
            undefined,
            { min_V, max_V, compliance_V }
        );
    }
}
