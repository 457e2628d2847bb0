/**
 * Main entry point - exports all public APIs
 */

export { parseCRate } from './c_rate';
export {
    CanonicalDocument,
    fingerprint,
    fromCanonical,
    parseCanonical,
    protocolsEqual,
    serializeCanonical,
    toCanonical,
} from './canonical';
export {
    ExportAllResult,
    ExportEngine,
    ExportFailure,
    ExportResult,
    ExportSuccess,
    exportAll,
    exportProtocol,
} from './export_engine';
export {
    ArtifactByFormat,
    BattinfoNode,
    BiologicSettings,
    EXPORTERS,
    EXPORT_FORMATS,
    ExportContext,
    ExportFormat,
    ExportInput,
    ExportOptions,
    FormatExporter,
    PybammExperiment,
    PybammRepeat,
    PybammStep,
    TomatoJob,
    XmlElement,
    flattenPybammExperiment,
    getExporter,
    isExportFormat,
    listFormats,
} from './formats';
export { createLogger, Logger, LogLevel } from './logger';
export {
    ConstantCurrentStep,
    ConstantVoltageStep,
    ExecutableStep,
    ImpedanceSpectroscopyStep,
    LoopStep,
    MeasurementParams,
    OpenCircuitVoltageStep,
    Protocol,
    ProtocolInit,
    SafetyParams,
    Step,
    StepInit,
    StepKind,
    TagStep,
    constantCurrent,
    constantVoltage,
    createProtocol,
    impedanceSpectroscopy,
    insertStep,
    loop,
    openCircuitVoltage,
    removeStep,
    replaceStep,
    tag,
    updateProtocol,
    withMethod,
} from './protocol_model';
export { ConvertedSequence, ConvertedStep, convert } from './rate_converter';
export { CacheStats, ResolutionCache } from './resolution_cache';
export { SchemaValidator, SchemaResult, JsonSchema } from './schema_validator';
export {
    IterationNode,
    ResolvedSequence,
    ResolvedStep,
    groupIterations,
    resolve,
    unrollPositions,
} from './sequence_resolver';
export {
    ArtifactWriteError,
    EncodingError,
    ErrorCode,
    MissingCapacityError,
    ProtocolError,
    StructuralError,
    StructuredError,
    UnresolvedReferenceError,
    UnsupportedFeatureError,
    ValidationError,
} from './structured_error';
export { ValidationResult, validate } from './validator';
