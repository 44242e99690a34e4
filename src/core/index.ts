/**
 * @module core
 * @description Shared foundations for optimization runs
 *
 * ## Modules
 * - `logging`: structured iteration/refinement/report logging
 * - `repro`: randomness sources, seeded RNG, run configs and hashes
 * - `errors`: unified error types and codes
 *
 * File loggers are Node.js only and live in `core/logging-node`
 * (exported from the `node` entry point).
 */

// ==================== Logging ====================

export type {
    LogLevel,
    OptimizerKind,
    BaseLogEntry,
    IterationLogEntry,
    RefinementLogEntry,
    ReportLogEntry,
    LogEntry,
    IterationLogInput,
    RefinementLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    resolveLoggerConfig,
    createBaseEntry,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type {
    RandomSource,
    RunConfig,
    RunConfigInput,
    ValidationResult,
} from './repro';

export {
    SeededRandom,
    createRng,
    randomSeed,
    shuffleInPlace,
    sampleWithoutReplacement,
    symmetricUniform,
    createRunConfig,
    serializeRunConfig,
    deserializeRunConfig,
    computeConfigHash,
    validateRunConfig,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    SwarmError,
    ConfigurationError,
    ValidationError,
    DimensionMismatchError,
    NonFiniteValueError,
    DatasetError,
    isSwarmError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
