/**
 * @module core
 * @description Ambient services shared by every vector
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Buffer lifecycle logging
 * - `config`: Library-wide configuration
 */

// ==================== Errors ====================

export {
    ErrorCodes,
    NumvecError,
    OutOfRangeError,
    InvalidRangeError,
    SizeMismatchError,
    InvalidDimensionError,
    EmptyVectorError,
    InvalidArgumentError,
    ConfigError,
    isNumvecError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    VectorEventType,
    BaseLogEntry,
    VectorEvent,
    VectorLogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    EVENT_LEVELS,
    isLevelEnabled,
    SilentLogger,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Config ====================

export type {
    FormatOptions,
    NumvecConfig,
    NumvecConfigInput,
    ValidationResult,
} from './config';

export {
    DEFAULT_FORMAT,
    validateConfig,
    configure,
    getConfig,
    resetConfig,
} from './config';
