/**
 * @module core
 * @description Shared infrastructure for the link-budget models
 *
 * ## Modules
 * - `config`: Configuration merge, fail-fast field access, override validation
 * - `logging`: Structured device/link logging
 * - `errors`: Unified error types and codes
 */

// ==================== Config ====================

export type { ValidationResult } from './config';

export {
    mergeConfig,
    requireField,
    parseConfigOverrides,
    validateConfig,
} from './config';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    DeviceLogEntry,
    LinkLogEntry,
    LogEntry,
    DeviceLogInput,
    LinkLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    RadioError,
    DomainError,
    MissingConfigKeyError,
    ValidationError,
    isRadioError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
