/**
 * @module core/errors
 * @description Error types and error codes shared by every link-budget module
 *
 * Every failure raised by the library is a caller contract violation: there are no
 * recoverable paths, so errors are thrown synchronously and never retried.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the d2d-radio library
 */
export const ErrorCodes = {
    // Math & Physics Errors
    /** Mathematically undefined input (log of non-positive value, zero distance) */
    DOMAIN_ERROR: 'DOMAIN_ERROR',

    // Configuration Errors
    /** A configuration field read by an accessor is absent */
    MISSING_CONFIG_KEY: 'MISSING_CONFIG_KEY',
    /** Configuration override failed validation */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',

    /** Internal library error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the library
 */
export class RadioError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'RadioError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, RadioError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Domain error: input outside the domain of a formula
 *
 * Never clamped: a silently clamped path loss would corrupt every SINR built on it.
 */
export class DomainError extends RadioError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.DOMAIN_ERROR, message, details);
        this.name = 'DomainError';
    }
}

/**
 * Missing configuration key error
 */
export class MissingConfigKeyError extends RadioError {
    readonly key: string;

    constructor(key: string, owner?: string) {
        super(
            ErrorCodes.MISSING_CONFIG_KEY,
            owner
                ? `Missing configuration key "${key}" on ${owner}`
                : `Missing configuration key "${key}"`,
            { key, owner }
        );
        this.name = 'MissingConfigKeyError';
        this.key = key;
    }
}

/**
 * Validation error (malformed identifier, override or argument)
 */
export class ValidationError extends RadioError {
    constructor(message: string, details?: unknown, code: ErrorCode = ErrorCodes.VALIDATION_ERROR) {
        super(code, message, details);
        this.name = 'ValidationError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a RadioError
 */
export function isRadioError(error: unknown): error is RadioError {
    return error instanceof RadioError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isRadioError(error) && error.code === code;
}

/**
 * Wrap any error into a RadioError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): RadioError {
    if (isRadioError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new RadioError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new RadioError(defaultCode, String(error));
}
