/**
 * @module core/errors
 * @description Unified error types and error codes for the optimizer library
 *
 * Every failure raised by the library is a `SwarmError` carrying a stable code,
 * so callers can branch on `error.code` instead of parsing messages.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Configuration Errors
    /** Construction parameter out of range (particle count, dimensions, period...) */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',

    // Contract Errors
    /** Vector returned or supplied with the wrong length */
    DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
    /** Fitness or gradient produced NaN / Infinity under the 'throw' policy */
    NON_FINITE_VALUE: 'NON_FINITE_VALUE',

    // Data Errors
    /** Dataset missing, empty or malformed */
    DATASET_ERROR: 'DATASET_ERROR',

    // Runtime Errors
    /** Internal library error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the library
 */
export class SwarmError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'SwarmError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SwarmError);
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
 * Invalid construction parameter
 */
export class ConfigurationError extends SwarmError {
    readonly field: string;

    constructor(field: string, message: string, value?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, { field, value });
        this.name = 'ConfigurationError';
        this.field = field;
    }
}

/**
 * Generic validation error
 */
export class ValidationError extends SwarmError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * A vector of the wrong length crossed a contract boundary
 */
export class DimensionMismatchError extends SwarmError {
    readonly expected: number;
    readonly actual: number;

    constructor(context: string, expected: number, actual: number) {
        super(
            ErrorCodes.DIMENSION_MISMATCH,
            `${context}: expected length ${expected}, got ${actual}`,
            { context, expected, actual }
        );
        this.name = 'DimensionMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * NaN or Infinity produced by a caller-supplied function
 */
export class NonFiniteValueError extends SwarmError {
    readonly value: number;

    constructor(context: string, value: number, details?: Record<string, unknown>) {
        super(
            ErrorCodes.NON_FINITE_VALUE,
            `${context} returned a non-finite value (${value})`,
            { context, value, ...details }
        );
        this.name = 'NonFiniteValueError';
        this.value = value;
    }
}

/**
 * Dataset could not be loaded or parsed
 */
export class DatasetError extends SwarmError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.DATASET_ERROR, message, details);
        this.name = 'DatasetError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a SwarmError
 */
export function isSwarmError(error: unknown): error is SwarmError {
    return error instanceof SwarmError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isSwarmError(error) && error.code === code;
}

/**
 * Wrap any error into a SwarmError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): SwarmError {
    if (isSwarmError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SwarmError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new SwarmError(defaultCode, String(error));
}
