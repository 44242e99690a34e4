/**
 * Error Type Tests
 */

import { describe, it, expect } from 'vitest';
import {
    ConfigurationError,
    DatasetError,
    DimensionMismatchError,
    ErrorCodes,
    NonFiniteValueError,
    SwarmError,
    ValidationError,
    hasErrorCode,
    isSwarmError,
    wrapError,
} from '../src/core/errors';

describe('error classes', () => {
    it('ConfigurationError names the offending field', () => {
        const error = new ConfigurationError('gdPeriod', 'gdPeriod must be >= 0, got -1', -1);
        expect(error).toBeInstanceOf(SwarmError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ConfigurationError');
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.field).toBe('gdPeriod');
        expect(error.details).toEqual({ field: 'gdPeriod', value: -1 });
    });

    it('DimensionMismatchError reports both lengths', () => {
        const error = new DimensionMismatchError('gradient function', 3, 2);
        expect(error.message).toBe('gradient function: expected length 3, got 2');
        expect(error.expected).toBe(3);
        expect(error.actual).toBe(2);
        expect(error.code).toBe(ErrorCodes.DIMENSION_MISMATCH);
    });

    it('NonFiniteValueError carries the value', () => {
        const error = new NonFiniteValueError('fitness function', NaN);
        expect(error.message).toBe('fitness function returned a non-finite value (NaN)');
        expect(Number.isNaN(error.value)).toBe(true);
        expect(error.code).toBe(ErrorCodes.NON_FINITE_VALUE);
    });

    it('DatasetError and ValidationError use their own codes', () => {
        expect(new DatasetError('bad row').code).toBe(ErrorCodes.DATASET_ERROR);
        expect(new ValidationError('bad input').code).toBe(ErrorCodes.VALIDATION_ERROR);
    });

    it('toJSON exposes a serializable view', () => {
        const error = new ValidationError('bad input', { index: 4 });
        const json = error.toJSON();
        expect(json).toMatchObject({
            name: 'ValidationError',
            code: ErrorCodes.VALIDATION_ERROR,
            message: 'bad input',
            details: { index: 4 },
        });
        expect(typeof json.timestamp).toBe('number');
    });
});

describe('error utilities', () => {
    it('isSwarmError and hasErrorCode', () => {
        const error = new DatasetError('missing');
        expect(isSwarmError(error)).toBe(true);
        expect(isSwarmError(new Error('plain'))).toBe(false);
        expect(hasErrorCode(error, ErrorCodes.DATASET_ERROR)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.INVALID_CONFIG)).toBe(false);
        expect(hasErrorCode('nope', ErrorCodes.DATASET_ERROR)).toBe(false);
    });

    it('wrapError keeps library errors and wraps the rest', () => {
        const original = new ValidationError('x');
        expect(wrapError(original)).toBe(original);

        const wrapped = wrapError(new TypeError('bad type'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('bad type');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });

        expect(wrapError('text', ErrorCodes.DATASET_ERROR).message).toBe('text');
    });
});
