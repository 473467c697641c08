/**
 * pg-fluent - Error Types Unit Tests
 *
 * Tests for custom error classes covering construction,
 * error codes, details, inheritance, and name properties.
 */

import { describe, it, expect } from 'vitest';
import {
    SqlError,
    ConfigurationError,
    MissingQueryError,
    NoResultsError,
    ValidationError,
    QueryError,
    UnsupportedOperationError,
    DriverFaultError,
    toError,
} from '../errors.js';

// =============================================================================
// SqlError (Base Class)
// =============================================================================

describe('SqlError', () => {
    it('should create error with message and code', () => {
        const error = new SqlError('Test error', 'TEST_CODE');

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('Test error');
        expect(error.code).toBe('TEST_CODE');
        expect(error.name).toBe('SqlError');
        expect(error.details).toBeUndefined();
    });

    it('should keep details', () => {
        const error = new SqlError('Test error', 'TEST_CODE', { column: 'id' });

        expect(error.details).toEqual({ column: 'id' });
    });
});

// =============================================================================
// Subclasses
// =============================================================================

describe('ConfigurationError', () => {
    it('should carry the configuration code', () => {
        const error = new ConfigurationError('Could not create a connection from empty parameters.');

        expect(error).toBeInstanceOf(SqlError);
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.name).toBe('ConfigurationError');
    });
});

describe('MissingQueryError', () => {
    it('should default to the missing query message', () => {
        const error = new MissingQueryError();

        expect(error.message).toBe('No query provided to execute. Please use Sql.query');
        expect(error.code).toBe('MISSING_QUERY');
        expect(error.name).toBe('MissingQueryError');
    });
});

describe('NoResultsError', () => {
    it('should default to the empty result set message', () => {
        const error = new NoResultsError();

        expect(error.message).toBe(
            'Expected at least one row to be returned from the result set. Instead it was empty',
        );
        expect(error.code).toBe('NO_RESULTS');
    });
});

describe('ValidationError', () => {
    it('should carry the validation code and issues', () => {
        const error = new ValidationError('Invalid connection string', { issues: ['port: Expected number'] });

        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.details).toEqual({ issues: ['port: Expected number'] });
    });
});

describe('QueryError', () => {
    it('should carry the query code', () => {
        const error = new QueryError("Column 'id' was not found in the result set");

        expect(error.code).toBe('QUERY_ERROR');
        expect(error.name).toBe('QueryError');
    });
});

describe('UnsupportedOperationError', () => {
    it('should name the operation in message and details', () => {
        const error = new UnsupportedOperationError('open (blocking)', { driver: 'pg' });

        expect(error.message).toBe("Operation 'open (blocking)' is not supported by this driver");
        expect(error.code).toBe('UNSUPPORTED_OPERATION');
        expect(error.details).toEqual({ operation: 'open (blocking)', driver: 'pg' });
    });
});

// =============================================================================
// toError
// =============================================================================

describe('toError', () => {
    it('should return Error instances untouched', () => {
        const original = new TypeError('boom');

        expect(toError(original)).toBe(original);
    });

    it('should wrap non-error values', () => {
        const error = toError('connection reset');

        expect(error).toBeInstanceOf(DriverFaultError);
        expect(error.message).toBe('Driver raised a non-error value: connection reset');
        expect(error.cause).toBe('connection reset');
    });
});
