/**
 * tablekit - Error Types Unit Tests
 *
 * Codes, details, causes and the inheritance chain of each error class.
 */

import { describe, it, expect } from 'vitest';
import {
    TablekitError,
    ConfigError,
    ConnectionError,
    PoolError,
    StatementError,
    ValidationError,
    TransactionError
} from '../errors.js';

describe('TablekitError', () => {
    it('should carry message, code and details', () => {
        const error = new TablekitError('Test error', 'TEST_CODE', { table: 'users' });

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('Test error');
        expect(error.code).toBe('TEST_CODE');
        expect(error.name).toBe('TablekitError');
        expect(error.details).toEqual({ table: 'users' });
    });

    it('should leave details undefined when omitted', () => {
        expect(new TablekitError('x', 'X').details).toBeUndefined();
    });

    it('should keep the cause', () => {
        const cause = new Error('socket hang up');
        const error = new TablekitError('wrapped', 'X', undefined, { cause });
        expect(error.cause).toBe(cause);
    });
});

// =============================================================================
// Subclasses
// =============================================================================

describe.each([
    ['ConfigError', () => new ConfigError('m'), 'CONFIG_ERROR'],
    ['ConnectionError', () => new ConnectionError('m'), 'CONNECTION_ERROR'],
    ['PoolError', () => new PoolError('m'), 'POOL_ERROR'],
    ['StatementError', () => new StatementError('m'), 'STATEMENT_ERROR'],
    ['ValidationError', () => new ValidationError('m'), 'VALIDATION_ERROR'],
    ['TransactionError', () => new TransactionError('m'), 'TRANSACTION_ERROR']
] as const)('%s', (name, create, code) => {
    it('should set name and code', () => {
        const error = create();
        expect(error.name).toBe(name);
        expect(error.code).toBe(code);
    });

    it('should extend TablekitError', () => {
        expect(create()).toBeInstanceOf(TablekitError);
    });
});

describe('StatementError', () => {
    it('should keep SQL details and the driver error', () => {
        const cause = new Error('relation "nope" does not exist');
        const error = new StatementError('Statement failed', { sql: 'SELECT * FROM nope', sqlState: '42P01' }, { cause });

        expect(error.details).toEqual({ sql: 'SELECT * FROM nope', sqlState: '42P01' });
        expect(error.cause).toBe(cause);
    });
});
