/**
 * tablekit - Statement Assembly
 *
 * Pure builders turning structured CRUD input into SQL text plus an
 * ordered parameter list. Identifiers are validated and quoted here;
 * values only ever travel as $n parameters.
 */

import type { Row } from '../types/index.js';
import { ValidationError } from '../types/index.js';
import {
    createColumnList,
    quoteIdentifier,
    quoteTableName
} from '../utils/identifiers.js';
import { shiftPlaceholders, validateFragment } from '../utils/where-clause.js';

/**
 * SQL text with its positional parameters
 */
export interface Statement {
    sql: string;
    params: unknown[];
}

export interface SelectSpec {
    columns?: readonly string[] | undefined;
    where?: string | undefined;
    params?: readonly unknown[] | undefined;
    orderBy?: string | undefined;
    limit?: number | undefined;
    offset?: number | undefined;
}

function placeholders(count: number, start = 1): string {
    return Array.from({ length: count }, (_, i) => `$${String(start + i)}`).join(', ');
}

function recordColumns(record: Row): string[] {
    const columns = Object.keys(record);
    if (columns.length === 0) {
        throw new ValidationError('Record must have at least one column');
    }
    columns.forEach(quoteIdentifier);
    return columns;
}

function assertNonNegativeInt(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new ValidationError(`${name} must be a non-negative integer`, {
            [name]: value
        });
    }
}

/**
 * INSERT for `columns`; values of each record are read in that order
 */
export function buildInsert(
    table: string,
    columns: readonly string[],
    onConflict?: string,
    returning?: string
): string {
    const quotedTable = quoteTableName(table);
    let sql = `INSERT INTO ${quotedTable} (${columns.map(quoteIdentifier).join(', ')}) VALUES (${placeholders(columns.length)})`;
    if (onConflict !== undefined && onConflict.trim() !== '') {
        sql += ` ${onConflict.trim()}`;
    }
    if (returning !== undefined) {
        sql += ` RETURNING ${quoteIdentifier(returning)}`;
    }
    return sql;
}

/**
 * Column order and parameter tuples for one or more records sharing the
 * first record's shape; a column missing from a later record binds null
 */
export function recordValues(records: readonly Row[]): {
    columns: string[];
    paramList: unknown[][];
} {
    const [first] = records;
    if (first === undefined) {
        throw new ValidationError('At least one record is required');
    }
    const columns = recordColumns(first);
    const paramList = records.map((record) =>
        columns.map((column) => record[column] ?? null)
    );
    return { columns, paramList };
}

/**
 * SELECT with clauses in fixed order: WHERE, ORDER BY, LIMIT, OFFSET
 */
export function buildSelect(table: string, options: SelectSpec = {}): Statement {
    const columns = createColumnList(options.columns ?? ['*']);
    let sql = `SELECT ${columns} FROM ${quoteTableName(table)}`;
    const params: unknown[] = [...(options.params ?? [])];

    if (options.where !== undefined) {
        validateFragment(options.where, 'WHERE');
        sql += ` WHERE ${options.where}`;
    }
    if (options.orderBy !== undefined) {
        validateFragment(options.orderBy, 'ORDER BY');
        sql += ` ORDER BY ${options.orderBy}`;
    }
    if (options.limit !== undefined) {
        assertNonNegativeInt('limit', options.limit);
        params.push(options.limit);
        sql += ` LIMIT $${String(params.length)}`;
    }
    if (options.offset !== undefined) {
        assertNonNegativeInt('offset', options.offset);
        params.push(options.offset);
        sql += ` OFFSET $${String(params.length)}`;
    }

    return { sql, params };
}

/**
 * UPDATE setting `fields` in insertion order; the WHERE fragment's own
 * $n placeholders are renumbered to follow the SET values
 */
export function buildUpdate(
    table: string,
    fields: Row,
    where: string,
    whereParams: readonly unknown[] = []
): Statement {
    const quotedTable = quoteTableName(table);
    const columns = recordColumns(fields);
    validateFragment(where, 'WHERE');

    const assignments = columns
        .map((column, i) => `${quoteIdentifier(column)} = $${String(i + 1)}`)
        .join(', ');

    return {
        sql: `UPDATE ${quotedTable} SET ${assignments} WHERE ${shiftPlaceholders(where, columns.length)}`,
        params: [...columns.map((column) => fields[column]), ...whereParams]
    };
}

export function buildDelete(
    table: string,
    where: string,
    params: readonly unknown[] = []
): Statement {
    const quotedTable = quoteTableName(table);
    validateFragment(where, 'WHERE');
    return { sql: `DELETE FROM ${quotedTable} WHERE ${where}`, params: [...params] };
}

export function buildExists(
    table: string,
    where: string,
    params: readonly unknown[] = []
): Statement {
    const quotedTable = quoteTableName(table);
    validateFragment(where, 'WHERE');
    return {
        sql: `SELECT 1 FROM ${quotedTable} WHERE ${where} LIMIT 1`,
        params: [...params]
    };
}

export function buildCount(
    table: string,
    where?: string,
    params: readonly unknown[] = []
): Statement {
    let sql = `SELECT COUNT(*) AS count FROM ${quoteTableName(table)}`;
    if (where !== undefined) {
        validateFragment(where, 'WHERE');
        sql += ` WHERE ${where}`;
    }
    return { sql, params: [...params] };
}

/**
 * ON CONFLICT clause overwriting `updateFields` from the proposed row
 */
export function buildUpsertClause(
    conflictColumns: readonly string[],
    updateFields: readonly string[]
): string {
    if (conflictColumns.length === 0) {
        throw new ValidationError('conflictColumns must not be empty');
    }
    const target = conflictColumns.map(quoteIdentifier).join(', ');
    if (updateFields.length === 0) {
        return `ON CONFLICT (${target}) DO NOTHING`;
    }
    const assignments = updateFields
        .map((field) => {
            const column = quoteIdentifier(field);
            return `${column} = EXCLUDED.${column}`;
        })
        .join(', ');
    return `ON CONFLICT (${target}) DO UPDATE SET ${assignments}`;
}
