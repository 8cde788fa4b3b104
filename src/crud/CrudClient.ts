/**
 * tablekit - CRUD Operations
 *
 * Table-level convenience operations built from statements.ts and run
 * through DatabaseClient:
 * - insert / insertReturning / upsert
 * - select / paginate / exists / count
 * - update / delete (hard or soft) / batchUpdate
 * - tableExists / tableInfo / dropTable
 */

import type { DatabaseClient, ScopeOptions } from '../client/DatabaseClient.js';
import type { ColumnInfo, Row } from '../types/index.js';
import { ValidationError } from '../types/index.js';
import { parseTableName, quoteIdentifier, quoteTableName } from '../utils/identifiers.js';
import { logger } from '../utils/logger.js';
import {
    buildCount,
    buildDelete,
    buildExists,
    buildInsert,
    buildSelect,
    buildUpdate,
    buildUpsertClause,
    recordValues
} from './statements.js';
import type { SelectSpec } from './statements.js';

export interface InsertOptions extends ScopeOptions {
    /** Clause appended after VALUES, e.g. an ON CONFLICT clause */
    onConflict?: string | undefined;
}

export interface InsertReturningOptions extends InsertOptions {
    /** Generated column to return (default: id) */
    returning?: string | undefined;
}

export interface SelectOptions extends ScopeOptions, SelectSpec {}

export interface DeleteOptions extends ScopeOptions {
    /** Mark rows deleted instead of removing them */
    soft?: boolean | undefined;
    /** Timestamp column set by a soft delete (default: deleted_at) */
    softDeleteColumn?: string | undefined;
}

export interface UpsertOptions extends ScopeOptions {
    /** Columns of the unique constraint to match on (default: ['id']) */
    conflictColumns?: readonly string[] | undefined;
    /** Columns overwritten on conflict (default: every column of the record) */
    updateFields?: readonly string[] | undefined;
}

export interface DropTableOptions extends ScopeOptions {
    ifExists?: boolean | undefined;
}

export interface PaginateOptions extends ScopeOptions {
    columns?: readonly string[] | undefined;
    where?: string | undefined;
    params?: readonly unknown[] | undefined;
    orderBy?: string | undefined;
}

export interface Pagination {
    page: number;
    perPage: number;
    total: number;
    pageCount: number;
    hasNext: boolean;
    hasPrev: boolean;
}

export interface Page<R = Row> {
    data: R[];
    pagination: Pagination;
}

function assertPositiveInt(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ValidationError(`${name} must be a positive integer`, {
            [name]: value
        });
    }
}

function isRecordList(records: Row | readonly Row[]): records is readonly Row[] {
    return Array.isArray(records);
}

export class CrudClient {
    constructor(private readonly db: DatabaseClient) {}

    /**
     * Insert one record, or several sharing the first record's columns
     * through a single batch. Returns the affected row count.
     */
    async insert(
        table: string,
        records: Row | readonly Row[],
        options: InsertOptions = {}
    ): Promise<number> {
        const list = isRecordList(records) ? records : [records];
        const { columns, paramList } = recordValues(list);
        const sql = buildInsert(table, columns, options.onConflict);
        const [params] = paramList;

        if (paramList.length === 1 && params !== undefined) {
            return this.db.execute(sql, params, { database: options.database });
        }
        return this.db.executeBatch(sql, paramList, { database: options.database });
    }

    /**
     * Insert one record and return the key the server generated for it
     */
    async insertReturning(
        table: string,
        record: Row,
        options: InsertReturningOptions = {}
    ): Promise<unknown> {
        const returning = options.returning ?? 'id';
        const { columns, paramList } = recordValues([record]);
        const sql = buildInsert(table, columns, options.onConflict, returning);
        const rows = await this.db.execute(sql, paramList[0], {
            database: options.database,
            fetch: true
        });
        return rows[0]?.[returning];
    }

    async select(table: string, options: SelectOptions = {}): Promise<Row[]> {
        const { sql, params } = buildSelect(table, options);
        return this.db.execute(sql, params, {
            database: options.database,
            fetch: true
        });
    }

    /**
     * UPDATE `fields` where `where` holds; `params` bind the fragment's own
     * $1..$n placeholders
     */
    async update(
        table: string,
        fields: Row,
        where: string,
        params: readonly unknown[] = [],
        options: ScopeOptions = {}
    ): Promise<number> {
        const statement = buildUpdate(table, fields, where, params);
        return this.db.execute(statement.sql, statement.params, {
            database: options.database
        });
    }

    async delete(
        table: string,
        where: string,
        params: readonly unknown[] = [],
        options: DeleteOptions = {}
    ): Promise<number> {
        if (options.soft === true) {
            const column = options.softDeleteColumn ?? 'deleted_at';
            return this.update(table, { [column]: new Date() }, where, params, options);
        }
        const statement = buildDelete(table, where, params);
        return this.db.execute(statement.sql, statement.params, {
            database: options.database
        });
    }

    async exists(
        table: string,
        where: string,
        params: readonly unknown[] = [],
        options: ScopeOptions = {}
    ): Promise<boolean> {
        const statement = buildExists(table, where, params);
        const rows = await this.db.execute(statement.sql, statement.params, {
            database: options.database,
            fetch: true
        });
        return rows.length > 0;
    }

    async count(
        table: string,
        where?: string,
        params: readonly unknown[] = [],
        options: ScopeOptions = {}
    ): Promise<number> {
        const statement = buildCount(table, where, params);
        const rows = await this.db.execute(statement.sql, statement.params, {
            database: options.database,
            fetch: true
        });
        // COUNT(*) is bigint, which pg hands back as a string
        return Number(rows[0]?.['count'] ?? 0);
    }

    /**
     * Insert `record`, or overwrite `updateFields` of the conflicting row
     */
    async upsert(
        table: string,
        record: Row,
        options: UpsertOptions = {}
    ): Promise<number> {
        const clause = buildUpsertClause(
            options.conflictColumns ?? ['id'],
            options.updateFields ?? Object.keys(record)
        );
        return this.insert(table, record, {
            database: options.database,
            onConflict: clause
        });
    }

    // ===========================================================================
    // Schema helpers
    // ===========================================================================

    async tableExists(table: string, options: ScopeOptions = {}): Promise<boolean> {
        const ref = parseTableName(table);
        const rows = await this.db.execute(
            `SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
            [ref.schema ?? 'public', ref.name],
            { database: options.database, fetch: true }
        );
        return rows.length > 0;
    }

    async tableInfo(table: string, options: ScopeOptions = {}): Promise<ColumnInfo[]> {
        const ref = parseTableName(table);
        const rows = await this.db.execute(
            `SELECT column_name, data_type, is_nullable, column_default, ordinal_position
             FROM information_schema.columns
             WHERE table_schema = $1 AND table_name = $2
             ORDER BY ordinal_position`,
            [ref.schema ?? 'public', ref.name],
            { database: options.database, fetch: true }
        );
        return rows.map((row) => ({
            name: String(row['column_name']),
            type: String(row['data_type']),
            nullable: row['is_nullable'] === 'YES',
            defaultValue: typeof row['column_default'] === 'string' ? row['column_default'] : null,
            position: Number(row['ordinal_position'])
        }));
    }

    async dropTable(table: string, options: DropTableOptions = {}): Promise<void> {
        const quoted = quoteTableName(table);
        const ifExists = options.ifExists ?? true;
        await this.db.execute(
            `DROP TABLE ${ifExists ? 'IF EXISTS ' : ''}${quoted}`,
            [],
            { database: options.database }
        );
        logger.info(`Table ${quoted} dropped`, { module: 'CRUD', entityId: table });
    }

    /**
     * Last sequence value of a freshly checked-out session. Each call gets
     * its own connection, so this does not see a previous insert; use
     * insertReturning() or Transaction.lastInsertId() instead.
     */
    async lastInsertId(options: ScopeOptions = {}): Promise<number> {
        const rows = await this.db.execute('SELECT lastval() AS id', [], {
            database: options.database,
            fetch: true
        });
        return Number(rows[0]?.['id']);
    }

    // ===========================================================================
    // Pagination and batches
    // ===========================================================================

    async paginate(
        table: string,
        page: number,
        perPage: number,
        options: PaginateOptions = {}
    ): Promise<Page> {
        assertPositiveInt('page', page);
        assertPositiveInt('perPage', perPage);

        const offset = (page - 1) * perPage;
        const total = await this.count(table, options.where, options.params, options);
        const data = await this.select(table, {
            database: options.database,
            columns: options.columns,
            where: options.where,
            params: options.params,
            orderBy: options.orderBy,
            limit: perPage,
            offset
        });

        const pageCount = Math.ceil(total / perPage);
        return {
            data,
            pagination: {
                page,
                perPage,
                total,
                pageCount,
                hasNext: page < pageCount,
                hasPrev: page > 1
            }
        };
    }

    /**
     * Update each record by `keyField` inside one transaction. Records
     * with no field besides the key contribute nothing; any failure rolls
     * the whole batch back.
     */
    async batchUpdate(
        table: string,
        records: readonly Row[],
        keyField: string,
        options: ScopeOptions = {}
    ): Promise<number> {
        const keyColumn = quoteIdentifier(keyField);
        quoteTableName(table);

        const total = await this.db.withTransaction(async (tx) => {
            let affected = 0;
            for (const [index, record] of records.entries()) {
                const key = record[keyField];
                if (key === undefined || key === null) {
                    throw new ValidationError(
                        `Record ${String(index)} has no value for key field '${keyField}'`,
                        { index, keyField }
                    );
                }
                const fields = Object.fromEntries(
                    Object.entries(record).filter(([column]) => column !== keyField)
                );
                if (Object.keys(fields).length === 0) {
                    continue;
                }
                const statement = buildUpdate(table, fields, `${keyColumn} = $1`, [key]);
                affected += await tx.execute(statement.sql, statement.params);
            }
            return affected;
        }, options);

        logger.info(`Batch update affected ${String(total)} rows`, {
            module: 'CRUD',
            entityId: table,
            records: records.length
        });
        return total;
    }
}
