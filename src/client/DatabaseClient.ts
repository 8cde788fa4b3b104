/**
 * tablekit - Database Client
 *
 * Scoped statement execution over the connection pool: one checkout per
 * operation (or per transaction), commit-or-rollback on every exit path,
 * and release exactly once.
 */

import { ConnectionPool } from '../pool/ConnectionPool.js';
import { ScopedConnection, Cursor } from './ScopedConnection.js';
import { Transaction } from './Transaction.js';
import type {
    ConnectionParams,
    HealthStatus,
    PoolStats,
    Row,
    TupleRow
} from '../types/index.js';
import { StatementError } from '../types/index.js';
import { quoteIdentifier } from '../utils/identifiers.js';
import { logger } from '../utils/logger.js';

export interface ScopeOptions {
    /** Database to connect to; defaults to the configured one */
    database?: string | undefined;
}

export interface CursorOptions extends ScopeOptions {
    /** Rows as column -> value mappings (default) or positional tuples */
    dictionary?: boolean | undefined;
}

export interface ExecuteOptions extends CursorOptions {
    /** Return fetched rows instead of the affected row count */
    fetch?: boolean | undefined;
}

export type CursorBlock<R, T> = (connection: ScopedConnection, cursor: Cursor<R>) => Promise<T>;

export class DatabaseClient {
    readonly pool: ConnectionPool;

    constructor(readonly params: ConnectionParams, pool?: ConnectionPool) {
        this.pool = pool ?? new ConnectionPool(params);
    }

    // =========================================================================
    // Scoped cursor
    // =========================================================================

    /**
     * Run `block` with a connection and cursor that live only for the call.
     * A throw rolls the connection back before it propagates; the cursor
     * and then the connection are closed on every exit.
     */
    withCursor<T>(block: CursorBlock<TupleRow, T>, options: ScopeOptions & { dictionary: false }): Promise<T>;
    withCursor<T>(block: CursorBlock<Row, T>, options?: ScopeOptions & { dictionary?: true | undefined }): Promise<T>;
    async withCursor<T>(block: CursorBlock<Row | TupleRow, T>, options: CursorOptions = {}): Promise<T> {
        const client = await this.pool.getConnection(options.database);
        const connection = new ScopedConnection(client, this.pool, this.pool.resolveDatabase(options.database));
        const cursor = options.dictionary === false
            ? Cursor.tuples(connection)
            : Cursor.dictionary(connection);

        try {
            return await block(connection, cursor);
        } catch (error) {
            logger.error('Database operation failed', {
                module: 'QUERY',
                database: connection.database,
                error: error instanceof Error ? error.message : String(error)
            });
            await connection.abort();
            throw error;
        } finally {
            cursor.close();
            await connection.close();
        }
    }

    // =========================================================================
    // Statement execution
    // =========================================================================

    /**
     * Run one statement. With `fetch` the rows are returned; otherwise the
     * statement is committed and its affected row count returned.
     */
    execute(sql: string, params: readonly unknown[] | undefined, options: ScopeOptions & { fetch: true; dictionary: false }): Promise<TupleRow[]>;
    execute(sql: string, params: readonly unknown[] | undefined, options: ScopeOptions & { fetch: true; dictionary?: true | undefined }): Promise<Row[]>;
    execute(sql: string, params?: readonly unknown[], options?: CursorOptions & { fetch?: false | undefined }): Promise<number>;
    async execute(sql: string, params: readonly unknown[] = [], options: ExecuteOptions = {}): Promise<Row[] | TupleRow[] | number> {
        const scope: ScopeOptions = { database: options.database };

        if (options.fetch === true) {
            if (options.dictionary === false) {
                return this.withCursor(
                    (connection, cursor) => this.fetchAll(connection, cursor, sql, params),
                    { ...scope, dictionary: false }
                );
            }
            return this.withCursor((connection, cursor) => this.fetchAll(connection, cursor, sql, params), scope);
        }

        return this.withCursor(async (connection, cursor) => {
            await cursor.execute(sql, params);
            await connection.commit();
            const affected = cursor.rowCount;
            logger.info(`Query executed successfully, ${String(affected)} rows affected`, { module: 'QUERY' });
            return affected;
        }, scope);
    }

    private async fetchAll<R>(
        connection: ScopedConnection,
        cursor: Cursor<R>,
        sql: string,
        params: readonly unknown[]
    ): Promise<R[]> {
        await cursor.execute(sql, params);
        // commits RETURNING writes; a no-op cost for plain reads
        await connection.commit();
        const rows = cursor.fetchAll();
        logger.info(`Query returned ${String(rows.length)} rows`, { module: 'QUERY' });
        return rows;
    }

    /**
     * Run one statement once per parameter tuple on a single connection,
     * commit once, and return the total affected row count
     */
    async executeBatch(
        sql: string,
        paramList: readonly (readonly unknown[])[],
        options: ScopeOptions = {}
    ): Promise<number> {
        if (paramList.length === 0) {
            return 0;
        }

        return this.withCursor(async (connection, cursor) => {
            let affected = 0;
            for (const params of paramList) {
                await cursor.execute(sql, params);
                affected += cursor.rowCount;
            }
            await connection.commit();
            logger.info(`Batch query executed successfully, ${String(affected)} rows affected`, {
                module: 'QUERY',
                statements: paramList.length
            });
            return affected;
        }, { database: options.database });
    }

    // =========================================================================
    // Transaction scope
    // =========================================================================

    /**
     * Run `block` inside one transaction on one connection: commit on
     * normal return, roll back and re-throw on failure, always release.
     */
    async withTransaction<T>(block: (tx: Transaction) => Promise<T>, options: ScopeOptions = {}): Promise<T> {
        const client = await this.pool.getConnection(options.database);
        const connection = new ScopedConnection(client, this.pool, this.pool.resolveDatabase(options.database));

        try {
            await connection.begin();
            const result = await block(new Transaction(connection));
            await connection.commit();
            logger.info('Transaction committed', { module: 'TRANSACTION', database: connection.database });
            return result;
        } catch (error) {
            logger.error('Transaction rolled back', {
                module: 'TRANSACTION',
                database: connection.database,
                error: error instanceof Error ? error.message : String(error)
            });
            await connection.abort();
            throw error;
        } finally {
            await connection.close();
        }
    }

    // =========================================================================
    // Server-level helpers
    // =========================================================================

    /**
     * Health probe: true when `SELECT 1` round-trips. Never throws.
     */
    async testConnection(database?: string): Promise<boolean> {
        try {
            const rows = await this.execute('SELECT 1', [], { database, fetch: true, dictionary: false });
            return rows[0]?.[0] === 1;
        } catch (error) {
            logger.error('Connection test failed', {
                module: 'POOL',
                error: error instanceof Error ? error.message : String(error)
            });
            return false;
        }
    }

    /**
     * Create a database unless it already exists. Returns true when created.
     */
    async createDatabase(name: string): Promise<boolean> {
        const quoted = quoteIdentifier(name);
        const existing = await this.execute(
            'SELECT 1 FROM pg_database WHERE datname = $1',
            [name],
            { fetch: true }
        );
        if (existing.length > 0) {
            logger.info(`Database '${name}' already exists`, { module: 'QUERY' });
            return false;
        }

        // CREATE DATABASE cannot run inside a transaction block
        const client = await this.pool.getConnection();
        const sql = `CREATE DATABASE ${quoted}`;
        try {
            this.pool.recordQuery();
            await client.query(sql);
            logger.info(`Database '${name}' created successfully`, { module: 'QUERY' });
            return true;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('CREATE DATABASE failed', { module: 'QUERY', entityId: name, error: message });
            throw new StatementError(`Statement failed: ${message}`, { sql }, { cause: error });
        } finally {
            this.pool.releaseConnection(client);
        }
    }

    getStats(): PoolStats {
        return this.pool.getStats();
    }

    checkHealth(database?: string): Promise<HealthStatus> {
        return this.pool.checkHealth(database);
    }

    async close(): Promise<void> {
        await this.pool.shutdown();
    }
}
