/**
 * tablekit - Scoped Connection and Cursor
 *
 * A checked-out client with autocommit disabled: the first statement opens
 * a transaction that stays open until commit(), rollback() or close().
 */

import type { PoolClient } from 'pg';
import type { ConnectionPool } from '../pool/ConnectionPool.js';
import type { Row, StatementResult, TupleRow } from '../types/index.js';
import { StatementError, TransactionError } from '../types/index.js';
import { logger } from '../utils/logger.js';

function sqlState(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class ScopedConnection {
    private open = true;
    private transactionOpen = false;
    private discard = false;

    constructor(
        private readonly client: PoolClient,
        private readonly pool: ConnectionPool,
        readonly database: string | undefined
    ) { }

    get isConnected(): boolean {
        return this.open;
    }

    get inTransaction(): boolean {
        return this.transactionOpen;
    }

    private ensureOpen(): void {
        if (!this.open) {
            throw new TransactionError('Connection scope has already been closed', {
                database: this.database
            });
        }
    }

    /**
     * Send a transaction control statement; resolves with the command tag
     * the server answered with
     */
    private async control(command: 'BEGIN' | 'COMMIT' | 'ROLLBACK'): Promise<string> {
        this.pool.recordQuery();
        try {
            const result = await this.client.query(command);
            return result.command;
        } catch (error) {
            logger.error(`${command} failed`, {
                module: 'TRANSACTION',
                code: 'PG_TX_FAILED',
                database: this.database,
                error: errorMessage(error)
            });
            throw new TransactionError(`${command} failed: ${errorMessage(error)}`, {
                database: this.database,
                sqlState: sqlState(error)
            }, { cause: error });
        }
    }

    /**
     * Open a transaction explicitly; a no-op when one is already open
     */
    async begin(): Promise<void> {
        this.ensureOpen();
        if (this.transactionOpen) {
            return;
        }
        await this.control('BEGIN');
        this.transactionOpen = true;
    }

    /**
     * Commit the open transaction; a no-op when nothing is open.
     *
     * @throws TransactionError when the server answers COMMIT with a
     *   rollback, which it does once any statement of the transaction failed
     */
    async commit(): Promise<void> {
        this.ensureOpen();
        if (!this.transactionOpen) {
            return;
        }
        const tag = await this.control('COMMIT');
        this.transactionOpen = false;
        if (tag !== 'COMMIT') {
            logger.error('Transaction was rolled back by the server', {
                module: 'TRANSACTION',
                code: 'PG_TX_ABORTED',
                database: this.database,
                command: tag
            });
            throw new TransactionError('Transaction was rolled back by the server', {
                database: this.database,
                command: tag
            });
        }
    }

    /**
     * Roll back the open transaction; a no-op when nothing is open
     */
    async rollback(): Promise<void> {
        this.ensureOpen();
        if (!this.transactionOpen) {
            return;
        }
        try {
            await this.control('ROLLBACK');
        } catch (error) {
            // session state is unknown from here on
            this.discard = true;
            throw error;
        } finally {
            this.transactionOpen = false;
        }
    }

    /**
     * Roll back on a failure path. A failing ROLLBACK is logged and the
     * client is discarded so the failure that got us here is the one raised.
     */
    async abort(): Promise<void> {
        if (!this.open) {
            return;
        }
        try {
            await this.rollback();
        } catch (error) {
            logger.error('Rollback failed; connection will be discarded', {
                module: 'TRANSACTION',
                database: this.database,
                error: errorMessage(error)
            });
        }
    }

    /**
     * Release the client to the pool exactly once. An uncommitted
     * transaction is rolled back first.
     */
    async close(): Promise<void> {
        if (!this.open) {
            return;
        }
        if (this.transactionOpen) {
            await this.abort();
        }
        this.open = false;
        this.pool.releaseConnection(this.client, this.discard);
    }

    private async run<R>(sql: string, send: () => Promise<StatementResult<R>>): Promise<StatementResult<R>> {
        this.ensureOpen();
        if (!this.transactionOpen) {
            await this.begin();
        }

        const startTime = Date.now();
        this.pool.recordQuery();

        try {
            const result = await send();
            logger.debug('Statement executed', {
                module: 'QUERY',
                sql: sql.substring(0, 100),
                rowCount: result.rowCount,
                durationMs: Date.now() - startTime
            });
            return result;
        } catch (error) {
            logger.error('Statement failed', {
                module: 'QUERY',
                code: 'PG_EXEC_FAILED',
                sql: sql.substring(0, 100),
                error: errorMessage(error)
            });
            throw new StatementError(`Statement failed: ${errorMessage(error)}`, {
                sql,
                sqlState: sqlState(error)
            }, { cause: error });
        }
    }

    /**
     * Run a statement returning rows as column -> value mappings
     */
    async query(sql: string, params: readonly unknown[] = []): Promise<StatementResult<Row>> {
        return this.run(sql, async () => {
            const result = await this.client.query<Row>(sql, [...params]);
            return { rows: result.rows, rowCount: result.rowCount ?? 0, command: result.command };
        });
    }

    /**
     * Run a statement returning rows as positional tuples
     */
    async queryTuples(sql: string, params: readonly unknown[] = []): Promise<StatementResult<TupleRow>> {
        return this.run(sql, async () => {
            const result = await this.client.query<TupleRow>({ text: sql, values: [...params], rowMode: 'array' });
            return { rows: result.rows, rowCount: result.rowCount ?? 0, command: result.command };
        });
    }
}

/**
 * Execution context bound to one scoped connection and one row shape
 */
export class Cursor<R> {
    private closed = false;
    private last: StatementResult<R> | null = null;

    constructor(
        private readonly send: (sql: string, params: readonly unknown[]) => Promise<StatementResult<R>>
    ) { }

    /**
     * Cursor returning column -> value mappings
     */
    static dictionary(connection: ScopedConnection): Cursor<Row> {
        return new Cursor((sql, params) => connection.query(sql, params));
    }

    /**
     * Cursor returning positional tuples
     */
    static tuples(connection: ScopedConnection): Cursor<TupleRow> {
        return new Cursor((sql, params) => connection.queryTuples(sql, params));
    }

    get isClosed(): boolean {
        return this.closed;
    }

    async execute(sql: string, params: readonly unknown[] = []): Promise<StatementResult<R>> {
        if (this.closed) {
            throw new TransactionError('Cursor has already been closed');
        }
        this.last = await this.send(sql, params);
        return this.last;
    }

    /**
     * Rows of the last statement
     */
    fetchAll(): R[] {
        return this.last?.rows ?? [];
    }

    /**
     * Affected or returned row count of the last statement
     */
    get rowCount(): number {
        return this.last?.rowCount ?? 0;
    }

    close(): void {
        this.closed = true;
        this.last = null;
    }
}
