/**
 * tablekit - Transaction Handle
 *
 * Handed to withTransaction() callers. Every statement runs on the one
 * connection the transaction owns; there is no way to start a nested one.
 */

import type { ScopedConnection } from './ScopedConnection.js';
import type { Row } from '../types/index.js';

export class Transaction {
    constructor(private readonly connection: ScopedConnection) { }

    get database(): string | undefined {
        return this.connection.database;
    }

    /**
     * Run a write statement and return the affected row count
     */
    async execute(sql: string, params: readonly unknown[] = []): Promise<number> {
        const result = await this.connection.query(sql, params);
        return result.rowCount;
    }

    /**
     * Run a statement and return its rows
     */
    async query(sql: string, params: readonly unknown[] = []): Promise<Row[]> {
        const result = await this.connection.query(sql, params);
        return result.rows;
    }

    /**
     * Key generated by the most recent sequence-backed insert in this
     * transaction's session
     */
    async lastInsertId(): Promise<number> {
        const rows = await this.query('SELECT lastval() AS id');
        return Number(rows[0]?.['id']);
    }
}
