/**
 * tablekit - Connection Pool Manager
 *
 * Wraps pg connection pooling with per-database pools, statistics
 * tracking, health checks and graceful shutdown.
 */

import pg from 'pg';
import type { PoolClient } from 'pg';
import type { ConnectionParams, PoolStats, HealthStatus } from '../types/index.js';
import { PoolError, ConnectionError } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Key of the pool used when no database is named
 */
const SERVER_DEFAULT = '';

/**
 * Bounded pools keyed by database name. A checked-out client is owned
 * exclusively by the scope that checked it out until it is released.
 */
export class ConnectionPool {
    private pools = new Map<string, pg.Pool>();
    private readonly params: ConnectionParams;
    private totalQueries = 0;
    private shuttingDown = false;

    constructor(params: ConnectionParams) {
        this.params = params;
    }

    /**
     * Database a checkout targets: the explicit name, else the configured default
     */
    resolveDatabase(database?: string): string | undefined {
        return database ?? this.params.database;
    }

    private poolFor(database: string | undefined): pg.Pool {
        const key = database ?? SERVER_DEFAULT;
        const existing = this.pools.get(key);
        if (existing !== undefined) {
            return existing;
        }

        const poolConfig: pg.PoolConfig = {
            host: this.params.host,
            port: this.params.port,
            user: this.params.user,
            password: this.params.password,
            max: this.params.pool.max,
            idleTimeoutMillis: this.params.pool.idleTimeoutMillis,
            allowExitOnIdle: true,
            client_encoding: this.params.encoding,
            application_name: this.params.applicationName
        };

        if (database !== undefined) {
            poolConfig.database = database;
        }

        if (this.params.pool.connectionTimeoutMillis !== undefined) {
            poolConfig.connectionTimeoutMillis = this.params.pool.connectionTimeoutMillis;
        }

        if (this.params.statementTimeout !== undefined) {
            poolConfig.statement_timeout = this.params.statementTimeout;
        }

        const pool = new pg.Pool(poolConfig);

        pool.on('connect', () => {
            logger.debug('New connection established', { module: 'POOL', entityId: key });
        });

        // Idle clients can error when the server goes away; pg requires a listener
        pool.on('error', (err) => {
            logger.error('Pool error', { module: 'POOL', entityId: key, error: err.message });
        });

        this.pools.set(key, pool);
        return pool;
    }

    /**
     * Check out a connection, bound to `database` or the configured default
     *
     * @throws ConnectionError if the server is unreachable or rejects the credentials
     */
    async getConnection(database?: string): Promise<PoolClient> {
        if (this.shuttingDown) {
            throw new PoolError('Connection pool is shutting down');
        }

        const target = this.resolveDatabase(database);
        const dbInfo = target !== undefined ? `database '${target}'` : 'server';

        try {
            const client = await this.poolFor(target).connect();
            logger.info(`Connected to ${dbInfo}`, { module: 'POOL' });
            return client;
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            logger.error('Failed to connect to database', {
                module: 'POOL',
                code: 'PG_CONNECT_FAILED',
                host: this.params.host,
                database: target,
                error: message
            });
            throw new ConnectionError(
                `Failed to connect to ${dbInfo}: ${message}`,
                { host: this.params.host, database: target },
                { cause: error }
            );
        }
    }

    /**
     * Return a connection to its pool. With `discard` the client is
     * destroyed instead, e.g. when its session state is unknown.
     */
    releaseConnection(client: PoolClient, discard = false): void {
        try {
            client.release(discard);
            logger.info(discard ? 'Database connection discarded' : 'Database connection released', {
                module: 'POOL'
            });
        } catch (error) {
            logger.warn('Error releasing connection', {
                module: 'POOL',
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    }

    /**
     * Count a statement sent through a checked-out client
     */
    recordQuery(): void {
        this.totalQueries++;
    }

    /**
     * Get pool statistics summed across database pools
     */
    getStats(): PoolStats {
        const stats: PoolStats = {
            total: 0,
            active: 0,
            idle: 0,
            waiting: 0,
            totalQueries: this.totalQueries,
            databases: {}
        };

        for (const [key, pool] of this.pools) {
            stats.total += pool.totalCount;
            stats.idle += pool.idleCount;
            stats.waiting += pool.waitingCount;
            stats.databases[key] = {
                total: pool.totalCount,
                idle: pool.idleCount,
                waiting: pool.waitingCount
            };
        }
        stats.active = stats.total - stats.idle;

        return stats;
    }

    /**
     * Check server health through the pool for `database`
     */
    async checkHealth(database?: string): Promise<HealthStatus> {
        if (this.shuttingDown) {
            return {
                connected: false,
                error: 'Pool is shutting down'
            };
        }

        const startTime = Date.now();

        try {
            const result = await this.poolFor(this.resolveDatabase(database))
                .query<{ version?: string; current_database?: string }>('SELECT version(), current_database()');
            this.totalQueries++;
            const latencyMs = Date.now() - startTime;
            const row = result.rows[0];

            return {
                connected: true,
                latencyMs,
                version: row?.version,
                poolStats: this.getStats(),
                details: {
                    database: row?.current_database
                }
            };
        } catch (error) {
            return {
                connected: false,
                error: error instanceof Error ? error.message : 'Unknown error',
                latencyMs: Date.now() - startTime
            };
        }
    }

    /**
     * Gracefully shut down every database pool
     */
    async shutdown(): Promise<void> {
        if (this.shuttingDown) {
            return;
        }

        logger.info('Shutting down connection pool...', { module: 'POOL' });
        this.shuttingDown = true;

        const pools = [...this.pools.values()];
        this.pools.clear();

        try {
            await Promise.all(pools.map(pool => pool.end()));
            logger.info('Connection pool shut down successfully', { module: 'POOL' });
        } catch (error) {
            logger.error('Error during pool shutdown', {
                module: 'POOL',
                error: error instanceof Error ? error.message : 'Unknown error'
            });
            throw error;
        }
    }

    /**
     * Check if pool is shutting down
     */
    isClosing(): boolean {
        return this.shuttingDown;
    }
}
