/**
 * tablekit - Database Types
 *
 * Connection parameters, pool statistics and statement result types.
 */

/**
 * A row fetched in dictionary mode (column name -> value)
 */
export type Row = Record<string, unknown>;

/**
 * A row fetched in tuple mode (values in select-list order)
 */
export type TupleRow = unknown[];

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections per database pool (default: 10) */
  max: number;

  /** Idle timeout before closing connection in ms (default: 10000) */
  idleTimeoutMillis: number;

  /** Connection timeout in ms (default: 0 = driver default) */
  connectionTimeoutMillis?: number | undefined;
}

/**
 * Resolved connection parameters. Built once at startup and passed
 * explicitly to the pool; never mutated afterwards.
 */
export interface ConnectionParams {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;

  /** Default database; omitted means the server default for the user */
  readonly database?: string | undefined;

  readonly encoding: "UTF8";
  readonly autocommit: false;

  readonly pool: Readonly<PoolConfig>;
  readonly statementTimeout?: number | undefined;
  readonly applicationName: string;
}

/**
 * Connection pool statistics
 */
export interface PoolStats {
  /** Total connections across all database pools */
  total: number;

  /** Active connections (checked out) */
  active: number;

  /** Idle connections (available) */
  idle: number;

  /** Waiting checkout requests */
  waiting: number;

  /** Total statements executed through the pool */
  totalQueries: number;

  /** Connection counts per database ("" = server default) */
  databases: Record<string, { total: number; idle: number; waiting: number }>;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  version?: string | undefined;
  poolStats?: PoolStats | undefined;
  details?: Record<string, unknown> | undefined;
  error?: string | undefined;
}

/**
 * Outcome of a single statement on a scoped connection
 */
export interface StatementResult<R> {
  rows: R[];
  /** Rows affected (INSERT/UPDATE/DELETE) or returned; 0 when the server reports none */
  rowCount: number;
  command: string;
}

/**
 * Column metadata information
 */
export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  defaultValue: string | null;
  position: number;
}
