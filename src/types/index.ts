/**
 * tablekit - Type Definitions
 */

export type {
  Row,
  TupleRow,
  PoolConfig,
  ConnectionParams,
  PoolStats,
  HealthStatus,
  StatementResult,
  ColumnInfo,
} from "./database.js";

export {
  TablekitError,
  ConfigError,
  ConnectionError,
  PoolError,
  StatementError,
  ValidationError,
  TransactionError,
} from "./errors.js";
