/**
 * tablekit - PostgreSQL convenience layer
 *
 * Scoped connections, transactions and CRUD statement assembly over pg.
 *
 * @module tablekit
 */

// Export types
export * from "./types/index.js";

// Export configuration
export { resolveConnectionParams } from "./config/resolve.js";

// Export clients
export { ConnectionPool } from "./pool/ConnectionPool.js";
export { DatabaseClient } from "./client/DatabaseClient.js";
export type {
  ScopeOptions,
  CursorOptions,
  ExecuteOptions,
  CursorBlock,
} from "./client/DatabaseClient.js";
export { ScopedConnection, Cursor } from "./client/ScopedConnection.js";
export { Transaction } from "./client/Transaction.js";
export { CrudClient } from "./crud/CrudClient.js";
export type {
  InsertOptions,
  InsertReturningOptions,
  SelectOptions,
  DeleteOptions,
  UpsertOptions,
  DropTableOptions,
  PaginateOptions,
  Pagination,
  Page,
} from "./crud/CrudClient.js";

// Export utilities
export {
  InvalidIdentifierError,
  quoteIdentifier,
  quoteTableName,
  parseTableName,
} from "./utils/identifiers.js";
export type { TableRef } from "./utils/identifiers.js";
export { UnsafeFragmentError, validateWhereClause } from "./utils/where-clause.js";
export { logger } from "./utils/logger.js";
export type { LogLevel, LogModule } from "./utils/logger.js";
