/**
 * tablekit - Error Types
 *
 * Custom error classes for tablekit operations.
 */

/**
 * Base error class for tablekit
 */
export class TablekitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TablekitError";
  }
}

/**
 * Missing or malformed connection parameter
 */
export class ConfigError extends TablekitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/**
 * Database connection error (unreachable server, rejected credentials)
 */
export class ConnectionError extends TablekitError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "CONNECTION_ERROR", details, options);
    this.name = "ConnectionError";
  }
}

/**
 * Connection pool error
 */
export class PoolError extends TablekitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "POOL_ERROR", details);
    this.name = "PoolError";
  }
}

/**
 * Statement rejected by the server
 */
export class StatementError extends TablekitError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "STATEMENT_ERROR", details, options);
    this.name = "StatementError";
  }
}

/**
 * Validation error for input parameters
 */
export class ValidationError extends TablekitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Transaction error
 */
export class TransactionError extends TablekitError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSACTION_ERROR", details, options);
    this.name = "TransactionError";
  }
}
