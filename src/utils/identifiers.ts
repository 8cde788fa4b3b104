/**
 * tablekit - Identifier Sanitization Utilities
 *
 * Table and column names are interpolated into statement text, so every
 * operation validates them here before any connection is made.
 *
 * Accepted identifiers:
 * - Letters, digits, underscores and hyphens only
 * - Maximum length: 63 bytes (NAMEDATALEN - 1)
 * - Always emitted double-quoted, so case and hyphens are preserved
 */

import { ValidationError } from "../types/errors.js";

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Maximum identifier length in PostgreSQL (NAMEDATALEN - 1)
 */
const MAX_IDENTIFIER_LENGTH = 63;

/**
 * Error thrown when an identifier is invalid
 */
export class InvalidIdentifierError extends ValidationError {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`, {
      identifier,
      reason,
    });
    this.name = "InvalidIdentifierError";
  }
}

/**
 * Validate a single identifier
 *
 * @throws InvalidIdentifierError if the identifier is invalid
 */
export function validateIdentifier(name: string): void {
  if (typeof name !== "string" || name === "") {
    throw new InvalidIdentifierError(
      String(name),
      "Identifier must be a non-empty string",
    );
  }

  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(MAX_IDENTIFIER_LENGTH)} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new InvalidIdentifierError(
      name,
      "Identifier may only contain letters, digits, underscores or hyphens",
    );
  }
}

/**
 * Validate and double-quote an identifier
 *
 * @example
 * quoteIdentifier('users') // Returns: "users"
 * quoteIdentifier('audit-log') // Returns: "audit-log"
 * quoteIdentifier('users; DROP TABLE x') // Throws: InvalidIdentifierError
 */
export function quoteIdentifier(name: string): string {
  validateIdentifier(name);
  return `"${name}"`;
}

/**
 * A table reference split into its optional schema and name
 */
export interface TableRef {
  schema?: string | undefined;
  name: string;
}

/**
 * Parse and validate `table` or `schema.table`
 */
export function parseTableName(table: string): TableRef {
  if (typeof table !== "string") {
    throw new InvalidIdentifierError(String(table), "Table name must be a string");
  }
  const parts = table.split(".");
  if (parts.length === 2) {
    const [schema = "", name = ""] = parts;
    validateIdentifier(schema);
    validateIdentifier(name);
    return { schema, name };
  }
  if (parts.length > 2) {
    throw new InvalidIdentifierError(
      table,
      "Table name may contain at most one schema qualifier",
    );
  }
  validateIdentifier(table);
  return { name: table };
}

/**
 * Sanitize a possibly schema-qualified table name
 *
 * @example
 * quoteTableName('users') // Returns: "users"
 * quoteTableName('sales.orders') // Returns: "sales"."orders"
 */
export function quoteTableName(table: string): string {
  const ref = parseTableName(table);
  return ref.schema !== undefined
    ? `"${ref.schema}"."${ref.name}"`
    : `"${ref.name}"`;
}

/**
 * Create a safe column list for SELECT statements; `*` passes through
 *
 * @example
 * createColumnList(['id', 'name']) // Returns: "id", "name"
 */
export function createColumnList(columns: readonly string[]): string {
  if (columns.length === 0) {
    throw new InvalidIdentifierError("", "Column list must not be empty");
  }
  return columns
    .map((column) => (column === "*" ? "*" : quoteIdentifier(column)))
    .join(", ");
}
