/**
 * tablekit - SQL Fragment Validation
 *
 * WHERE and ORDER BY fragments are caller-written SQL. They are trusted,
 * but screened with a blocklist for patterns that only make sense as an
 * injection: a second statement, comments, UNION SELECT and friends.
 */

import { ValidationError } from "../types/errors.js";

export type FragmentKind = "WHERE" | "ORDER BY";

/**
 * Error thrown when an unsafe fragment is detected
 */
export class UnsafeFragmentError extends ValidationError {
  constructor(
    public readonly kind: FragmentKind,
    reason: string,
  ) {
    super(`Unsafe ${kind} clause: ${reason}`, { kind, reason });
    this.name = "UnsafeFragmentError";
  }
}

const DANGEROUS_PATTERNS: { pattern: RegExp; reason: string }[] = [
  {
    pattern:
      /;\s*(DROP|DELETE|TRUNCATE|INSERT|UPDATE|CREATE|ALTER|GRANT|REVOKE)/i,
    reason: "contains statement terminator followed by dangerous keyword",
  },
  {
    pattern: /;\s*$/,
    reason: "contains trailing semicolon",
  },
  {
    pattern: /--/,
    reason: "contains SQL line comment",
  },
  {
    pattern: /\/\*/,
    reason: "contains SQL block comment",
  },
  {
    pattern: /\bUNION\s+(ALL\s+)?SELECT\b/i,
    reason: "contains UNION SELECT",
  },
  {
    pattern: /\bpg_sleep\s*\(/i,
    reason: "contains time-based injection function",
  },
  {
    pattern: /\bpg_read_file\s*\(/i,
    reason: "contains file read function",
  },
  {
    pattern: /\bpg_read_binary_file\s*\(/i,
    reason: "contains binary file read function",
  },
  {
    pattern: /\bpg_ls_dir\s*\(/i,
    reason: "contains directory listing function",
  },
  {
    pattern: /\blo_(import|export)\s*\(/i,
    reason: "contains large object file function",
  },
  {
    pattern: /\bCOPY\s+.*\s+(FROM|TO)\s+PROGRAM\b/i,
    reason: "contains COPY PROGRAM (command execution)",
  },
];

/**
 * Validates a fragment against the blocklist
 *
 * @throws UnsafeFragmentError if a dangerous pattern is detected
 *
 * @example
 * validateFragment("price > $1", "WHERE");            // OK
 * validateFragment("1=1; DROP TABLE users;--", "WHERE"); // Throws
 */
export function validateFragment(fragment: string, kind: FragmentKind): void {
  if (typeof fragment !== "string" || fragment.trim() === "") {
    throw new UnsafeFragmentError(kind, "clause must be a non-empty string");
  }

  for (const { pattern, reason } of DANGEROUS_PATTERNS) {
    if (pattern.test(fragment)) {
      throw new UnsafeFragmentError(kind, reason);
    }
  }
}

export function validateWhereClause(where: string): void {
  validateFragment(where, "WHERE");
}

/**
 * String literals ('...' with '' escapes), quoted identifiers and
 * dollar-quoted bodies ($$...$$, $tag$...$tag$) are matched whole so that
 * only a bare `$n` is captured.
 */
const PLACEHOLDER_SCAN =
  /'(?:[^']|'')*'|"(?:[^"]|"")*"|(\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$)[\s\S]*?\1|\$(\d+)/g;

/**
 * Renumber positional placeholders so a fragment written against its own
 * params ($1..$n) can follow `offset` parameters of the enclosing statement.
 * A `$n` inside a quoted literal or dollar-quoted body is left as written.
 *
 * @example
 * shiftPlaceholders("id = $1 AND org = $2", 3) // "id = $4 AND org = $5"
 */
export function shiftPlaceholders(fragment: string, offset: number): string {
  if (offset === 0) {
    return fragment;
  }
  return fragment.replace(
    PLACEHOLDER_SCAN,
    (match: string, _tag: string | undefined, index: string | undefined) =>
      index === undefined ? match : `$${String(Number(index) + offset)}`,
  );
}
