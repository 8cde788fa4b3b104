/**
 * tablekit - Connection Parameter Resolution
 *
 * Reads connection settings from the environment once and returns an
 * immutable ConnectionParams object for the caller to pass around.
 */

import { z } from "zod";
import type { ConnectionParams } from "../types/index.js";
import { ConfigError } from "../types/index.js";
import { logger } from "../utils/logger.js";

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 5432;
const DEFAULT_POOL_MAX = 10;
const DEFAULT_IDLE_TIMEOUT_MS = 10000;
const DEFAULT_APPLICATION_NAME = "tablekit";

/**
 * Required settings and the variables consulted for each, in priority order
 */
const REQUIRED: Record<"host" | "user" | "password", readonly string[]> = {
  host: ["DB_HOST", "PGHOST"],
  user: ["DB_USER", "PGUSER"],
  password: ["DB_PASSWORD", "PGPASSWORD"],
};

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  host: z.string().min(1),
  user: z.string().min(1),
  password: z.string().min(1),
  database: z.string().min(1).optional(),
  port: positiveInt.max(65535).default(DEFAULT_PORT),
  poolMax: positiveInt.default(DEFAULT_POOL_MAX),
  idleTimeoutMillis: positiveInt.default(DEFAULT_IDLE_TIMEOUT_MS),
  statementTimeout: positiveInt.optional(),
  applicationName: z.string().min(1).default(DEFAULT_APPLICATION_NAME),
});

/**
 * First non-blank value among the given variable names, trimmed unless
 * `raw` is set (passwords keep their surrounding whitespace)
 */
function pick(
  env: Env,
  names: readonly string[],
  raw = false,
): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      return raw ? value : value.trim();
    }
  }
  return undefined;
}

/**
 * Resolve connection parameters from the environment.
 *
 * @throws ConfigError when host, user or password is absent, or a numeric
 *   setting is not a positive integer
 */
export function resolveConnectionParams(
  env: Env = process.env,
): ConnectionParams {
  const missing = Object.values(REQUIRED)
    .filter((names) => pick(env, names) === undefined)
    .map((names) => names[0] ?? "");

  if (missing.length > 0) {
    logger.error("Missing required database environment variables", {
      module: "CONFIG",
      code: "CONFIG_MISSING",
      missing,
    });
    throw new ConfigError(
      `Missing required database environment variables: ${missing.join(", ")}`,
      { missing },
    );
  }

  const parsed = EnvSchema.safeParse({
    host: pick(env, REQUIRED.host),
    user: pick(env, REQUIRED.user),
    password: pick(env, REQUIRED.password, true),
    database: pick(env, ["DB_NAME", "PGDATABASE"]),
    port: pick(env, ["DB_PORT", "PGPORT"]),
    poolMax: pick(env, ["DB_POOL_MAX"]),
    idleTimeoutMillis: pick(env, ["DB_POOL_IDLE_TIMEOUT_MS"]),
    statementTimeout: pick(env, ["DB_STATEMENT_TIMEOUT_MS"]),
    applicationName: pick(env, ["DB_APPLICATION_NAME"]),
  });

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(
      `Invalid database configuration: ${invalid.join(", ")}`,
      { invalid },
    );
  }

  const settings = parsed.data;
  return Object.freeze({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
    encoding: "UTF8" as const,
    autocommit: false as const,
    pool: Object.freeze({
      max: settings.poolMax,
      idleTimeoutMillis: settings.idleTimeoutMillis,
    }),
    statementTimeout: settings.statementTimeout,
    applicationName: settings.applicationName,
  });
}
