/**
 * tablekit - CLI Program
 *
 * Operator commands over DatabaseClient and CrudClient. The entry point
 * (src/cli.ts) supplies the real client factory and output sinks.
 */

import { Command, Option } from "commander";
import type { DatabaseClient } from "../client/DatabaseClient.js";
import type { CrudClient } from "../crud/CrudClient.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";

const VERSION = "0.1.0";

const log = logger.forModule("CLI");

/**
 * Clients a command runs against; closed after every command
 */
export interface CliContext {
  db: Pick<DatabaseClient, "testConnection" | "createDatabase" | "close">;
  crud: Pick<CrudClient, "tableInfo" | "dropTable">;
}

export interface ProgramDeps {
  /** Resolve configuration and build the clients */
  connect: () => CliContext;
  /** Command output (one line per call) */
  write: (line: string) => void;
  setExitCode: (code: number) => void;
}

interface DatabaseOption {
  database?: string;
}

interface DropTableOption extends DatabaseOption {
  ifExists: boolean;
}

/**
 * Run one command: build the clients, map the outcome to an exit code,
 * and close the clients whatever happens
 */
async function run(
  deps: ProgramDeps,
  command: string,
  task: (context: CliContext) => Promise<number>,
): Promise<void> {
  let context: CliContext;
  try {
    context = deps.connect();
  } catch (error) {
    log.error("Configuration failed", {
      operation: command,
      error: error instanceof Error ? error.message : String(error),
    });
    deps.setExitCode(1);
    return;
  }

  try {
    deps.setExitCode(await task(context));
  } catch (error) {
    log.error("Command failed", {
      operation: command,
      error: error instanceof Error ? error.message : String(error),
    });
    deps.setExitCode(1);
  }

  try {
    await context.db.close();
  } catch (error) {
    log.error("Closing the database client failed", {
      operation: command,
      error: error instanceof Error ? error.message : String(error),
    });
    deps.setExitCode(1);
  }
}

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  program
    .name("tablekit")
    .description("Operator commands for a PostgreSQL database")
    .version(VERSION)
    .addOption(
      new Option("--log-level <level>", "Minimum log level (default: info)")
        .choices(LOG_LEVELS)
        .env("LOG_LEVEL"),
    )
    .hook("preAction", () => {
      const { logLevel } = program.opts<{ logLevel?: string }>();
      if (logLevel !== undefined && isLogLevel(logLevel)) {
        logger.setLevel(logLevel);
      }
    });

  program
    .command("ping")
    .description("Check that the server answers SELECT 1")
    .option("--database <name>", "Database to connect to")
    .action(async (options: DatabaseOption) => {
      await run(deps, "ping", async ({ db }) => {
        const ok = await db.testConnection(options.database);
        deps.write(ok ? "ok" : "unreachable");
        return ok ? 0 : 1;
      });
    });

  program
    .command("create-database")
    .description("Create a database unless it already exists")
    .argument("<name>", "Database name")
    .action(async (name: string) => {
      await run(deps, "create-database", async ({ db }) => {
        const created = await db.createDatabase(name);
        deps.write(
          created
            ? `Database '${name}' created`
            : `Database '${name}' already exists`,
        );
        return 0;
      });
    });

  program
    .command("tables-info")
    .description("Print the column layout of a table as JSON")
    .argument("<table>", "Table name, optionally schema-qualified")
    .option("--database <name>", "Database to connect to")
    .action(async (table: string, options: DatabaseOption) => {
      await run(deps, "tables-info", async ({ crud }) => {
        const columns = await crud.tableInfo(table, {
          database: options.database,
        });
        deps.write(JSON.stringify(columns, null, 2));
        return 0;
      });
    });

  program
    .command("drop-table")
    .description("Drop a table")
    .argument("<table>", "Table name, optionally schema-qualified")
    .option("--database <name>", "Database to connect to")
    .option("--no-if-exists", "Fail when the table does not exist")
    .action(async (table: string, options: DropTableOption) => {
      await run(deps, "drop-table", async ({ crud }) => {
        await crud.dropTable(table, {
          database: options.database,
          ifExists: options.ifExists,
        });
        deps.write(`Table '${table}' dropped`);
        return 0;
      });
    });

  return program;
}
