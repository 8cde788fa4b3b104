#!/usr/bin/env node
/**
 * tablekit - CLI Entry Point
 *
 * Loads .env, then runs the operator commands against the configured server.
 */

import dotenv from "dotenv";
import { createProgram } from "./cli/program.js";
import { DatabaseClient } from "./client/DatabaseClient.js";
import { resolveConnectionParams } from "./config/resolve.js";
import { CrudClient } from "./crud/CrudClient.js";

dotenv.config();

const program = createProgram({
  connect: () => {
    const db = new DatabaseClient(resolveConnectionParams());
    return { db, crud: new CrudClient(db) };
  },
  write: (line) => {
    process.stdout.write(`${line}\n`);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
