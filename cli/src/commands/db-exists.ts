/**
 * WinProv CLI — Database Existence Command
 *
 * Prints "true" or "false". Exit codes: 0 found, 1 absent, 2 unreachable.
 *
 * Usage:
 *   winprov db-exists <server> <database> [--user <u>] [--password <p>]
 *                     [--port <n>] [--trust-server-certificate]
 */

import { Command, Option } from "commander";
import {
  createCliLogger,
  defaultDeps,
  loadSettings,
  parsePositiveInt,
  type CliDeps,
} from "../config";
import { printError } from "../output";

export const EXIT_ABSENT = 1;
export const EXIT_UNREACHABLE = 2;

interface DbExistsCommandOptions {
  user?: string;
  password?: string;
  port?: number;
  trustServerCertificate: boolean;
}

export function registerDbExistsCommand(
  program: Command,
  deps: CliDeps = defaultDeps,
): void {
  program
    .command("db-exists <server> <database>")
    .description("Check whether a database exists on a SQL Server instance")
    .option("--user <user>", "SQL login name")
    .addOption(
      new Option("--password <password>", "SQL login password").env(
        "WINPROV_DB_PASSWORD",
      ),
    )
    .option("--port <port>", "TCP port", parsePositiveInt)
    .option(
      "--trust-server-certificate",
      "Skip validation of the server's TLS certificate",
      false,
    )
    .action(async (server: string, database: string, opts: DbExistsCommandOptions) => {
      const logger = createCliLogger(loadSettings(deps));

      const result = await deps.dbExists(server, database, {
        user: opts.user,
        password: opts.password,
        port: opts.port,
        trustServerCertificate: opts.trustServerCertificate,
        logger,
      });

      switch (result.status) {
        case "found":
          console.log("true");
          break;
        case "absent":
          console.log("false");
          process.exitCode = EXIT_ABSENT;
          break;
        case "unreachable":
          printError(`Cannot reach ${server}: ${result.error}`);
          process.exitCode = EXIT_UNREACHABLE;
          break;
      }
    });
}
