/**
 * WinProv CLI — Program
 *
 * Builds the commander program. Kept apart from the entry point so tests
 * can parse argument lists against fake engine calls.
 */

import { Command } from "commander";
import { defaultDeps, type CliDeps } from "./config";
import { registerFetchCommand } from "./commands/fetch";
import { registerInstallConfigCommand } from "./commands/install-config";
import { registerMetadataCommand } from "./commands/metadata";
import { registerDbExistsCommand } from "./commands/db-exists";
import { setDebugMode } from "./output";

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name("winprov")
    .description("Provisioning helpers for Windows instances: artifacts, agent config, metadata, SQL Server")
    .version("0.1.0")
    .option("--debug", "Write structured engine logs to stderr", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
    });

  registerFetchCommand(program, deps);
  registerInstallConfigCommand(program, deps);
  registerMetadataCommand(program, deps);
  registerDbExistsCommand(program, deps);

  return program;
}
