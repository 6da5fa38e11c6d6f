/**
 * WinProv CLI — Install Config Command
 *
 * Usage:
 *   winprov install-config <source> [--dest <path>] [--service <name>]
 */

import { Command } from "commander";
import { WinProvError } from "@winprov/engine";
import { createCliLogger, defaultDeps, loadSettings, type CliDeps } from "../config";
import { colors, formatDuration, printError, printSuccess } from "../output";

export function registerInstallConfigCommand(
  program: Command,
  deps: CliDeps = defaultDeps,
): void {
  program
    .command("install-config <source>")
    .description("Install a monitoring agent config file and restart the agent")
    .option("--dest <path>", "Destination path of the agent config")
    .option("--service <name>", "Windows service to restart")
    .action(async (source: string, opts: { dest?: string; service?: string }) => {
      const logger = createCliLogger(loadSettings(deps));

      try {
        const result = await deps.installConfig(source, {
          destinationPath: opts.dest,
          serviceName: opts.service,
          logger,
        });
        printSuccess(
          `Installed ${colors.path(result.destinationPath)} and restarted ` +
            `${colors.bold(result.serviceName)} ${colors.dim(`(${formatDuration(result.durationMs)})`)}`,
        );
      } catch (err: unknown) {
        if (!(err instanceof WinProvError)) throw err;
        printError(err.message);
        process.exitCode = 1;
      }
    });
}
