/**
 * WinProv Engine — Monitoring Agent Config Installer
 *
 * Copies a CloudWatch agent configuration file into place and restarts the
 * agent service so it picks the file up.
 */

import * as fs from "fs";
import * as path from "path";
import { exec } from "child_process";
import { promisify } from "util";
import { DEFAULT_AGENT_CONFIG_PATH, DEFAULT_AGENT_SERVICE } from "./config";
import { ConfigInstallError, errorMessage } from "./errors";
import type { InstallConfigResult } from "./types";
import { createLogger, type Logger } from "./utils/logger";

const execAsync = promisify(exec);

export type CommandRunner = (
  command: string,
) => Promise<{ stdout: string; stderr: string }>;

export const runPowerShell: CommandRunner = (command) =>
  execAsync(command, { windowsHide: true, timeout: 120000 });

export interface InstallConfigOptions {
  destinationPath?: string;
  serviceName?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export function buildRestartCommand(serviceName: string): string {
  const escaped = serviceName.replace(/'/g, "''");
  return `powershell -NoProfile -Command "Restart-Service -Name '${escaped}' -Force"`;
}

export async function installConfig(
  sourcePath: string,
  opts: InstallConfigOptions = {},
): Promise<InstallConfigResult> {
  const destinationPath = opts.destinationPath ?? DEFAULT_AGENT_CONFIG_PATH;
  const serviceName = opts.serviceName ?? DEFAULT_AGENT_SERVICE;
  const runner = opts.runner ?? runPowerShell;
  const logger = opts.logger ?? createLogger();
  const startTime = Date.now();

  if (!fs.existsSync(sourcePath)) {
    throw new ConfigInstallError(`Config file not found: ${sourcePath}`, {
      sourcePath,
    });
  }

  try {
    fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
    fs.copyFileSync(sourcePath, destinationPath);
  } catch (err: unknown) {
    throw new ConfigInstallError(
      `Failed to copy ${sourcePath} to ${destinationPath}: ${errorMessage(err)}`,
      { sourcePath, destinationPath },
    );
  }
  const bytesCopied = fs.statSync(destinationPath).size;
  logger.info(
    { source: sourcePath, dest: destinationPath, bytes: bytesCopied },
    "Installed agent config",
  );

  const command = buildRestartCommand(serviceName);
  try {
    await runner(command);
  } catch (err: unknown) {
    logger.error({ service: serviceName, command }, "Service restart failed");
    throw new ConfigInstallError(
      `Config installed but restarting "${serviceName}" failed: ${errorMessage(err)}`,
      { serviceName, destinationPath },
    );
  }
  logger.info({ service: serviceName }, "Restarted agent service");

  return {
    destinationPath,
    serviceName,
    bytesCopied,
    durationMs: Date.now() - startTime,
  };
}
