/**
 * WinProv CLI — Configuration
 *
 * Settings, logger construction and the engine functions each command
 * calls. Commands receive a CliDeps object so tests can swap the engine
 * calls for fakes.
 */

import { InvalidArgumentError } from "commander";
import {
  createLogger,
  createSsmSecretStore,
  dbExists,
  fetchArtifact,
  getRegion,
  getStackName,
  installConfig,
  loadEngineSettings,
  type EngineSettings,
  type Logger,
  type SecretStore,
} from "@winprov/engine";
import { isDebugMode, printDebug } from "./output";

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  fetchArtifact: typeof fetchArtifact;
  installConfig: typeof installConfig;
  getRegion: typeof getRegion;
  getStackName: typeof getStackName;
  dbExists: typeof dbExists;
  createSecretStore: (region?: string) => SecretStore;
}

export const defaultDeps: CliDeps = {
  env: process.env,
  fetchArtifact,
  installConfig,
  getRegion,
  getStackName,
  dbExists,
  createSecretStore: (region) => createSsmSecretStore({ region }),
};

export function loadSettings(deps: CliDeps): EngineSettings {
  return loadEngineSettings(deps.env);
}

/**
 * --debug wins over WINPROV_LOG_LEVEL.
 */
export function createCliLogger(settings: EngineSettings): Logger {
  return createLogger({ level: isDebugMode() ? "debug" : settings.logLevel });
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be zero or a positive integer.");
  }
  return parsed;
}

/**
 * Region for Parameter Store lookups: flag, then AWS_REGION, then the
 * instance identity document. Returns undefined when none is known, which
 * leaves the choice to the SDK's own provider chain.
 */
export async function resolveSsmRegion(
  flagRegion: string | undefined,
  settings: EngineSettings,
  deps: CliDeps,
  logger: Logger,
): Promise<string | undefined> {
  if (flagRegion) return flagRegion;
  if (settings.awsRegion) return settings.awsRegion;

  try {
    const region = await deps.getRegion({ logger });
    printDebug(`Region from instance metadata: ${region}`);
    return region;
  } catch (err: unknown) {
    logger.warn({ err }, "Could not determine region from instance metadata");
    return undefined;
  }
}
