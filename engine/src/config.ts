/**
 * WinProv Engine — Configuration
 *
 * Well-known names, defaults, and the environment readers. Nothing else in
 * the engine reads process.env; callers read it here once and pass the
 * result down.
 */

import { z } from "zod";
import type { EnvOverrides } from "./types";

/** Environment variables that override every other credential source */
export const ENV_API_KEY = "ARTIFACTORY_API_KEY";
export const ENV_HOST = "ARTIFACTORY_HOST";

/** SSM parameter names used in secret-store mode */
export const SECRET_API_KEY = "artifactory-api-key";
export const SECRET_HOST = "artifactory-host";

/** Artifactory accepts the API key in this header */
export const API_KEY_HEADER = "X-JFrog-Art-Api";

export const DEFAULT_MAX_REDIRECTS = 5;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export const DEFAULT_AGENT_CONFIG_PATH =
  "C:\\ProgramData\\Amazon\\AmazonCloudWatchAgent\\amazon-cloudwatch-agent.json";
export const DEFAULT_AGENT_SERVICE = "AmazonCloudWatchAgent";

export const METADATA_BASE_URL = "http://169.254.169.254";
export const DEFAULT_METADATA_TIMEOUT_MS = 2000;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Read the credential and endpoint overrides. Empty strings count as unset.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): EnvOverrides {
  return {
    apiKey: nonEmpty(env[ENV_API_KEY]),
    host: nonEmpty(env[ENV_HOST]),
  };
}

const SettingsSchema = z.object({
  logLevel: z
    .enum(["silent", "debug", "info", "warn", "error"])
    .default("silent"),
  timeoutMs: z.coerce.number().int().positive().optional(),
  awsRegion: z.string().min(1).optional(),
});

export type EngineSettings = z.infer<typeof SettingsSchema>;

/**
 * Settings the CLI takes from the environment.
 *
 *   WINPROV_LOG_LEVEL   silent | debug | info | warn | error
 *   WINPROV_TIMEOUT_MS  request timeout for downloads
 *   AWS_REGION          region for the SSM client
 *
 * Throws a ZodError when a value is invalid.
 */
export function loadEngineSettings(env: NodeJS.ProcessEnv): EngineSettings {
  return SettingsSchema.parse({
    logLevel: nonEmpty(env.WINPROV_LOG_LEVEL),
    timeoutMs: nonEmpty(env.WINPROV_TIMEOUT_MS),
    awsRegion: nonEmpty(env.AWS_REGION),
  });
}
