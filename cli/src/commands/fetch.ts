/**
 * WinProv CLI — Fetch Command
 *
 * Downloads one artifact from Artifactory to a local file.
 *
 * Usage:
 *   winprov fetch <artifactPath> <outputPath> --api-key <key> --host <url>
 *   winprov fetch <artifactPath> <outputPath> --secret-store [--region <r>]
 *
 * ARTIFACTORY_API_KEY and ARTIFACTORY_HOST override both forms.
 */

import { Command } from "commander";
import { readEnvOverrides, type SecretStore } from "@winprov/engine";
import {
  createCliLogger,
  defaultDeps,
  loadSettings,
  parseNonNegativeInt,
  parsePositiveInt,
  resolveSsmRegion,
  type CliDeps,
} from "../config";
import {
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatFetchErrorKind,
  printDetail,
  printError,
} from "../output";

interface FetchCommandOptions {
  secretStore: boolean;
  apiKey?: string;
  host?: string;
  region?: string;
  timeout?: number;
  retries: number;
}

export function registerFetchCommand(
  program: Command,
  deps: CliDeps = defaultDeps,
): void {
  program
    .command("fetch <artifactPath> <outputPath>")
    .description("Download an artifact from Artifactory")
    .option(
      "--secret-store",
      "Read the API key and host from SSM Parameter Store",
      false,
    )
    .option("--api-key <key>", "Artifactory API key")
    .option("--host <url>", "Artifactory base URL, e.g. https://host/artifactory")
    .option("--region <region>", "AWS region for Parameter Store")
    .option("--timeout <ms>", "Request timeout in milliseconds", parsePositiveInt)
    .option(
      "--retries <n>",
      "Retry network failures and HTTP 5xx responses",
      parseNonNegativeInt,
      0,
    )
    .action(
      async (artifactPath: string, outputPath: string, opts: FetchCommandOptions) => {
        const settings = loadSettings(deps);
        const logger = createCliLogger(settings);

        const env = readEnvOverrides(deps.env);
        const envCoversAll = env.apiKey !== undefined && env.host !== undefined;

        let secretStore: SecretStore | undefined;
        if (opts.secretStore && !envCoversAll) {
          const region = await resolveSsmRegion(opts.region, settings, deps, logger);
          secretStore = deps.createSecretStore(region);
        }

        const spinner = createSpinner(`Downloading ${artifactPath}`).start();
        const result = await deps.fetchArtifact(artifactPath, outputPath, {
          mode: opts.secretStore ? "secret-store" : "explicit",
          explicitCredential: opts.apiKey,
          explicitEndpoint: opts.host,
          env,
          secretStore,
          timeoutMs: opts.timeout ?? settings.timeoutMs,
          retries: opts.retries,
          logger,
        });

        if (!result.ok) {
          spinner.fail(`Download of ${artifactPath} failed`);
          printError(`${formatFetchErrorKind(result.error.kind)}: ${result.error.message}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed(`Downloaded ${colors.path(result.outputPath)}`);
        printDetail("Size", formatBytes(result.bytesWritten));
        printDetail("Time", formatDuration(result.durationMs));
        if (result.attempts > 1) {
          printDetail("Attempts", String(result.attempts));
        }
      },
    );
}
