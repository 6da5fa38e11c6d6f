/**
 * WinProv Engine — Credentialed Artifact Fetcher
 *
 * Downloads one artifact from Artifactory to a local path:
 *
 * 1. Refuse to send anything unless both API key and host are resolved
 * 2. GET endpoint + artifactPath with the API key header (TLS 1.2)
 * 3. Stream the body into the output file, overwriting it
 *
 * Every failure comes back as a typed FetchResult. Retry is opt-in.
 */

import { once } from "events";
import * as fs from "fs";
import type { Readable } from "stream";
import { pipeline } from "stream/promises";
import { setTimeout as delay } from "timers/promises";
import {
  API_KEY_HEADER,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_RETRY_DELAY_MS,
  readEnvOverrides,
} from "./config";
import { resolveCredentials } from "./credentials";
import { errorMessage } from "./errors";
import { createHttpsTransport } from "./transport";
import type {
  CredentialMode,
  EnvOverrides,
  FetchConfig,
  FetchError,
  FetchResult,
  HttpTransport,
  RejectionReason,
  SecretStore,
  TransportResponse,
} from "./types";
import { createLogger, type Logger } from "./utils/logger";

export interface FetchDeps {
  transport: HttpTransport;
  logger: Logger;
  /** Wait between retries; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

type AttemptOutcome =
  | { ok: true; url: string; bytesWritten: number }
  | { ok: false; error: FetchError };

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Plain concatenation. The caller supplies an artifactPath starting with "/".
 */
export function buildArtifactUrl(endpoint: string, artifactPath: string): string {
  return endpoint + artifactPath;
}

export function buildRequestHeaders(
  credential?: string,
): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
  if (credential !== undefined) {
    headers[API_KEY_HEADER] = credential;
  }
  return headers;
}

export function classifyStatus(status: number): RejectionReason {
  if (status === 401) return "unauthorized";
  if (status === 403) return "forbidden";
  if (status === 404) return "not_found";
  if (status >= 500 && status < 600) return "server_error";
  return "other";
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isRetryable(error: FetchError): boolean {
  return (
    error.kind === "TRANSPORT" ||
    (error.kind === "REMOTE_REJECTED" && error.reason === "server_error")
  );
}

function missingConfiguration(message: string): FetchResult {
  return {
    ok: false,
    attempts: 0,
    error: { kind: "MISSING_CONFIGURATION", message },
  };
}

async function removePartial(outputPath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(outputPath, { force: true });
    logger.debug({ path: outputPath }, "Removed partial download");
  } catch (err: unknown) {
    logger.warn(
      { path: outputPath, error: errorMessage(err) },
      "Could not remove partial download",
    );
  }
}

function localWriteError(
  outputPath: string,
  url: string,
  err: unknown,
): AttemptOutcome {
  const message = errorMessage(err);
  return {
    ok: false,
    error: {
      kind: "LOCAL_WRITE",
      message: `Failed to write ${outputPath}: ${message}`,
      url,
      cause: message,
    },
  };
}

/**
 * Stream a response body into outputPath. The first stream to fail decides
 * the error kind; pipeline then forwards that error to the other side.
 */
async function writeBody(
  body: Readable,
  outputPath: string,
  url: string,
  logger: Logger,
): Promise<AttemptOutcome> {
  let failedSide: "source" | "destination" | undefined;
  body.once("error", () => {
    if (!failedSide) failedSide = "source";
  });

  const out = fs.createWriteStream(outputPath);
  try {
    await once(out, "open");
  } catch (err: unknown) {
    body.destroy();
    return localWriteError(outputPath, url, err);
  }
  out.once("error", () => {
    if (!failedSide) failedSide = "destination";
  });

  try {
    await pipeline(body, out);
    const { size } = await fs.promises.stat(outputPath);
    return { ok: true, url, bytesWritten: size };
  } catch (err: unknown) {
    await removePartial(outputPath, logger);
    if (failedSide === "source") {
      const message = errorMessage(err);
      return {
        ok: false,
        error: {
          kind: "TRANSPORT",
          message: `Connection failed while reading ${url}: ${message}`,
          url,
          cause: message,
        },
      };
    }
    return localWriteError(outputPath, url, err);
  }
}

async function attemptDownload(
  url: string,
  outputPath: string,
  credential: string,
  config: FetchConfig,
  deps: FetchDeps,
): Promise<AttemptOutcome> {
  const { transport, logger } = deps;
  const origin = new URL(url).origin;
  const maxRedirects = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  let currentUrl = url;

  for (let hop = 0; ; hop++) {
    // The key only goes to the host it was issued for
    const sameOrigin = new URL(currentUrl).origin === origin;
    const headers = buildRequestHeaders(sameOrigin ? credential : undefined);

    let response: TransportResponse;
    try {
      response = await transport.get({
        url: currentUrl,
        headers,
        timeoutMs: config.timeoutMs,
      });
    } catch (err: unknown) {
      const message = errorMessage(err);
      return {
        ok: false,
        error: {
          kind: "TRANSPORT",
          message: `Request to ${currentUrl} failed: ${message}`,
          url: currentUrl,
          cause: message,
        },
      };
    }

    const status = response.statusCode;
    const location = firstHeader(response.headers.location);

    if (REDIRECT_STATUSES.has(status) && location) {
      response.body.resume();
      if (hop >= maxRedirects) {
        return {
          ok: false,
          error: {
            kind: "REMOTE_REJECTED",
            message: `Gave up after ${maxRedirects} redirects from ${url}`,
            url: currentUrl,
            status,
            reason: "other",
          },
        };
      }
      let nextUrl: string;
      try {
        nextUrl = new URL(location, currentUrl).toString();
      } catch {
        return {
          ok: false,
          error: {
            kind: "REMOTE_REJECTED",
            message: `Invalid redirect location "${location}" from ${currentUrl}`,
            url: currentUrl,
            status,
            reason: "other",
          },
        };
      }
      currentUrl = nextUrl;
      logger.debug({ redirect: currentUrl, sameOrigin }, "Following redirect");
      continue;
    }

    if (status < 200 || status >= 300) {
      response.body.resume();
      const reason = classifyStatus(status);
      return {
        ok: false,
        error: {
          kind: "REMOTE_REJECTED",
          message: `Download failed: HTTP ${status} (${reason}) for ${currentUrl}`,
          url: currentUrl,
          status,
          reason,
        },
      };
    }

    return writeBody(response.body, outputPath, currentUrl, logger);
  }
}

/**
 * Download artifactPath from the configured endpoint into outputPath.
 *
 * Nothing goes over the network unless both credential and endpoint are
 * non-empty.
 */
export async function downloadArtifact(
  artifactPath: string,
  outputPath: string,
  config: FetchConfig,
  deps: FetchDeps,
): Promise<FetchResult> {
  const { credential, endpoint } = config;
  const { logger } = deps;

  if (!credential || !endpoint) {
    const missing = [!credential && "credential", !endpoint && "endpoint"]
      .filter(Boolean)
      .join(" and ");
    logger.error({ artifactPath }, `Refusing to download: ${missing} not set`);
    return missingConfiguration(`Artifactory ${missing} not configured`);
  }

  const url = buildArtifactUrl(endpoint, artifactPath);
  try {
    new URL(url);
  } catch {
    return missingConfiguration(
      `Artifactory endpoint does not form a valid URL: ${url}`,
    );
  }

  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = 1 + Math.max(0, config.retries ?? 0);
  const retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const startTime = Date.now();

  logger.info({ url, dest: outputPath }, "Starting download");

  let attempt = 0;
  for (;;) {
    attempt++;
    const outcome = await attemptDownload(
      url,
      outputPath,
      credential,
      config,
      deps,
    );

    if (outcome.ok) {
      const durationMs = Date.now() - startTime;
      logger.info(
        { dest: outputPath, bytes: outcome.bytesWritten, duration_ms: durationMs },
        "Download complete",
      );
      return {
        ok: true,
        outputPath,
        url: outcome.url,
        bytesWritten: outcome.bytesWritten,
        durationMs,
        attempts: attempt,
      };
    }

    if (attempt >= maxAttempts || !isRetryable(outcome.error)) {
      logger.error(
        { kind: outcome.error.kind, status: outcome.error.status, attempt },
        outcome.error.message,
      );
      return { ok: false, error: outcome.error, attempts: attempt };
    }

    logger.warn(
      { kind: outcome.error.kind, attempt, retryInMs: retryDelayMs },
      "Download failed, retrying",
    );
    await sleep(retryDelayMs);
  }
}

export interface FetchArtifactOptions {
  mode: CredentialMode;
  explicitCredential?: string;
  explicitEndpoint?: string;
  /** Defaults to ARTIFACTORY_API_KEY / ARTIFACTORY_HOST from process.env */
  env?: EnvOverrides;
  secretStore?: SecretStore;
  transport?: HttpTransport;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  maxRedirects?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Resolve credentials, then download. This is the entry point scripts call.
 */
export async function fetchArtifact(
  artifactPath: string,
  outputPath: string,
  opts: FetchArtifactOptions,
): Promise<FetchResult> {
  const logger = opts.logger ?? createLogger();

  const resolved = await resolveCredentials({
    mode: opts.mode,
    explicitCredential: opts.explicitCredential,
    explicitEndpoint: opts.explicitEndpoint,
    env: opts.env ?? readEnvOverrides(process.env),
    secretStore: opts.secretStore,
    logger,
  });

  if (resolved.problems.length > 0) {
    return missingConfiguration(resolved.problems.join("; "));
  }

  return downloadArtifact(
    artifactPath,
    outputPath,
    {
      credential: resolved.credential,
      endpoint: resolved.endpoint,
      timeoutMs: opts.timeoutMs,
      retries: opts.retries,
      retryDelayMs: opts.retryDelayMs,
      maxRedirects: opts.maxRedirects,
    },
    {
      transport: opts.transport ?? createHttpsTransport(),
      logger,
      sleep: opts.sleep,
    },
  );
}
