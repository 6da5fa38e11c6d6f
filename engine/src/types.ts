/**
 * WinProv Engine — Core Type Definitions
 *
 * Shared by every engine module and re-exported from the package entry
 * point. Keep behavior out of this file.
 */

import type { Readable } from "stream";

// ─── Credential Resolution ───────────────────────────────────────

export type CredentialMode = "explicit" | "secret-store";
export type CredentialSource = "env" | "secret-store" | "explicit";

/** Values read from the process environment once, at the call site. */
export interface EnvOverrides {
  apiKey?: string;
  host?: string;
}

export type SecretLookup =
  | { ok: true; value: string }
  | { ok: false; error: string };

/**
 * A managed secret store (SSM Parameter Store in production).
 * Implementations report failures through the lookup result and do not throw.
 */
export interface SecretStore {
  get(name: string, decrypt: boolean): Promise<SecretLookup>;
}

export interface ResolvedCredentials {
  credential?: string;
  endpoint?: string;
  sources: {
    credential?: CredentialSource;
    endpoint?: CredentialSource;
  };
  /** Why a value could not be resolved, one message per failure */
  problems: string[];
}

// ─── Fetching ────────────────────────────────────────────────────

export type FetchErrorKind =
  | "MISSING_CONFIGURATION"
  | "TRANSPORT"
  | "REMOTE_REJECTED"
  | "LOCAL_WRITE";

export type RejectionReason =
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "server_error"
  | "other";

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  url?: string;
  /** HTTP status, set for REMOTE_REJECTED */
  status?: number;
  reason?: RejectionReason;
  /** Message of the underlying error, if any */
  cause?: string;
}

export type FetchResult =
  | {
      ok: true;
      outputPath: string;
      url: string;
      bytesWritten: number;
      durationMs: number;
      attempts: number;
    }
  | { ok: false; error: FetchError; attempts: number };

export interface FetchConfig {
  credential?: string;
  endpoint?: string;
  /** Socket timeout; unset means the HTTP client default (none) */
  timeoutMs?: number;
  /** Extra attempts after the first; 0 disables retry */
  retries?: number;
  retryDelayMs?: number;
  maxRedirects?: number;
}

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs?: number;
}

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

/** Issues one GET. Rejects on DNS, TLS, connection and timeout failures. */
export interface HttpTransport {
  get(request: TransportRequest): Promise<TransportResponse>;
}

// ─── Collaborators ───────────────────────────────────────────────

export type ErrorCategory = "CONFIG_INSTALL_ERROR" | "METADATA_ERROR";

export interface InstallConfigResult {
  destinationPath: string;
  serviceName: string;
  bytesCopied: number;
  durationMs: number;
}

export type DbExistsResult =
  | { status: "found" }
  | { status: "absent" }
  | { status: "unreachable"; error: string };

export interface DatabaseCredentials {
  user?: string;
  password?: string;
  port?: number;
  /** Accept the server's certificate without validating it. Off by default. */
  trustServerCertificate?: boolean;
}

/** Enumerates the database names on a server. Rejects when unreachable. */
export interface DatabaseCatalog {
  listDatabases(
    serverAddress: string,
    credentials: DatabaseCredentials,
  ): Promise<string[]>;
}
