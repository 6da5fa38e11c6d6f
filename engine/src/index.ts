/**
 * WinProv Engine — Public API
 *
 * The single entry point for the engine package. The CLI imports from
 * here, never from internal modules.
 */

// Artifact fetcher
export {
  fetchArtifact,
  downloadArtifact,
  buildArtifactUrl,
  buildRequestHeaders,
  classifyStatus,
} from "./fetcher";
export type { FetchArtifactOptions, FetchDeps } from "./fetcher";
export { createHttpsTransport, buildHttpsRequestOptions } from "./transport";
export type { HttpsTransportOptions } from "./transport";

// Credential resolution
export { resolveCredentials } from "./credentials";
export type { ResolveCredentialsOptions } from "./credentials";
export {
  SsmSecretStore,
  InMemorySecretStore,
  createSsmSecretStore,
} from "./secret-store";
export type { ParameterClient, SecretStoreCall } from "./secret-store";

// Collaborators
export { installConfig, buildRestartCommand, runPowerShell } from "./agent-config";
export type { InstallConfigOptions, CommandRunner } from "./agent-config";
export { getRegion, getStackName, nodeMetadataHttp } from "./metadata";
export type {
  MetadataOptions,
  MetadataHttp,
  MetadataRequest,
  MetadataResponse,
} from "./metadata";
export { dbExists, mssqlCatalog, parseServerAddress } from "./database";
export type { DbExistsOptions } from "./database";

// Configuration and errors
export {
  readEnvOverrides,
  loadEngineSettings,
  ENV_API_KEY,
  ENV_HOST,
  SECRET_API_KEY,
  SECRET_HOST,
  API_KEY_HEADER,
  DEFAULT_AGENT_CONFIG_PATH,
  DEFAULT_AGENT_SERVICE,
} from "./config";
export type { EngineSettings } from "./config";
export {
  WinProvError,
  ConfigInstallError,
  MetadataError,
  errorMessage,
} from "./errors";

export type {
  CredentialMode,
  CredentialSource,
  EnvOverrides,
  SecretLookup,
  SecretStore,
  ResolvedCredentials,
  FetchErrorKind,
  RejectionReason,
  FetchError,
  FetchResult,
  FetchConfig,
  TransportRequest,
  TransportResponse,
  HttpTransport,
  ErrorCategory,
  InstallConfigResult,
  DbExistsResult,
  DatabaseCredentials,
  DatabaseCatalog,
} from "./types";

export { createLogger } from "./utils/logger";
export type { Logger, LoggerOptions } from "./utils/logger";
