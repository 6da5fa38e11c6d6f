/**
 * WinProv Engine — Credential Resolution
 *
 * Resolves the Artifactory API key and host. Each value is resolved on its
 * own, first match wins:
 *
 * 1. Environment override (ARTIFACTORY_API_KEY / ARTIFACTORY_HOST)
 * 2. Secret-store mode: SSM parameters, the key read with decryption
 * 3. Explicit mode: the values the caller passed in
 *
 * The environment override beats explicit arguments too, so operators can
 * patch a deployed script without editing it.
 */

import { SECRET_API_KEY, SECRET_HOST } from "./config";
import type {
  CredentialMode,
  CredentialSource,
  EnvOverrides,
  ResolvedCredentials,
  SecretStore,
} from "./types";
import type { Logger } from "./utils/logger";

export interface ResolveCredentialsOptions {
  mode: CredentialMode;
  explicitCredential?: string;
  explicitEndpoint?: string;
  env: EnvOverrides;
  /** Required in secret-store mode */
  secretStore?: SecretStore;
  logger: Logger;
}

interface ResolvedValue {
  value?: string;
  source?: CredentialSource;
  problem?: string;
}

async function resolveOne(
  label: string,
  envValue: string | undefined,
  explicitValue: string | undefined,
  secretName: string,
  decrypt: boolean,
  opts: ResolveCredentialsOptions,
): Promise<ResolvedValue> {
  if (envValue) {
    return { value: envValue, source: "env" };
  }

  if (opts.mode === "explicit") {
    return explicitValue !== undefined
      ? { value: explicitValue, source: "explicit" }
      : {};
  }

  if (!opts.secretStore) {
    return {
      problem: `No secret store available to read "${secretName}" (${label})`,
    };
  }

  const lookup = await opts.secretStore.get(secretName, decrypt);
  if (!lookup.ok) {
    opts.logger.warn(
      { secret: secretName, error: lookup.error },
      "Secret store lookup failed",
    );
    return {
      problem: `Could not read ${label} from secret "${secretName}": ${lookup.error}`,
    };
  }
  return { value: lookup.value, source: "secret-store" };
}

export async function resolveCredentials(
  opts: ResolveCredentialsOptions,
): Promise<ResolvedCredentials> {
  const credential = await resolveOne(
    "credential",
    opts.env.apiKey,
    opts.explicitCredential,
    SECRET_API_KEY,
    true,
    opts,
  );
  const endpoint = await resolveOne(
    "endpoint",
    opts.env.host,
    opts.explicitEndpoint,
    SECRET_HOST,
    false,
    opts,
  );

  const problems: string[] = [];
  if (credential.problem) problems.push(credential.problem);
  if (endpoint.problem) problems.push(endpoint.problem);

  opts.logger.debug(
    {
      mode: opts.mode,
      credentialSource: credential.source ?? "unresolved",
      endpointSource: endpoint.source ?? "unresolved",
    },
    "Resolved fetch credentials",
  );

  return {
    credential: credential.value,
    endpoint: endpoint.value,
    sources: { credential: credential.source, endpoint: endpoint.source },
    problems,
  };
}
