/**
 * WinProv Engine — Secret Stores
 *
 * SsmSecretStore reads SSM Parameter Store entries. InMemorySecretStore
 * backs tests and local runs.
 */

import {
  GetParameterCommand,
  type GetParameterCommandOutput,
  SSMClient,
} from "@aws-sdk/client-ssm";
import { errorMessage } from "./errors";
import type { SecretLookup, SecretStore } from "./types";

/** The slice of SSMClient the store uses */
export interface ParameterClient {
  send(command: GetParameterCommand): Promise<GetParameterCommandOutput>;
}

export class SsmSecretStore implements SecretStore {
  constructor(private readonly client: ParameterClient) {}

  async get(name: string, decrypt: boolean): Promise<SecretLookup> {
    try {
      const out = await this.client.send(
        new GetParameterCommand({ Name: name, WithDecryption: decrypt }),
      );
      const value = out.Parameter?.Value;
      if (value === undefined || value === "") {
        return { ok: false, error: `Parameter "${name}" has no value` };
      }
      return { ok: true, value };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === "ParameterNotFound") {
        return { ok: false, error: `Parameter "${name}" not found` };
      }
      return { ok: false, error: errorMessage(err) };
    }
  }
}

export function createSsmSecretStore(
  opts: { region?: string } = {},
): SsmSecretStore {
  return new SsmSecretStore(new SSMClient({ region: opts.region }));
}

export interface SecretStoreCall {
  name: string;
  decrypt: boolean;
}

export class InMemorySecretStore implements SecretStore {
  readonly calls: SecretStoreCall[] = [];
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  async get(name: string, decrypt: boolean): Promise<SecretLookup> {
    this.calls.push({ name, decrypt });
    const value = this.values.get(name);
    return value === undefined
      ? { ok: false, error: `Secret "${name}" not found` }
      : { ok: true, value };
  }
}
