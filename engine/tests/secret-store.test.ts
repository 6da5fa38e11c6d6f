/**
 * WinProv Engine — Secret Store Tests
 */

import { describe, it, expect, vi } from "vitest";
import type {
  GetParameterCommand,
  GetParameterCommandOutput,
} from "@aws-sdk/client-ssm";
import { InMemorySecretStore, SsmSecretStore } from "../src/secret-store";

function fakeClient(
  impl: (command: GetParameterCommand) => Promise<GetParameterCommandOutput>,
) {
  return { send: vi.fn(impl) };
}

describe("SsmSecretStore", () => {
  it("passes the name and decryption flag to GetParameter", async () => {
    const client = fakeClient(async () => ({
      $metadata: {},
      Parameter: { Name: "artifactory-api-key", Value: "stored-key" },
    }));
    const store = new SsmSecretStore(client);

    const lookup = await store.get("artifactory-api-key", true);

    expect(lookup).toEqual({ ok: true, value: "stored-key" });
    expect(client.send).toHaveBeenCalledTimes(1);
    expect(client.send.mock.calls[0][0].input).toEqual({
      Name: "artifactory-api-key",
      WithDecryption: true,
    });
  });

  it("reports an empty parameter as a failure", async () => {
    const store = new SsmSecretStore(
      fakeClient(async () => ({ $metadata: {}, Parameter: { Value: "" } })),
    );

    expect(await store.get("artifactory-host", false)).toEqual({
      ok: false,
      error: 'Parameter "artifactory-host" has no value',
    });
  });

  it("reports a missing parameter", async () => {
    const store = new SsmSecretStore(
      fakeClient(async () => {
        const err = new Error("ParameterNotFound");
        err.name = "ParameterNotFound";
        throw err;
      }),
    );

    expect(await store.get("artifactory-host", false)).toEqual({
      ok: false,
      error: 'Parameter "artifactory-host" not found',
    });
  });

  it("reports other SDK errors with their message", async () => {
    const store = new SsmSecretStore(
      fakeClient(async () => {
        throw new Error("Could not load credentials from any providers");
      }),
    );

    expect(await store.get("artifactory-api-key", true)).toEqual({
      ok: false,
      error: "Could not load credentials from any providers",
    });
  });
});

describe("InMemorySecretStore", () => {
  it("returns stored values and records calls", async () => {
    const store = new InMemorySecretStore({ a: "1" });

    expect(await store.get("a", true)).toEqual({ ok: true, value: "1" });
    expect(await store.get("b", false)).toEqual({
      ok: false,
      error: 'Secret "b" not found',
    });
    expect(store.calls).toEqual([
      { name: "a", decrypt: true },
      { name: "b", decrypt: false },
    ]);
  });
});
