/**
 * WinProv Engine — Instance Metadata Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { createServer, type RequestListener, type Server } from "http";
import {
  getRegion,
  nodeMetadataHttp,
  getStackName,
  IDENTITY_DOCUMENT_PATH,
  STACK_NAME_PATH,
  type MetadataHttp,
  type MetadataRequest,
  type MetadataResponse,
} from "../src/metadata";
import { MetadataError } from "../src/errors";

function fakeHttp(
  answer: (request: MetadataRequest) => MetadataResponse,
): { http: MetadataHttp; requests: MetadataRequest[] } {
  const requests: MetadataRequest[] = [];
  const http: MetadataHttp = async (request) => {
    requests.push(request);
    return answer(request);
  };
  return { http, requests };
}

const IDENTITY_DOCUMENT = JSON.stringify({
  accountId: "000000000000",
  instanceId: "i-0abc",
  region: "eu-west-1",
});

describe("getRegion", () => {
  it("returns the region from the identity document", async () => {
    const { http, requests } = fakeHttp(() => ({
      statusCode: 200,
      body: IDENTITY_DOCUMENT,
    }));

    expect(await getRegion({ http })).toBe("eu-west-1");
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      method: "GET",
      url: "http://169.254.169.254" + IDENTITY_DOCUMENT_PATH,
      headers: {},
      timeoutMs: 2000,
    });
  });

  it("throws when the document has no region", async () => {
    const { http } = fakeHttp(() => ({ statusCode: 200, body: "{}" }));

    await expect(getRegion({ http })).rejects.toThrow(
      "Instance identity document has no region",
    );
  });

  it("throws when the document is not JSON", async () => {
    const { http } = fakeHttp(() => ({ statusCode: 200, body: "<html>" }));

    await expect(getRegion({ http })).rejects.toBeInstanceOf(MetadataError);
  });
});

describe("getStackName", () => {
  it("returns the trimmed tag value", async () => {
    const { http, requests } = fakeHttp(() => ({
      statusCode: 200,
      body: "web-prod\n",
    }));

    expect(await getStackName({ http, baseUrl: "http://imds.test" })).toBe(
      "web-prod",
    );
    expect(requests[0].url).toBe("http://imds.test" + STACK_NAME_PATH);
  });

  it("throws on a non-200 answer", async () => {
    const { http } = fakeHttp(() => ({ statusCode: 404, body: "" }));

    await expect(getStackName({ http })).rejects.toThrow(
      `Instance metadata returned HTTP 404 for ${STACK_NAME_PATH}`,
    );
  });

  it("throws on an empty tag", async () => {
    const { http } = fakeHttp(() => ({ statusCode: 200, body: "  " }));

    await expect(getStackName({ http })).rejects.toThrow(
      "Instance has an empty stack-name tag",
    );
  });

  it("wraps connection failures in MetadataError", async () => {
    const http: MetadataHttp = async () => {
      throw new Error("connect EHOSTUNREACH 169.254.169.254:80");
    };

    await expect(getStackName({ http })).rejects.toMatchObject({
      name: "MetadataError",
      category: "METADATA_ERROR",
      message:
        "Instance metadata endpoint unreachable: connect EHOSTUNREACH 169.254.169.254:80",
    });
  });
});

describe("IMDSv2 token", () => {
  it("fetches a token first and sends it with the lookup", async () => {
    const { http, requests } = fakeHttp((request) =>
      request.method === "PUT"
        ? { statusCode: 200, body: "session-token" }
        : { statusCode: 200, body: "web-prod" },
    );

    expect(await getStackName({ http, imdsToken: true })).toBe("web-prod");
    expect(requests).toHaveLength(2);
    expect(requests[0].method).toBe("PUT");
    expect(requests[0].url).toBe("http://169.254.169.254/latest/api/token");
    expect(requests[0].headers).toEqual({
      "X-aws-ec2-metadata-token-ttl-seconds": "21600",
    });
    expect(requests[1].headers).toEqual({
      "X-aws-ec2-metadata-token": "session-token",
    });
  });

  it("throws when no token is issued", async () => {
    const { http } = fakeHttp(() => ({ statusCode: 403, body: "" }));

    await expect(getRegion({ http, imdsToken: true })).rejects.toThrow(
      "Could not obtain IMDSv2 token: HTTP 403",
    );
  });
});

describe("nodeMetadataHttp", () => {
  let server: Server | undefined;

  async function listen(handler: RequestListener): Promise<string> {
    const srv = createServer(handler);
    server = srv;
    await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", resolve));
    const address = srv.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server has no TCP address");
    }
    return `http://127.0.0.1:${address.port}`;
  }

  afterEach(async () => {
    const srv = server;
    server = undefined;
    if (srv) {
      srv.closeAllConnections();
      await new Promise<void>((resolve) => srv.close(() => resolve()));
    }
  });

  it("sends method and headers and buffers a chunked body", async () => {
    const seen: { method?: string; token?: string | string[] } = {};
    const baseUrl = await listen((req, res) => {
      seen.method = req.method;
      seen.token = req.headers["x-aws-ec2-metadata-token"];
      res.write('{"region":');
      setTimeout(() => res.end('"eu-west-1"}'), 20);
    });

    const response = await nodeMetadataHttp({
      method: "GET",
      url: baseUrl + IDENTITY_DOCUMENT_PATH,
      headers: { "X-aws-ec2-metadata-token": "test-token" },
      timeoutMs: 1000,
    });

    expect(response).toEqual({ statusCode: 200, body: '{"region":"eu-west-1"}' });
    expect(seen).toEqual({ method: "GET", token: "test-token" });
  });

  it("passes non-200 answers through", async () => {
    const baseUrl = await listen((_req, res) => {
      res.writeHead(404);
      res.end("Not Found");
    });

    const response = await nodeMetadataHttp({
      method: "GET",
      url: baseUrl + STACK_NAME_PATH,
      headers: {},
      timeoutMs: 1000,
    });

    expect(response).toEqual({ statusCode: 404, body: "Not Found" });
  });

  it("times out when the endpoint never answers", async () => {
    const baseUrl = await listen(() => {});

    await expect(
      nodeMetadataHttp({
        method: "GET",
        url: baseUrl + IDENTITY_DOCUMENT_PATH,
        headers: {},
        timeoutMs: 200,
      }),
    ).rejects.toThrow("Metadata request timed out after 200 ms");
  });

  it("backs getRegion end to end", async () => {
    const baseUrl = await listen((_req, res) => {
      res.end(IDENTITY_DOCUMENT);
    });

    expect(await getRegion({ baseUrl, timeoutMs: 1000 })).toBe("eu-west-1");
  });

  it("surfaces a stalled endpoint as MetadataError", async () => {
    const baseUrl = await listen(() => {});

    await expect(getStackName({ baseUrl, timeoutMs: 200 })).rejects.toMatchObject({
      name: "MetadataError",
      message: "Instance metadata endpoint unreachable: Metadata request timed out after 200 ms",
    });
  });
});
