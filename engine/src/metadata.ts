/**
 * WinProv Engine — Instance Metadata
 *
 * Reads the region and CloudFormation stack name from the EC2 instance
 * metadata service. One GET per lookup; IMDSv2 session tokens are opt-in.
 */

import * as http from "http";
import { z } from "zod";
import { DEFAULT_METADATA_TIMEOUT_MS, METADATA_BASE_URL } from "./config";
import { errorMessage, MetadataError } from "./errors";
import type { Logger } from "./utils/logger";

export const IDENTITY_DOCUMENT_PATH = "/latest/dynamic/instance-identity/document";
export const STACK_NAME_PATH =
  "/latest/meta-data/tags/instance/aws:cloudformation:stack-name";
export const TOKEN_PATH = "/latest/api/token";
export const TOKEN_HEADER = "X-aws-ec2-metadata-token";
export const TOKEN_TTL_HEADER = "X-aws-ec2-metadata-token-ttl-seconds";

export interface MetadataRequest {
  method: "GET" | "PUT";
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface MetadataResponse {
  statusCode: number;
  body: string;
}

export type MetadataHttp = (request: MetadataRequest) => Promise<MetadataResponse>;

export interface MetadataOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Fetch an IMDSv2 session token before the lookup */
  imdsToken?: boolean;
  http?: MetadataHttp;
  logger?: Logger;
}

const IdentityDocumentSchema = z.object({
  region: z.string().min(1),
});

/**
 * Plain-HTTP client for the link-local metadata endpoint. Buffers the body;
 * metadata answers are a few hundred bytes.
 */
export const nodeMetadataHttp: MetadataHttp = (request) =>
  new Promise<MetadataResponse>((resolve, reject) => {
    const req = http.request(
      request.url,
      { method: request.method, headers: request.headers },
      (response) => {
        const chunks: Buffer[] = [];
        response.on("data", (chunk: Buffer) => chunks.push(chunk));
        response.on("end", () =>
          resolve({
            statusCode: response.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf-8"),
          }),
        );
        response.on("error", reject);
      },
    );
    req.on("error", reject);
    req.setTimeout(request.timeoutMs, () => {
      req.destroy(
        new Error(`Metadata request timed out after ${request.timeoutMs} ms`),
      );
    });
    req.end();
  });

async function send(
  request: MetadataRequest,
  client: MetadataHttp,
): Promise<MetadataResponse> {
  try {
    return await client(request);
  } catch (err: unknown) {
    throw new MetadataError(
      `Instance metadata endpoint unreachable: ${errorMessage(err)}`,
      { url: request.url },
    );
  }
}

async function getMetadataText(path: string, opts: MetadataOptions): Promise<string> {
  const baseUrl = opts.baseUrl ?? METADATA_BASE_URL;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_METADATA_TIMEOUT_MS;
  const client = opts.http ?? nodeMetadataHttp;
  const headers: Record<string, string> = {};

  if (opts.imdsToken) {
    const token = await send(
      {
        method: "PUT",
        url: baseUrl + TOKEN_PATH,
        headers: { [TOKEN_TTL_HEADER]: "21600" },
        timeoutMs,
      },
      client,
    );
    if (token.statusCode !== 200 || token.body === "") {
      throw new MetadataError(
        `Could not obtain IMDSv2 token: HTTP ${token.statusCode}`,
        { url: baseUrl + TOKEN_PATH, status: token.statusCode },
      );
    }
    headers[TOKEN_HEADER] = token.body;
  }

  const url = baseUrl + path;
  const response = await send({ method: "GET", url, headers, timeoutMs }, client);
  if (response.statusCode !== 200) {
    throw new MetadataError(
      `Instance metadata returned HTTP ${response.statusCode} for ${path}`,
      { url, status: response.statusCode },
    );
  }

  opts.logger?.debug({ url, bytes: response.body.length }, "Read instance metadata");
  return response.body;
}

export async function getRegion(opts: MetadataOptions = {}): Promise<string> {
  const body = await getMetadataText(IDENTITY_DOCUMENT_PATH, opts);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err: unknown) {
    throw new MetadataError(
      `Instance identity document is not JSON: ${errorMessage(err)}`,
    );
  }

  const parsed = IdentityDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new MetadataError("Instance identity document has no region", {
      issues: parsed.error.issues.map((i) => i.message),
    });
  }
  return parsed.data.region;
}

/**
 * Needs "Allow tags in instance metadata" enabled on the instance.
 */
export async function getStackName(opts: MetadataOptions = {}): Promise<string> {
  const stackName = (await getMetadataText(STACK_NAME_PATH, opts)).trim();
  if (stackName === "") {
    throw new MetadataError("Instance has an empty stack-name tag");
  }
  return stackName;
}
