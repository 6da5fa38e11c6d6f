/**
 * WinProv Engine — HTTPS Transport
 *
 * The default HttpTransport. HTTPS only, pinned to TLS 1.2 so the client
 * never negotiates a weaker protocol version.
 */

import * as https from "https";
import type { HttpTransport, TransportRequest, TransportResponse } from "./types";

/**
 * Build the options for one GET. Throws for non-HTTPS URLs.
 */
export function buildHttpsRequestOptions(
  request: TransportRequest,
  tls: HttpsTransportOptions = {},
): https.RequestOptions {
  const url = new URL(request.url);
  if (url.protocol !== "https:") {
    throw new Error(`Artifact URL must be HTTPS. Got: ${request.url}`);
  }

  return {
    protocol: "https:",
    hostname: url.hostname,
    port: url.port || 443,
    path: url.pathname + url.search,
    method: "GET",
    headers: request.headers,
    minVersion: "TLSv1.2",
    maxVersion: "TLSv1.2",
    ca: tls.ca,
  };
}

export interface HttpsTransportOptions {
  /** CA certificates (PEM) to trust instead of the bundled roots */
  ca?: string | Buffer;
}

export function createHttpsTransport(
  tls: HttpsTransportOptions = {},
): HttpTransport {
  return {
    get(request: TransportRequest): Promise<TransportResponse> {
      return new Promise<TransportResponse>((resolve, reject) => {
        let options: https.RequestOptions;
        try {
          options = buildHttpsRequestOptions(request, tls);
        } catch (err: unknown) {
          reject(err);
          return;
        }

        const req = https.get(options, (response) => {
          resolve({
            statusCode: response.statusCode ?? 0,
            headers: response.headers,
            body: response,
          });
        });

        req.on("error", reject);

        // Without a timeout Node waits indefinitely, like the default client
        const timeoutMs = request.timeoutMs;
        if (timeoutMs !== undefined) {
          req.setTimeout(timeoutMs, () => {
            req.destroy(new Error(`Request timed out after ${timeoutMs} ms`));
          });
        }
      });
    },
  };
}
