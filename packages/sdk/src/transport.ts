/**
 * Request/response contract between the dispatcher and the CouchDB HTTP API
 *
 * Transports return every HTTP response, error statuses included, and throw
 * TransportError only when the backend could not be reached.
 */

import { z } from "zod";

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE" | "HEAD";

export type QueryValue = string | number | boolean;

export interface CouchRequest {
  method: HttpMethod;
  /** Path segments, URI-encoded by the transport (["users", "_find"] -> /users/_find) */
  path: string[];
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface CouchResponse {
  status: number;
  body: unknown;
}

export interface CouchTransport {
  request(req: CouchRequest): Promise<CouchResponse>;
}

/**
 * Encode path segments into a request path
 */
export function encodePath(segments: readonly string[]): string {
  return "/" + segments.map((s) => encodeURIComponent(s)).join("/");
}

const ServerInfoSchema = z
  .object({
    couchdb: z.string(),
    version: z.string(),
    vendor: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export interface ServerInfo {
  version: string;
  vendor?: string;
}

/**
 * Probe the backend root endpoint
 * @throws TransportError if unreachable
 * @throws Error if the endpoint does not answer like CouchDB
 */
export async function checkConnection(
  transport: CouchTransport,
  signal?: AbortSignal
): Promise<ServerInfo> {
  const res = await transport.request({ method: "GET", path: [], signal });
  if (res.status < 200 || res.status >= 300) {
    throw new Error(`Backend answered GET / with HTTP ${res.status}`);
  }
  const parsed = ServerInfoSchema.safeParse(res.body);
  if (!parsed.success) {
    throw new Error("Backend root endpoint did not answer like CouchDB");
  }
  const vendor = parsed.data.vendor?.name;
  return vendor === undefined
    ? { version: parsed.data.version }
    : { version: parsed.data.version, vendor };
}
