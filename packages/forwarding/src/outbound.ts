import { CORRELATION_HEADER } from "@tapline/observability";

import { InvalidUpstreamPathError } from "./errors";
import { connectionListed, HOP_BY_HOP_HEADERS, TENANT_HEADER, USER_HEADER, type HeaderBag } from "./headers";

export interface OutboundRequestInput {
  /** Destination base URL. */
  target: string;
  /** Path to request on the destination, after any prefix stripping. */
  path: string;
  /** Raw query string including "?", or "". */
  search: string;
  method: string;
  headers: HeaderBag;
  body?: Uint8Array;
  /** Exchanged token, or the caller's own token under pass-through. */
  credential: string;
  correlationId: string;
  subject: string;
  tenantId?: string;
}

export interface OutboundRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: Uint8Array;
}

// Re-set by the gateway from validated state; inbound copies never pass.
const GATEWAY_OWNED = new Set([
  "host",
  "content-length",
  "authorization",
  CORRELATION_HEADER.toLowerCase(),
  TENANT_HEADER.toLowerCase(),
  USER_HEADER.toLowerCase(),
]);

/**
 * Normalize the path sent upstream and refuse anything that could change
 * the destination host or walk out of its base path.
 */
export function sanitizeUpstreamPath(rawPath: string): string {
  const p = "/" + (rawPath || "/").replace(/^\/+/, "");

  if (rawPath.startsWith("//") || p.includes("://")) {
    throw new InvalidUpstreamPathError(rawPath);
  }
  if (p.includes("..") || /%2e%2e/i.test(p)) {
    throw new InvalidUpstreamPathError(rawPath);
  }
  return p;
}

function buildUrl(target: string, path: string, search: string): string {
  const base = new URL(target);
  const url = new URL(base.origin);
  url.pathname = `${base.pathname.replace(/\/+$/, "")}${sanitizeUpstreamPath(path)}`;
  url.search = search;

  if (url.host !== base.host || url.protocol !== base.protocol) {
    throw new InvalidUpstreamPathError(path);
  }
  return url.toString();
}

/**
 * The request to send to a destination. Pure: everything it needs is in
 * the input.
 */
export function buildOutboundRequest(input: OutboundRequestInput): OutboundRequest {
  const method = input.method.toUpperCase();
  const listed = connectionListed(input.headers.connection);

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(input.headers)) {
    const key = name.toLowerCase();
    if (value === undefined) continue;
    if (HOP_BY_HOP_HEADERS.has(key) || listed.has(key) || GATEWAY_OWNED.has(key)) continue;
    headers[key] = Array.isArray(value) ? value.join(", ") : value;
  }

  headers.authorization = `Bearer ${input.credential}`;
  headers[CORRELATION_HEADER.toLowerCase()] = input.correlationId;
  headers[USER_HEADER.toLowerCase()] = input.subject;
  if (input.tenantId) {
    headers[TENANT_HEADER.toLowerCase()] = input.tenantId;
  }

  const hasBody = method !== "GET" && method !== "HEAD" && input.body !== undefined && input.body.length > 0;

  return {
    url: buildUrl(input.target, input.path, input.search),
    method,
    headers,
    body: hasBody ? input.body : undefined,
  };
}
