import type { Response as ExpressResponse } from "express";
import { CORRELATION_HEADER } from "@tapline/observability";

import type { UpstreamResponse } from "./forwarder";
import { connectionListed, HOP_BY_HOP_HEADERS } from "./headers";

// fetch has already decoded the body and it is sent here in one piece
const REFRAMED = new Set(["content-encoding", "content-length", "set-cookie"]);

/**
 * Copy a destination response to the caller: status, headers and body as
 * received, minus hop-by-hop and framing headers.
 */
export function relayResponse(
  res: ExpressResponse,
  upstream: UpstreamResponse,
  correlationId: string
): void {
  const listed = connectionListed(upstream.headers.get("connection"));

  res.status(upstream.status);
  upstream.headers.forEach((value, key) => {
    const k = key.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(k) || listed.has(k) || REFRAMED.has(k)) return;
    res.setHeader(key, value);
  });

  const cookies = upstream.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader("set-cookie", cookies);
  }
  res.setHeader(CORRELATION_HEADER, correlationId);

  res.end(Buffer.from(upstream.body.buffer, upstream.body.byteOffset, upstream.body.byteLength));
}
