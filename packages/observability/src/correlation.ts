// packages/observability/src/correlation.ts

import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { runWithGatewayContext } from "@tapline/request-context";

export const CORRELATION_HEADER = "X-Correlation-ID";

export interface CorrelationOptions {
  generate?: () => string;
}

/**
 * Opens the GatewayContext for the request.
 *
 * An inbound X-Correlation-ID is kept verbatim; otherwise a UUID is
 * generated. The header is set on the response before any handler runs,
 * so error responses carry it too.
 */
export function correlationMiddleware(opts: CorrelationOptions = {}): RequestHandler {
  const generate = opts.generate ?? randomUUID;

  return (req, res, next) => {
    const incoming = req.header(CORRELATION_HEADER);
    const correlationId = incoming && incoming.length > 0 ? incoming : generate();

    res.setHeader(CORRELATION_HEADER, correlationId);

    runWithGatewayContext(
      {
        request: {
          correlationId,
          method: req.method,
          path: req.path,
          ip: req.ip,
          userAgent: req.get("user-agent") ?? undefined,
        },
      },
      () => next()
    );
  };
}
