// packages/observability/src/requestLogging.ts

import type { RequestHandler } from "express";
import { getGatewayContext, runInGatewayContext } from "@tapline/request-context";

import type { Logger } from "./logger";

/**
 * Emits one `gateway.request` event when a response finishes.
 *
 * The context is captured up front: "finish" fires from socket callbacks
 * that are outside the request's async chain.
 */
export function requestLoggingMiddleware(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    const ctx = getGatewayContext();

    res.on("finish", () => {
      const emit = () => {
        const fields = {
          method: req.method,
          path: (req.originalUrl || req.url || "").split("?")[0],
          status: res.statusCode,
          latencyMs: Date.now() - startedAt,
          destination: ctx?.routing?.destinationId,
          audience: ctx?.routing?.audience,
          credentialMode: ctx?.routing?.mode,
          cacheHit: ctx?.exchange?.cacheHit,
        };
        if (res.statusCode >= 500) {
          logger.warn("gateway.request", fields);
        } else {
          logger.info("gateway.request", fields);
        }
      };

      if (ctx) {
        runInGatewayContext(ctx, emit);
      } else {
        emit();
      }
    });

    next();
  };
}
