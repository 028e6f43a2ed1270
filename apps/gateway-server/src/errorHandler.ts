// apps/gateway-server/src/errorHandler.ts
import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "@tapline/observability";
import { GatewayError, toGatewayError } from "@tapline/request-context";

/**
 * body-parser reports oversized or unreadable bodies as http-errors with
 * a 4xx status.
 */
function fromHttpError(err: unknown): GatewayError | undefined {
  if (err instanceof GatewayError || typeof err !== "object" || err === null) return undefined;
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  if (err.status < 400 || err.status >= 500) return undefined;

  const message = err instanceof Error ? err.message : "bad request";
  const code = err.status === 413 ? "payload_too_large" : "bad_request";
  return new GatewayError(code, message, err.status, { cause: err });
}

/**
 * The one place errors become HTTP responses: `{ "error": code }` and
 * nothing else. Detail goes to the log under the request's correlation id.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err, _req, res, next) => {
    const gatewayErr = fromHttpError(err) ?? toGatewayError(err);

    const fields = {
      code: gatewayErr.code,
      status: gatewayErr.status,
      errorName: gatewayErr.name,
      detail: gatewayErr.message,
    };
    if (gatewayErr.status >= 500) {
      logger.error("request.failed", {
        ...fields,
        stack: gatewayErr.status === 500 ? gatewayErr.stack : undefined,
      });
    } else {
      logger.warn("request.rejected", fields);
    }

    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(gatewayErr.status).json({ error: gatewayErr.code });
  };
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "not_found" });
};
