// packages/observability/src/cors.ts

import type { RequestHandler } from "express";

export interface CorsConfig {
  /** Exact origins, or "*" to reflect any origin. Empty disables CORS headers. */
  allowedOrigins: string[];
}

const EXPOSED_HEADERS = "X-Correlation-ID, X-Tenant-ID";
const ALLOWED_METHODS = "GET,HEAD,POST,PUT,PATCH,DELETE,OPTIONS";
const DEFAULT_ALLOWED_HEADERS = "authorization,content-type,x-correlation-id";

/**
 * Credentialed CORS for the browser front end. Preflights are answered
 * here, before authentication.
 */
export function corsMiddleware(config: CorsConfig): RequestHandler {
  const allowAny = config.allowedOrigins.includes("*");
  const allowed = new Set(config.allowedOrigins);

  return (req, res, next) => {
    const origin = req.header("origin");
    if (!origin || (!allowAny && !allowed.has(origin))) {
      next();
      return;
    }

    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Vary", "Origin");
    res.setHeader("Access-Control-Allow-Credentials", "true");
    res.setHeader("Access-Control-Expose-Headers", EXPOSED_HEADERS);

    if (req.method === "OPTIONS" && req.header("access-control-request-method")) {
      res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS);
      res.setHeader(
        "Access-Control-Allow-Headers",
        req.header("access-control-request-headers") || DEFAULT_ALLOWED_HEADERS
      );
      res.status(204).end();
      return;
    }

    next();
  };
}
