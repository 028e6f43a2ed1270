import type { Request, RequestHandler } from "express";
import rateLimit from "express-rate-limit";
import { GatewayError, getGatewayContext } from "@tapline/request-context";

export interface RateLimitConfig {
  /**
   * Rate limit window in milliseconds.
   * e.g. 60000 for 1 minute
   */
  windowMs: number;
  /**
   * Max number of requests per window and identity.
   */
  limit: number;
}

export class RateLimitedError extends GatewayError {
  constructor() {
    super("too_many_requests", "rate limit exceeded", 429);
  }
}

/**
 * Key for the limiter: tenant + subject of the authenticated identity.
 * Without one, the client address as Express resolves it, so forwarded
 * headers only count when `trust proxy` says they should.
 */
export function rateLimitKey(req: Request): string {
  const identity = getGatewayContext()?.identity;
  if (identity) {
    return `${identity.tenantId ?? "-"}:${identity.subject}`;
  }
  return `ip:${req.ip ?? "unknown"}`;
}

/**
 * Per-identity rate limit. Runs after authentication so the key is the
 * verified caller, never a client-supplied header. Over the limit it
 * passes a RateLimitedError on to the error handler.
 */
export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.limit,
    keyGenerator: rateLimitKey,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new RateLimitedError());
    },
  });
}
