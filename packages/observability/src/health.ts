// packages/observability/src/health.ts

import { Router } from "express";

/**
 * Liveness only. Mounted ahead of authentication and token exchange.
 */
export function healthRoutes(): Router {
  const r = Router();
  r.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });
  return r;
}
