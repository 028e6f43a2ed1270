// packages/identity/src/index.ts
import type { Request } from "express";
import {
  AuthenticationError,
  extractBearerToken,
  type Authenticator,
} from "@tapline/identity-core";
import { createNoopLogger, type Logger } from "@tapline/observability";
import {
  GatewayError,
  updateGatewayContext,
  type InboundIdentity,
  type StageOutcome,
} from "@tapline/request-context";

export class TenantRequiredError extends GatewayError {
  constructor() {
    super("forbidden", "token carries no tenant claim", 403);
  }
}

export interface IdentityStageOptions {
  /** Reject authenticated callers without a tenant. Default true. */
  requireTenant?: boolean;
  logger?: Logger;
}

/**
 * First stage after correlation:
 * - reads the Bearer token from Authorization
 * - verifies it with the authenticator
 * - stores the identity in GatewayContext and on req.identity
 *
 * Every failure is thrown; the error handler turns it into a bare 401/403.
 */
export function createIdentityStage(
  authenticator: Authenticator,
  opts: IdentityStageOptions = {}
): (req: Request) => Promise<StageOutcome> {
  const requireTenant = opts.requireTenant ?? true;
  const logger = opts.logger ?? createNoopLogger();

  return async (req) => {
    const token = extractBearerToken(req.header("authorization"));

    let identity: InboundIdentity;
    try {
      identity = await authenticator.authenticate(token);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        logger.warn("auth.rejected", { reason: err.reason, detail: err.message });
      }
      throw err;
    }

    updateGatewayContext({ identity });
    req.identity = identity;

    if (requireTenant && !identity.tenantId) {
      logger.warn("auth.tenant_missing", { issuer: identity.issuer });
      throw new TenantRequiredError();
    }

    return "continue";
  };
}
