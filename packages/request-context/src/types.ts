// packages/request-context/src/types.ts

/**
 * Caller identity produced by the inbound authenticator.
 * Lives for one request and is never persisted.
 */
export interface InboundIdentity {
  /** Canonical subject (the token's sub claim). */
  subject: string;

  /** Normalized issuer (no trailing slash). */
  issuer: string;

  /** Tenant the caller acts for; absent only when the deployment allows it. */
  tenantId?: string;

  roles: string[];
  scopes: string[];
  email?: string;
  name?: string;

  /** Token expiry, epoch milliseconds. */
  expiresAt: number;

  /**
   * The bearer token exactly as received. Used as exchange input and as
   * cache-key material only. Never log it.
   */
  rawToken: string;

  /** Verified claim set. */
  claims: Record<string, unknown>;
}

/**
 * Basic HTTP request metadata for this gateway hop.
 */
export interface GatewayRequestMeta {
  /** Correlation id, preserved from X-Correlation-ID or generated. */
  correlationId: string;

  /** ISO timestamp of when the gateway received the request. */
  startedAt: string;

  method: string;
  path: string;

  ip?: string;
  userAgent?: string;
}

/**
 * How the outbound credential for this request is produced.
 */
export type CredentialMode = "exchange" | "passthrough";

/**
 * Routing decisions made by the route table and audience resolver.
 */
export interface GatewayRoutingMeta {
  destinationId?: string;
  target?: string;
  audience?: string;
  mode?: CredentialMode;
}

/**
 * Outcome of the token exchange stage.
 */
export interface GatewayExchangeMeta {
  cacheHit?: boolean;
  latencyMs?: number;
}

export interface GatewayContext {
  /** Always present once the context is created. */
  request: GatewayRequestMeta;

  /** Filled by the identity stage. */
  identity?: InboundIdentity;

  routing?: GatewayRoutingMeta;

  exchange?: GatewayExchangeMeta;

  /** Escape hatch for extensions. */
  extras?: Record<string, unknown>;
}

/**
 * The slice of `fetch` the gateway uses for outbound calls. Injected so
 * tests can stand in for the identity provider and destinations.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Result of one pipeline stage: carry on, or the stage already answered.
 */
export type StageOutcome = "continue" | "handled";
