import {
  createRemoteJWKSet,
  errors,
  jwtVerify,
  type JWTPayload,
  type JWTVerifyGetKey,
} from "jose";
import { GatewayError, type InboundIdentity } from "@tapline/request-context";

export type AuthenticationFailureReason =
  | "missing_token"
  | "malformed_token"
  | "invalid_signature"
  | "invalid_issuer"
  | "invalid_audience"
  | "expired"
  | "not_yet_valid"
  | "missing_subject"
  | "key_unavailable";

/**
 * Any inbound-token failure. Callers only ever see a generic 401; the
 * reason is for logs.
 */
export class AuthenticationError extends GatewayError {
  readonly reason: AuthenticationFailureReason;

  constructor(reason: AuthenticationFailureReason, detail?: string, options?: { cause?: unknown }) {
    super("unauthorized", detail ? `${reason}: ${detail}` : reason, 401, options);
    this.reason = reason;
  }
}

export interface AuthenticatorConfig {
  /** Expected issuer, with or without a trailing slash. */
  issuer: string;
  /** The gateway's own audience. */
  audience: string;
  /** Defaults to `${issuer}/.well-known/jwks.json`. */
  jwksUri?: string;
  /**
   * Key resolver to use instead of fetching jwksUri (tests, pinned keys).
   */
  getKey?: JWTVerifyGetKey;
  /** Allowed skew for exp/nbf, seconds. Default 300. */
  clockToleranceSec?: number;
  /** Default ["RS256"]. */
  algorithms?: string[];
  /** Claim path for the tenant id. Default "tenant_id". */
  tenantClaim?: string;
  /** Claim path for roles; dotted paths like "realm_access.roles" work. Default "roles". */
  roleClaim?: string;
}

export interface Authenticator {
  authenticate(token: string | undefined): Promise<InboundIdentity>;
}

/**
 * Pull the token out of an Authorization header value.
 * Returns undefined for anything that is not a non-empty Bearer credential.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1];
}

export function trimTrailingSlashes(input: string): string {
  return input.replace(/\/+$/, "");
}

/**
 * Read a claim by dotted path ("realm_access.roles").
 */
export function readClaim(payload: Record<string, unknown>, path: string): unknown {
  let current: unknown = payload;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string" && v.length > 0);
  }
  if (typeof value === "string") {
    return value.split(" ").filter(Boolean);
  }
  return [];
}

function mapPayloadToIdentity(
  payload: JWTPayload,
  token: string,
  config: AuthenticatorConfig,
  normalizedIssuer: string
): InboundIdentity {
  const subject = typeof payload.sub === "string" ? payload.sub : "";
  if (!subject) {
    throw new AuthenticationError("missing_subject");
  }

  const claims: Record<string, unknown> = { ...payload };

  const rawTenant = readClaim(claims, config.tenantClaim ?? "tenant_id");
  const tenantId =
    typeof rawTenant === "string" && rawTenant.length > 0 ? rawTenant : undefined;

  const scopes = Array.from(
    new Set([...toStringList(claims.scope), ...toStringList(claims.scp)])
  );

  return {
    subject,
    issuer: normalizedIssuer,
    tenantId,
    roles: toStringList(readClaim(claims, config.roleClaim ?? "roles")),
    scopes,
    email: typeof claims.email === "string" ? claims.email : undefined,
    name: typeof claims.name === "string" ? claims.name : undefined,
    // requiredClaims guarantees exp
    expiresAt: (payload.exp ?? 0) * 1000,
    rawToken: token,
    claims,
  };
}

function classifyVerifyError(err: unknown): AuthenticationError {
  if (err instanceof AuthenticationError) return err;

  const detail = err instanceof Error ? err.message : String(err);
  const cause = { cause: err };

  if (err instanceof errors.JWTExpired) {
    return new AuthenticationError("expired", detail, cause);
  }
  if (err instanceof errors.JWTClaimValidationFailed) {
    if (err.reason === "missing") {
      return new AuthenticationError("malformed_token", detail, cause);
    }
    switch (err.claim) {
      case "iss":
        return new AuthenticationError("invalid_issuer", detail, cause);
      case "aud":
        return new AuthenticationError("invalid_audience", detail, cause);
      case "nbf":
        return new AuthenticationError("not_yet_valid", detail, cause);
      case "exp":
        return new AuthenticationError("expired", detail, cause);
      default:
        return new AuthenticationError("malformed_token", detail, cause);
    }
  }
  if (
    err instanceof errors.JWSSignatureVerificationFailed ||
    err instanceof errors.JWKSNoMatchingKey ||
    err instanceof errors.JWKSMultipleMatchingKeys ||
    err instanceof errors.JOSEAlgNotAllowed
  ) {
    return new AuthenticationError("invalid_signature", detail, cause);
  }
  if (err instanceof errors.JWKSTimeout || err instanceof errors.JWKSInvalid) {
    return new AuthenticationError("key_unavailable", detail, cause);
  }
  if (err instanceof errors.JOSEError) {
    return new AuthenticationError("malformed_token", detail, cause);
  }
  // Anything else came from fetching the key set.
  return new AuthenticationError("key_unavailable", detail, cause);
}

/**
 * Factory for the inbound authenticator. Checks, in order: signature,
 * issuer, audience, expiry and not-before (with clock tolerance).
 *
 * The remote key set is created once and cached by jose, so only the first
 * request (or a key rotation) pays for the JWKS fetch.
 */
export function createAuthenticator(config: AuthenticatorConfig): Authenticator {
  const issuerNoSlash = trimTrailingSlashes(config.issuer);
  const jwksUri = config.jwksUri || `${issuerNoSlash}/.well-known/jwks.json`;
  const getKey = config.getKey ?? createRemoteJWKSet(new URL(jwksUri));
  const clockTolerance = config.clockToleranceSec ?? 300;
  const algorithms = config.algorithms ?? ["RS256"];

  return {
    async authenticate(token: string | undefined): Promise<InboundIdentity> {
      if (!token) {
        throw new AuthenticationError("missing_token");
      }

      try {
        const { payload } = await jwtVerify(token, getKey, {
          issuer: [issuerNoSlash, `${issuerNoSlash}/`],
          audience: config.audience,
          algorithms,
          clockTolerance,
          requiredClaims: ["exp"],
        });

        return mapPayloadToIdentity(payload, token, config, issuerNoSlash);
      } catch (err) {
        throw classifyVerifyError(err);
      }
    },
  };
}
