// apps/gateway-server/src/config.ts
import { z } from "zod";
import {
  parseRouteAudiencesJson,
  parseRoutesJson,
  RouteConfigError,
  validateRouteAudiences,
  type DestinationRoute,
  type RouteAudienceMap,
  type UnmappedRoutePolicy,
} from "@tapline/audience-routing";
import { isLogLevel, type LogLevel } from "@tapline/observability";
import type { RateLimitConfig } from "@tapline/rate-limit";
import type { CircuitBreakerOptions, RetryOptions } from "@tapline/resilience";

export interface EnvLike {
  [key: string]: string | undefined;
}

export interface AuthSettings {
  issuer: string;
  audience: string;
  jwksUri?: string;
  clockToleranceSec: number;
  algorithms: string[];
  tenantClaim: string;
  roleClaim: string;
  requireTenant: boolean;
}

export interface ExchangeSettings {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  refreshBufferMs: number;
  /** 0 disables the background sweep. */
  sweepIntervalMs: number;
  totalTimeoutMs: number;
  attemptTimeoutMs: number;
  retry: RetryOptions;
}

export interface GatewayConfig {
  port: number;
  serviceName: string;
  environment: string;
  logLevel: LogLevel;
  auth: AuthSettings;
  exchange: ExchangeSettings;
  routes: DestinationRoute[];
  audiences: RouteAudienceMap;
  unmapped: UnmappedRoutePolicy;
  forwardTimeoutMs: number;
  circuitBreaker: CircuitBreakerOptions;
  /** Undefined when RATE_LIMIT_MAX is 0. */
  rateLimit?: RateLimitConfig;
  corsAllowedOrigins: string[];
  bodyLimit: string;
}

/**
 * Invalid deployment settings. Lists every problem at once; fatal at startup.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positive = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === "true" || v === "1"));

const list = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((v) =>
      v === undefined
        ? fallback
        : v
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean)
    );

const EnvSchema = z.object({
  PORT: positive(8080),
  SERVICE_NAME: z.string().default("gateway-server"),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z
    .custom<LogLevel>((v) => typeof v === "string" && isLogLevel(v), "unknown log level")
    .default("info"),

  OAUTH_ISSUER: z.string().url(),
  OAUTH_AUDIENCE: z.string().min(1),
  OAUTH_JWKS_URI: z.string().url().optional(),
  OAUTH_CLOCK_TOLERANCE_SEC: count(300),
  OAUTH_ALGORITHMS: list(["RS256"]),
  TENANT_CLAIM: z.string().default("tenant_id"),
  ROLE_CLAIM: z.string().default("roles"),
  REQUIRE_TENANT: flag(true),

  TOKEN_EXCHANGE_ENDPOINT: z.string().url(),
  TOKEN_EXCHANGE_CLIENT_ID: z.string().min(1),
  TOKEN_EXCHANGE_CLIENT_SECRET: z.string().min(1),
  TOKEN_CACHE_REFRESH_BUFFER_SEC: count(300),
  TOKEN_CACHE_SWEEP_INTERVAL_MS: count(60_000),

  UNMAPPED_ROUTE_POLICY: z.enum(["reject", "passthrough"]).default("reject"),
  UNMAPPED_ROUTE_STATUS: z
    .enum(["404", "501"])
    .default("404")
    .transform((v): 404 | 501 => (v === "501" ? 501 : 404)),

  EXCHANGE_TIMEOUT_MS: positive(10_000),
  EXCHANGE_ATTEMPT_TIMEOUT_MS: positive(3_000),
  EXCHANGE_MAX_RETRIES: count(3),
  EXCHANGE_RETRY_BASE_MS: count(200),
  FORWARD_TIMEOUT_MS: positive(30_000),

  BREAKER_FAILURE_RATIO: z.coerce.number().gt(0).max(1).default(0.5),
  BREAKER_MINIMUM_THROUGHPUT: positive(5),
  BREAKER_SAMPLING_MS: positive(10_000),
  BREAKER_BREAK_MS: positive(30_000),

  RATE_LIMIT_WINDOW_MS: positive(60_000),
  RATE_LIMIT_MAX: count(0),

  CORS_ALLOWED_ORIGINS: list([]),
  BODY_LIMIT: z.string().default("2mb"),
});

function formatIssue(issue: z.ZodIssue): string {
  return `${issue.path.join(".") || "env"}: ${issue.message}`;
}

/**
 * Read and validate the gateway's settings once at startup. Blank
 * variables count as unset.
 */
export function configFromEnv(env: EnvLike): GatewayConfig {
  const present: EnvLike = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const issues: string[] = [];
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    issues.push(...parsed.error.issues.map(formatIssue));
  }

  let routes: DestinationRoute[] = [];
  let audiences: RouteAudienceMap = {};
  try {
    routes = parseRoutesJson(present.ROUTES_JSON);
    audiences = parseRouteAudiencesJson(present.ROUTE_AUDIENCES_JSON);
    validateRouteAudiences(routes, audiences);
  } catch (err) {
    if (!(err instanceof RouteConfigError)) throw err;
    issues.push(err.message);
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    serviceName: e.SERVICE_NAME,
    environment: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    auth: {
      issuer: e.OAUTH_ISSUER,
      audience: e.OAUTH_AUDIENCE,
      jwksUri: e.OAUTH_JWKS_URI,
      clockToleranceSec: e.OAUTH_CLOCK_TOLERANCE_SEC,
      algorithms: e.OAUTH_ALGORITHMS,
      tenantClaim: e.TENANT_CLAIM,
      roleClaim: e.ROLE_CLAIM,
      requireTenant: e.REQUIRE_TENANT,
    },
    exchange: {
      tokenEndpoint: e.TOKEN_EXCHANGE_ENDPOINT,
      clientId: e.TOKEN_EXCHANGE_CLIENT_ID,
      clientSecret: e.TOKEN_EXCHANGE_CLIENT_SECRET,
      refreshBufferMs: e.TOKEN_CACHE_REFRESH_BUFFER_SEC * 1000,
      sweepIntervalMs: e.TOKEN_CACHE_SWEEP_INTERVAL_MS,
      totalTimeoutMs: e.EXCHANGE_TIMEOUT_MS,
      attemptTimeoutMs: e.EXCHANGE_ATTEMPT_TIMEOUT_MS,
      retry: {
        maxRetries: e.EXCHANGE_MAX_RETRIES,
        baseDelayMs: e.EXCHANGE_RETRY_BASE_MS,
        maxDelayMs: Math.max(e.EXCHANGE_RETRY_BASE_MS, 2_000),
        jitter: true,
      },
    },
    routes,
    audiences,
    unmapped:
      e.UNMAPPED_ROUTE_POLICY === "passthrough"
        ? { mode: "passthrough" }
        : { mode: "reject", status: e.UNMAPPED_ROUTE_STATUS },
    forwardTimeoutMs: e.FORWARD_TIMEOUT_MS,
    circuitBreaker: {
      failureRatio: e.BREAKER_FAILURE_RATIO,
      minimumThroughput: e.BREAKER_MINIMUM_THROUGHPUT,
      samplingDurationMs: e.BREAKER_SAMPLING_MS,
      breakDurationMs: e.BREAKER_BREAK_MS,
    },
    rateLimit:
      e.RATE_LIMIT_MAX > 0 ? { windowMs: e.RATE_LIMIT_WINDOW_MS, limit: e.RATE_LIMIT_MAX } : undefined,
    corsAllowedOrigins: e.CORS_ALLOWED_ORIGINS,
    bodyLimit: e.BODY_LIMIT,
  };
}
