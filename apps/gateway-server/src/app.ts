// apps/gateway-server/src/app.ts
import express, { type Express } from "express";
import bodyParser from "body-parser";
import type { JWTVerifyGetKey } from "jose";
import { createAudienceResolver, createRouteTable } from "@tapline/audience-routing";
import { createForwarder } from "@tapline/forwarding";
import { createIdentityStage } from "@tapline/identity";
import { createAuthenticator } from "@tapline/identity-core";
import {
  correlationMiddleware,
  corsMiddleware,
  createLogger,
  healthRoutes,
  requestLoggingMiddleware,
  type Logger,
} from "@tapline/observability";
import { createRateLimiter } from "@tapline/rate-limit";
import type { FetchLike } from "@tapline/request-context";
import {
  createExchangePolicy,
  createTokenExchangeClient,
  createTokenExchanger,
  MemoryExchangeCache,
  type ExchangeCache,
} from "@tapline/token-exchange";

import type { GatewayConfig } from "./config";
import { errorHandler, notFoundHandler } from "./errorHandler";
import {
  composeStages,
  exchangeStage,
  forwardStage,
  middlewareStage,
  resolveStage,
  routeStage,
  type Stage,
} from "./pipeline";

/**
 * Collaborators that tests (or an embedding host) may replace.
 */
export interface GatewayDeps {
  /** Outbound fetch for both the token endpoint and destinations. */
  fetchImpl?: FetchLike;
  /** Inbound key resolver instead of the remote JWKS. */
  getKey?: JWTVerifyGetKey;
  cache?: ExchangeCache;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
}

export function buildApp(config: GatewayConfig, deps: GatewayDeps = {}): Express {
  const now = deps.now ?? Date.now;
  const logger =
    deps.logger ??
    createLogger({
      serviceName: config.serviceName,
      environment: config.environment,
      level: config.logLevel,
    });

  // -----------------------------
  // Identity
  // -----------------------------
  const authenticator = createAuthenticator({
    issuer: config.auth.issuer,
    audience: config.auth.audience,
    jwksUri: config.auth.jwksUri,
    getKey: deps.getKey,
    clockToleranceSec: config.auth.clockToleranceSec,
    algorithms: config.auth.algorithms,
    tenantClaim: config.auth.tenantClaim,
    roleClaim: config.auth.roleClaim,
  });
  const identityStage = createIdentityStage(authenticator, {
    requireTenant: config.auth.requireTenant,
    logger: logger.child("auth"),
  });

  // -----------------------------
  // Routing
  // -----------------------------
  const routeTable = createRouteTable(config.routes);
  const resolver = createAudienceResolver(config.audiences, config.unmapped);

  // -----------------------------
  // Token exchange
  // -----------------------------
  const exchangeLogger = logger.child("exchange");
  const exchanger = createTokenExchanger({
    cache:
      deps.cache ?? new MemoryExchangeCache({ refreshBufferMs: config.exchange.refreshBufferMs, now }),
    client: createTokenExchangeClient({
      tokenEndpoint: config.exchange.tokenEndpoint,
      clientId: config.exchange.clientId,
      clientSecret: config.exchange.clientSecret,
      fetchImpl: deps.fetchImpl,
      logger: exchangeLogger,
      now,
    }),
    policy: createExchangePolicy({
      totalTimeoutMs: config.exchange.totalTimeoutMs,
      attemptTimeoutMs: config.exchange.attemptTimeoutMs,
      retry: config.exchange.retry,
      circuitBreaker: config.circuitBreaker,
      logger: exchangeLogger,
      now,
      random: deps.random,
    }),
    logger: exchangeLogger,
  });

  // -----------------------------
  // Forwarding
  // -----------------------------
  const forwarder = createForwarder({
    timeoutMs: config.forwardTimeoutMs,
    circuitBreaker: config.circuitBreaker,
    fetchImpl: deps.fetchImpl,
    logger: logger.child("forward"),
    now,
  });

  // correlation -> authenticate -> rate limit -> resolve -> exchange -> forward
  const stages: Stage[] = [routeStage(routeTable), (req) => identityStage(req)];
  if (config.rateLimit) {
    stages.push(middlewareStage(createRateLimiter(config.rateLimit)));
  }
  stages.push(resolveStage(resolver), exchangeStage(exchanger, now), forwardStage(forwarder));

  // -----------------------------
  // Express setup
  // -----------------------------
  const app = express();
  app.disable("x-powered-by");

  // Body first: its stream callbacks would drop the request context.
  app.use(bodyParser.raw({ type: () => true, limit: config.bodyLimit }));
  app.use(correlationMiddleware());
  app.use(requestLoggingMiddleware(logger.child("http")));
  app.use(corsMiddleware({ allowedOrigins: config.corsAllowedOrigins }));
  app.use(healthRoutes());

  app.use(composeStages(stages));

  app.use(notFoundHandler);
  app.use(errorHandler(logger.child("http")));

  return app;
}
