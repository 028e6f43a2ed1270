import { createNoopLogger, type Logger } from "@tapline/observability";
import type { InboundIdentity } from "@tapline/request-context";
import {
  createResiliencePolicy,
  DEFAULT_CIRCUIT_BREAKER,
  DEFAULT_RETRY,
  TimeoutError,
  type CircuitBreakerOptions,
  type ResiliencePolicy,
  type RetryOptions,
} from "@tapline/resilience";

import { cacheKey, type ExchangeCache } from "./cache";
import type { ExchangedToken, TokenExchangeClient } from "./client";
import { ExchangeError, isRetryableExchangeError } from "./errors";

export interface ExchangePolicyOptions {
  totalTimeoutMs?: number;
  attemptTimeoutMs?: number;
  retry?: RetryOptions;
  circuitBreaker?: CircuitBreakerOptions;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
}

const isTransient = (err: unknown) => isRetryableExchangeError(err) || err instanceof TimeoutError;

/**
 * Policy for calls to the token endpoint: retries and breaker both look at
 * transport failures, timeouts and 5xx only. A 4xx from the identity
 * provider is an answer, not an outage.
 */
export function createExchangePolicy(
  opts: ExchangePolicyOptions = {}
): ResiliencePolicy<ExchangedToken> {
  const logger = opts.logger ?? createNoopLogger();

  return createResiliencePolicy<ExchangedToken>({
    name: "token-exchange",
    totalTimeoutMs: opts.totalTimeoutMs ?? 10_000,
    attemptTimeoutMs: opts.attemptTimeoutMs ?? 3_000,
    retry: opts.retry ?? DEFAULT_RETRY,
    circuitBreaker: opts.circuitBreaker ?? DEFAULT_CIRCUIT_BREAKER,
    isRetryable: isTransient,
    isFailure: isTransient,
    now: opts.now,
    random: opts.random,
    onRetry: ({ retry, delayMs, error }) =>
      logger.warn("token_exchange.retry", {
        retry,
        delayMs,
        reason: error instanceof Error ? error.message : String(error),
      }),
    onStateChange: (circuit, from, to) =>
      logger.warn("circuit.state_changed", { circuit, from, to }),
  });
}

export interface TokenExchangerDeps {
  cache: ExchangeCache;
  client: TokenExchangeClient;
  policy?: ResiliencePolicy<ExchangedToken>;
  logger?: Logger;
}

export interface ExchangeOutcome {
  token: string;
  cacheHit: boolean;
  expiresAt: number;
}

export interface TokenExchanger {
  getToken(identity: InboundIdentity, audience: string, signal?: AbortSignal): Promise<ExchangeOutcome>;
}

export function createTokenExchanger(deps: TokenExchangerDeps): TokenExchanger {
  const { cache, client, policy } = deps;
  const logger = deps.logger ?? createNoopLogger();

  return {
    async getToken(identity, audience, signal) {
      const subjectToken = identity.rawToken;
      const load = (flightSignal: AbortSignal) =>
        policy
          ? policy.execute((s) => client.exchange(subjectToken, audience, s), { signal: flightSignal })
          : client.exchange(subjectToken, audience, flightSignal);

      try {
        const { token, cacheHit } = await cache.getOrLoad(cacheKey(subjectToken, audience), load, signal);
        logger.debug("token_exchange.resolved", { audience, cacheHit });
        return { token: token.accessToken, cacheHit, expiresAt: token.expiresAt };
      } catch (err) {
        if (err instanceof TimeoutError) {
          throw new ExchangeError("NetworkFailure", err.message, { cause: err });
        }
        throw err;
      }
    },
  };
}
