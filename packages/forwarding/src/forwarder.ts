import { createNoopLogger, type Logger } from "@tapline/observability";
import type { FetchLike } from "@tapline/request-context";
import {
  CancelledError,
  CircuitOpenError,
  createResiliencePolicy,
  DEFAULT_CIRCUIT_BREAKER,
  TimeoutError,
  type CircuitBreakerOptions,
  type ResiliencePolicy,
} from "@tapline/resilience";

import { DestinationError } from "./errors";
import type { OutboundRequest } from "./outbound";

export interface ForwarderConfig {
  /** Per-request budget for the destination call. Default 30s. */
  timeoutMs?: number;
  circuitBreaker?: CircuitBreakerOptions;
  fetchImpl?: FetchLike;
  logger?: Logger;
  now?: () => number;
}

/**
 * A destination response with its body already read. The body is read
 * under the same attempt signal as the request, so the timeout and caller
 * cancellation cover the whole exchange with the destination.
 */
export interface UpstreamResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
}

export interface Forwarder {
  forward(
    destinationId: string,
    outbound: OutboundRequest,
    signal?: AbortSignal
  ): Promise<UpstreamResponse>;
  /** Resilience policy for a destination, created on first use. */
  policyFor(destinationId: string): ResiliencePolicy<UpstreamResponse>;
}

/**
 * Sends re-signed requests to destinations. One breaker per destination;
 * proxied calls are never retried since the gateway cannot know whether
 * they are idempotent.
 */
export function createForwarder(config: ForwarderConfig = {}): Forwarder {
  const fetchImpl: FetchLike = config.fetchImpl ?? ((input, init) => fetch(input, init));
  const logger = config.logger ?? createNoopLogger();
  const now = config.now ?? Date.now;
  const policies = new Map<string, ResiliencePolicy<UpstreamResponse>>();

  function policyFor(destinationId: string): ResiliencePolicy<UpstreamResponse> {
    const existing = policies.get(destinationId);
    if (existing) return existing;

    const policy = createResiliencePolicy<UpstreamResponse>({
      name: `forward:${destinationId}`,
      attemptTimeoutMs: config.timeoutMs ?? 30_000,
      circuitBreaker: config.circuitBreaker ?? DEFAULT_CIRCUIT_BREAKER,
      isFailureResult: (res) => res.status >= 500,
      now: config.now,
      onStateChange: (circuit, from, to) =>
        logger.warn("circuit.state_changed", { circuit, from, to }),
    });
    policies.set(destinationId, policy);
    return policy;
  }

  async function send(outbound: OutboundRequest, signal: AbortSignal): Promise<UpstreamResponse> {
    const res = await fetchImpl(outbound.url, {
      method: outbound.method,
      headers: outbound.headers,
      body: outbound.body,
      redirect: "manual",
      signal,
    });
    const body = new Uint8Array(await res.arrayBuffer());
    return { status: res.status, headers: res.headers, body };
  }

  return {
    policyFor,
    async forward(destinationId, outbound, signal) {
      const started = now();
      try {
        const res = await policyFor(destinationId).execute(
          (attemptSignal) => send(outbound, attemptSignal),
          { signal }
        );
        logger.debug("forward.completed", {
          destination: destinationId,
          status: res.status,
          latencyMs: now() - started,
        });
        return res;
      } catch (err) {
        if (err instanceof CancelledError || err instanceof CircuitOpenError) throw err;

        const failure = err instanceof TimeoutError ? "timeout" : "network";
        logger.warn("forward.failed", {
          destination: destinationId,
          failure,
          latencyMs: now() - started,
          detail: err instanceof Error ? err.message : String(err),
        });
        throw new DestinationError(destinationId, failure, { cause: err });
      }
    },
  };
}
