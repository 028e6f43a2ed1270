// packages/request-context/src/index.ts

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

import type { GatewayContext, GatewayRequestMeta } from "./types";

export * from "./types";
export { GatewayError, toGatewayError } from "./errors";

type GatewayContextOverrides = Omit<Partial<GatewayContext>, "request"> & {
  request?: Partial<GatewayRequestMeta>;
};

export function createGatewayContext(
  overrides: GatewayContextOverrides = {}
): GatewayContext {
  const reqOverrides: Partial<GatewayRequestMeta> = overrides.request ?? {};

  const request: GatewayRequestMeta = {
    correlationId: reqOverrides.correlationId ?? randomUUID(),
    startedAt: reqOverrides.startedAt ?? new Date().toISOString(),
    method: reqOverrides.method ?? "UNKNOWN",
    path: reqOverrides.path ?? "UNKNOWN",
    ip: reqOverrides.ip,
    userAgent: reqOverrides.userAgent,
  };

  return {
    request,
    identity: overrides.identity,
    routing: overrides.routing,
    exchange: overrides.exchange,
    extras: overrides.extras ?? {},
  };
}

export function mergeGatewayContext(
  base: GatewayContext,
  updates: GatewayContextOverrides
): GatewayContext {
  const request: GatewayRequestMeta = {
    ...base.request,
    ...(updates.request ?? {}),
  };

  return {
    ...base,
    request,
    identity: updates.identity ?? base.identity,
    routing: { ...base.routing, ...updates.routing },
    exchange: { ...base.exchange, ...updates.exchange },
    extras: { ...(base.extras ?? {}), ...(updates.extras ?? {}) },
  };
}

const gatewayAls = new AsyncLocalStorage<GatewayContext>();

/**
 * Run a function with a fresh GatewayContext bound to the current async call chain.
 * Called once per inbound HTTP request by the correlation middleware.
 */
export function runWithGatewayContext<T>(
  overrides: GatewayContextOverrides,
  fn: () => T
): T {
  const ctx = createGatewayContext(overrides);
  return gatewayAls.run(ctx, fn);
}

/**
 * Re-enter an existing context, e.g. from an event callback that fired
 * outside the request's async chain.
 */
export function runInGatewayContext<T>(ctx: GatewayContext, fn: () => T): T {
  return gatewayAls.run(ctx, fn);
}

/**
 * Current GatewayContext, or undefined outside runWithGatewayContext.
 */
export function getGatewayContext(): GatewayContext | undefined {
  return gatewayAls.getStore();
}

/**
 * Merge updates into the current context in place, so references held
 * by earlier stages stay valid.
 */
export function updateGatewayContext(updates: GatewayContextOverrides): void {
  const current = gatewayAls.getStore();
  if (!current) return;

  Object.assign(current, mergeGatewayContext(current, updates));
}
