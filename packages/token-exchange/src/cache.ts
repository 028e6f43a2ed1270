import { createHash } from "node:crypto";
import { abortReason, CancelledError, raceWithSignal } from "@tapline/resilience";

import type { ExchangedToken } from "./client";

export const DEFAULT_REFRESH_BUFFER_MS = 300_000;

/**
 * Cache key for one (subject token, audience) pair. The raw token never
 * sits in memory as a map key.
 */
export function cacheKey(subjectToken: string, audience: string): string {
  const digest = createHash("sha256").update(subjectToken).digest("hex");
  return `${digest}:${audience}`;
}

export interface CachedExchangedToken {
  key: string;
  token: ExchangedToken;
  fetchedAt: number;
}

export type CacheLookup = { hit: true; token: ExchangedToken } | { hit: false };

export type TokenLoader = (signal: AbortSignal) => Promise<ExchangedToken>;

export interface LoadResult {
  token: ExchangedToken;
  cacheHit: boolean;
}

export interface ExchangeCache {
  get(key: string): CacheLookup;
  /** Returns false when the token is too close to expiry to be stored. */
  put(key: string, token: ExchangedToken): boolean;
  invalidate(key: string): boolean;
  clear(): void;
  size(): number;
  /**
   * Cached token, or the result of `loader`. Concurrent misses on one key
   * share a single loader call.
   */
  getOrLoad(key: string, loader: TokenLoader, signal?: AbortSignal): Promise<LoadResult>;
}

export interface MemoryExchangeCacheOptions {
  refreshBufferMs?: number;
  now?: () => number;
}

interface Flight {
  controller: AbortController;
  promise: Promise<ExchangedToken>;
  waiters: number;
  settled: boolean;
}

export class MemoryExchangeCache implements ExchangeCache {
  private readonly entries = new Map<string, CachedExchangedToken>();
  private readonly flights = new Map<string, Flight>();
  private readonly refreshBufferMs: number;
  private readonly now: () => number;
  private sweepTimer?: ReturnType<typeof setInterval>;

  constructor(opts: MemoryExchangeCacheOptions = {}) {
    this.refreshBufferMs = opts.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS;
    this.now = opts.now ?? Date.now;
  }

  private isFresh(token: ExchangedToken): boolean {
    return this.now() < token.expiresAt - this.refreshBufferMs;
  }

  get(key: string): CacheLookup {
    const entry = this.entries.get(key);
    if (!entry) return { hit: false };

    if (!this.isFresh(entry.token)) {
      this.entries.delete(key);
      return { hit: false };
    }
    return { hit: true, token: entry.token };
  }

  put(key: string, token: ExchangedToken): boolean {
    if (!this.isFresh(token)) return false;
    this.entries.set(key, { key, token, fetchedAt: this.now() });
    return true;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  /** Drop every entry inside the refresh buffer. Returns how many went. */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry.token)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  startSweep(intervalMs: number): () => void {
    this.stopSweep();
    const timer = setInterval(() => this.prune(), intervalMs);
    timer.unref();
    this.sweepTimer = timer;
    return () => this.stopSweep();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  async getOrLoad(key: string, loader: TokenLoader, signal?: AbortSignal): Promise<LoadResult> {
    const cached = this.get(key);
    if (cached.hit) return { token: cached.token, cacheHit: true };

    if (signal?.aborted) throw abortReason(signal, "token exchange");

    const flight = this.flights.get(key) ?? this.startFlight(key, loader);
    flight.waiters += 1;

    try {
      const token = signal ? await raceWithSignal(flight.promise, signal) : await flight.promise;
      return { token, cacheHit: false };
    } finally {
      flight.waiters -= 1;
      // Last waiter gone before the load finished: nobody needs the result.
      if (flight.waiters === 0 && !flight.settled) {
        flight.controller.abort(new CancelledError("token exchange"));
        if (this.flights.get(key) === flight) this.flights.delete(key);
      }
    }
  }

  private startFlight(key: string, loader: TokenLoader): Flight {
    const controller = new AbortController();
    const flight: Flight = {
      controller,
      waiters: 0,
      settled: false,
      promise: Promise.resolve().then(() => loader(controller.signal)),
    };

    flight.promise = flight.promise.then(
      (token) => {
        flight.settled = true;
        if (this.flights.get(key) === flight) this.flights.delete(key);
        this.put(key, token);
        return token;
      },
      (err: unknown) => {
        flight.settled = true;
        if (this.flights.get(key) === flight) this.flights.delete(key);
        throw err;
      }
    );

    this.flights.set(key, flight);
    return flight;
  }
}
