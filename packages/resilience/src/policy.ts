import { CircuitBreaker, type CircuitBreakerOptions, type StateChangeListener } from "./circuitBreaker";
import { CancelledError, CircuitOpenError, TimeoutError } from "./errors";
import { computeBackoff, type RetryOptions } from "./retry";
import { abortReason, linkedController, raceWithSignal, sleep } from "./signals";

export interface RetryEvent {
  policy: string;
  /** 1-based number of the retry about to run. */
  retry: number;
  delayMs: number;
  error: unknown;
}

export interface ResiliencePolicyOptions<T> {
  name: string;
  /** Budget for the whole call including retries and backoff. */
  totalTimeoutMs?: number;
  /** Budget for a single attempt. */
  attemptTimeoutMs?: number;
  retry?: RetryOptions;
  circuitBreaker?: CircuitBreakerOptions;
  /** Default: attempt timeouts only. Open circuits and cancellations never retry. */
  isRetryable?: (err: unknown) => boolean;
  /** Default: every error. Cancellations never reach the breaker's counts. */
  isFailure?: (err: unknown) => boolean;
  isFailureResult?: (value: T) => boolean;
  onRetry?: (event: RetryEvent) => void;
  onStateChange?: StateChangeListener;
  now?: () => number;
  random?: () => number;
}

export interface ExecuteOptions {
  /** Caller cancellation (e.g. the inbound connection closed). */
  signal?: AbortSignal;
}

export interface ResiliencePolicy<T> {
  readonly name: string;
  readonly breaker?: CircuitBreaker;
  execute(fn: (signal: AbortSignal) => Promise<T>, opts?: ExecuteOptions): Promise<T>;
}

/**
 * Timeout, retry and circuit breaking around one dependency.
 *
 * Layering, outermost first: total timeout -> retry -> circuit breaker ->
 * attempt timeout -> fn. The breaker sees every attempt; an open breaker
 * fails fast and ends the retry loop.
 */
export function createResiliencePolicy<T>(opts: ResiliencePolicyOptions<T>): ResiliencePolicy<T> {
  const { name } = opts;
  const random = opts.random ?? Math.random;
  const maxRetries = opts.retry?.maxRetries ?? 0;
  const isRetryable = opts.isRetryable ?? ((err: unknown) => err instanceof TimeoutError);
  const isFailure = opts.isFailure ?? (() => true);

  const breaker = opts.circuitBreaker
    ? new CircuitBreaker(name, opts.circuitBreaker, opts.now, opts.onStateChange)
    : undefined;

  const classifier = {
    isFailure,
    isFailureResult: opts.isFailureResult,
    isCancellation: (err: unknown) => err instanceof CancelledError,
  };

  async function attemptWithTimeout(
    fn: (signal: AbortSignal) => Promise<T>,
    parent: AbortSignal
  ): Promise<T> {
    const { controller, unlink } = linkedController(parent);
    const timeoutMs = opts.attemptTimeoutMs;
    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => controller.abort(new TimeoutError(name, timeoutMs)), timeoutMs)
        : undefined;

    try {
      if (controller.signal.aborted) {
        throw abortReason(controller.signal, name);
      }
      return await raceWithSignal(fn(controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
      unlink();
    }
  }

  function runAttempt(fn: (signal: AbortSignal) => Promise<T>, parent: AbortSignal): Promise<T> {
    if (!breaker) return attemptWithTimeout(fn, parent);
    return breaker.execute(() => attemptWithTimeout(fn, parent), classifier);
  }

  async function runWithRetries(
    fn: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await runAttempt(fn, signal);
      } catch (err) {
        if (signal.aborted) throw abortReason(signal, name);
        if (err instanceof CircuitOpenError || err instanceof CancelledError) throw err;
        if (attempt >= maxRetries || !isRetryable(err)) throw err;

        const delayMs = opts.retry ? computeBackoff(attempt, opts.retry, random) : 0;
        opts.onRetry?.({ policy: name, retry: attempt + 1, delayMs, error: err });
        await sleep(delayMs, signal);
      }
    }
  }

  return {
    name,
    breaker,
    async execute(fn, execOpts = {}) {
      const { controller, unlink } = linkedController(execOpts.signal);
      const totalMs = opts.totalTimeoutMs;
      const timer =
        totalMs !== undefined
          ? setTimeout(() => controller.abort(new TimeoutError(name, totalMs)), totalMs)
          : undefined;

      try {
        return await raceWithSignal(runWithRetries(fn, controller.signal), controller.signal);
      } finally {
        clearTimeout(timer);
        unlink();
      }
    },
  };
}
