export interface RetryOptions {
  /** Retries after the first attempt. 0 disables retrying. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Full jitter: a uniform delay in [0, backoff). Default true. */
  jitter?: boolean;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
  jitter: true,
};

/**
 * Exponential backoff for the retry following `attempt` (0-based).
 */
export function computeBackoff(
  attempt: number,
  opts: RetryOptions,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(opts.maxDelayMs, opts.baseDelayMs * 2 ** attempt);
  if (opts.jitter === false) return ceiling;
  return Math.floor(random() * ceiling);
}
