import { CircuitOpenError } from "./errors";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  /** Failures / calls within the window that trips the breaker, 0..1. */
  failureRatio: number;
  /** Calls needed in the window before the ratio is considered. */
  minimumThroughput: number;
  samplingDurationMs: number;
  /** How long the breaker stays open before a trial call. */
  breakDurationMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerOptions = {
  failureRatio: 0.5,
  minimumThroughput: 5,
  samplingDurationMs: 10_000,
  breakDurationMs: 30_000,
};

export interface OutcomeClassifier<T> {
  /** Whether a thrown error counts against the dependency. */
  isFailure(err: unknown): boolean;
  /** Whether a returned value counts against it (e.g. a 5xx response). */
  isFailureResult?(value: T): boolean;
  /**
   * Whether the caller gave up before the dependency answered. Such a call
   * records nothing; a half-open trial is released for the next caller.
   */
  isCancellation?(err: unknown): boolean;
}

export type StateChangeListener = (circuit: string, from: CircuitState, to: CircuitState) => void;

interface Sample {
  at: number;
  failed: boolean;
}

/**
 * Failure-ratio circuit breaker over a sliding sampling window.
 *
 * closed -> open when the ratio is reached with enough throughput;
 * open -> half-open once breakDurationMs has passed, admitting one trial;
 * the trial's outcome closes or re-opens the circuit.
 */
export class CircuitBreaker {
  private samples: Sample[] = [];
  private current: CircuitState = "closed";
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    readonly name: string,
    private readonly opts: CircuitBreakerOptions,
    private readonly now: () => number = Date.now,
    private readonly onStateChange?: StateChangeListener
  ) {}

  get state(): CircuitState {
    return this.current;
  }

  async execute<T>(fn: () => Promise<T>, classify: OutcomeClassifier<T>): Promise<T> {
    this.acquire();

    let failed: boolean;
    try {
      const value = await fn();
      failed = classify.isFailureResult?.(value) ?? false;
      this.record(failed);
      return value;
    } catch (err) {
      if (classify.isCancellation?.(err)) {
        this.release();
      } else {
        this.record(classify.isFailure(err));
      }
      throw err;
    }
  }

  /** Forget all samples and close. */
  reset(): void {
    this.samples = [];
    this.trialInFlight = false;
    this.transition("closed");
  }

  private acquire(): void {
    if (this.current === "closed") return;

    const now = this.now();
    const reopenAt = this.openedAt + this.opts.breakDurationMs;

    if (this.current === "open") {
      if (now < reopenAt) {
        throw new CircuitOpenError(this.name, reopenAt - now);
      }
      this.transition("half-open");
    }

    // half-open: one trial at a time
    if (this.trialInFlight) {
      throw new CircuitOpenError(this.name, 0);
    }
    this.trialInFlight = true;
  }

  private release(): void {
    if (this.current === "half-open") this.trialInFlight = false;
  }

  private record(failed: boolean): void {
    const now = this.now();

    if (this.current === "half-open") {
      this.trialInFlight = false;
      if (failed) {
        this.open(now);
      } else {
        this.samples = [];
        this.transition("closed");
      }
      return;
    }

    if (this.current === "open") return;

    this.samples.push({ at: now, failed });
    const windowStart = now - this.opts.samplingDurationMs;
    this.samples = this.samples.filter((s) => s.at > windowStart);

    if (!failed || this.samples.length < this.opts.minimumThroughput) return;

    const failures = this.samples.filter((s) => s.failed).length;
    if (failures / this.samples.length >= this.opts.failureRatio) {
      this.open(now);
    }
  }

  private open(now: number): void {
    this.openedAt = now;
    this.samples = [];
    this.transition("open");
  }

  private transition(to: CircuitState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    this.onStateChange?.(this.name, from, to);
  }
}
