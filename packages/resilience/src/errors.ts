import { GatewayError } from "@tapline/request-context";

/**
 * The breaker is open; the dependency was not called.
 */
export class CircuitOpenError extends GatewayError {
  readonly circuit: string;
  readonly retryAfterMs: number;

  constructor(circuit: string, retryAfterMs: number) {
    super("service_unavailable", `circuit ${circuit} is open`, 503);
    this.circuit = circuit;
    this.retryAfterMs = Math.max(0, retryAfterMs);
  }
}

export class TimeoutError extends GatewayError {
  readonly policy: string;
  readonly timeoutMs: number;

  constructor(policy: string, timeoutMs: number) {
    super("gateway_timeout", `${policy} timed out after ${timeoutMs}ms`, 504);
    this.policy = policy;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The caller went away. Nobody reads the response, so the status only
 * shows up in logs.
 */
export class CancelledError extends GatewayError {
  constructor(what: string) {
    super("request_cancelled", `${what} cancelled by caller`, 499);
  }
}
