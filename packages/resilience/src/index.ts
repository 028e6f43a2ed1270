// packages/resilience/src/index.ts
export { CancelledError, CircuitOpenError, TimeoutError } from "./errors";
export {
  CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER,
  type CircuitBreakerOptions,
  type CircuitState,
  type OutcomeClassifier,
  type StateChangeListener,
} from "./circuitBreaker";
export { computeBackoff, DEFAULT_RETRY, type RetryOptions } from "./retry";
export {
  createResiliencePolicy,
  type ExecuteOptions,
  type ResiliencePolicy,
  type ResiliencePolicyOptions,
  type RetryEvent,
} from "./policy";
export { abortReason, linkedController, raceWithSignal, sleep } from "./signals";
