import { GatewayError } from "@tapline/request-context";

import { CancelledError } from "./errors";

/**
 * Timeouts abort with a TimeoutError; a bare abort() from the caller
 * becomes a CancelledError.
 */
export function abortReason(signal: AbortSignal, what = "operation"): GatewayError {
  const reason: unknown = signal.reason;
  return reason instanceof GatewayError ? reason : new CancelledError(what);
}

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as it
 * aborts. The losing promise keeps its handlers, so a late rejection is
 * never unhandled.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Child controller that aborts when `parent` does. Call `unlink` when done
 * so the parent does not keep a listener per child.
 */
export function linkedController(parent?: AbortSignal): {
  controller: AbortController;
  unlink: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, unlink: () => undefined };
  }

  const onAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    onAbort();
    return { controller, unlink: () => undefined };
  }

  parent.addEventListener("abort", onAbort, { once: true });
  return { controller, unlink: () => parent.removeEventListener("abort", onAbort) };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 && !signal?.aborted) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new CancelledError("sleep"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}
