// packages/request-context/src/errors.ts

/**
 * Base class for every failure the gateway turns into an HTTP response.
 *
 * `code` is the only thing a caller sees (as `{ "error": code }`); the
 * message and any cause stay in the logs.
 */
export class GatewayError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * Normalize anything thrown by a stage into a GatewayError.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GatewayError("internal_error", message, 500, { cause: err });
}
