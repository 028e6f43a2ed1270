import { GatewayError } from "@tapline/request-context";

export type ExchangeFailureKind =
  | "NetworkFailure"
  | "IdentityProviderRejected"
  | "MalformedResponse";

const RESPONSES: Record<ExchangeFailureKind, { code: string; status: number }> = {
  NetworkFailure: { code: "service_unavailable", status: 503 },
  IdentityProviderRejected: { code: "unauthorized", status: 401 },
  MalformedResponse: { code: "bad_gateway", status: 502 },
};

export class ExchangeError extends GatewayError {
  readonly kind: ExchangeFailureKind;
  /** HTTP status returned by the token endpoint, when there was one. */
  readonly upstreamStatus?: number;

  constructor(
    kind: ExchangeFailureKind,
    message: string,
    options: { upstreamStatus?: number; cause?: unknown } = {}
  ) {
    const { code, status } = RESPONSES[kind];
    super(code, message, status, { cause: options.cause });
    this.kind = kind;
    this.upstreamStatus = options.upstreamStatus;
  }
}

/** Only transport errors, timeouts and 5xx are worth another attempt. */
export function isRetryableExchangeError(err: unknown): boolean {
  return err instanceof ExchangeError && err.kind === "NetworkFailure";
}
