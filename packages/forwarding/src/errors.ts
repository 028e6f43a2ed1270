import { GatewayError } from "@tapline/request-context";

export type DestinationFailure = "network" | "timeout";

export class DestinationError extends GatewayError {
  readonly destinationId: string;
  readonly failure: DestinationFailure;

  constructor(destinationId: string, failure: DestinationFailure, options?: { cause?: unknown }) {
    super(
      failure === "timeout" ? "gateway_timeout" : "bad_gateway",
      `destination ${destinationId} ${failure === "timeout" ? "timed out" : "unreachable"}`,
      failure === "timeout" ? 504 : 502,
      options
    );
    this.destinationId = destinationId;
    this.failure = failure;
  }
}

export class InvalidUpstreamPathError extends GatewayError {
  constructor(path: string) {
    super("invalid_upstream_path", `refusing to forward path ${JSON.stringify(path)}`, 400);
  }
}
