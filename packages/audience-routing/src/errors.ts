import { GatewayError } from "@tapline/request-context";

/**
 * The destination exists but has no audience mapping, and the deployment
 * has not opted into pass-through.
 */
export class NoMappingError extends GatewayError {
  readonly destinationId: string;

  constructor(destinationId: string, status: 404 | 501) {
    super("no_audience_mapping", `no audience mapping for destination ${destinationId}`, status);
    this.destinationId = destinationId;
  }
}

/**
 * Invalid route or audience configuration. Fatal at startup.
 */
export class RouteConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "RouteConfigError";
    this.issues = issues;
  }
}
