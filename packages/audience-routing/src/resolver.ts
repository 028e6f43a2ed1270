import { NoMappingError } from "./errors";
import type { RouteAudienceMap, UnmappedRoutePolicy } from "./config";

export type AudienceResolution =
  | { kind: "exchange"; audience: string }
  | { kind: "passthrough" };

export interface AudienceResolver {
  resolve(destinationId: string): AudienceResolution;
}

/**
 * Static destination -> audience lookup. No I/O per request.
 *
 * An unmapped destination fails closed unless the deployment configured
 * pass-through; there is no runtime fallback.
 */
export function createAudienceResolver(
  mappings: RouteAudienceMap,
  policy: UnmappedRoutePolicy
): AudienceResolver {
  const table = new Map(Object.entries(mappings));

  return {
    resolve(destinationId) {
      const audience = table.get(destinationId);
      if (audience) {
        return { kind: "exchange", audience };
      }
      if (policy.mode === "passthrough") {
        return { kind: "passthrough" };
      }
      throw new NoMappingError(destinationId, policy.status);
    },
  };
}
