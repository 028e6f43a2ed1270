import type { DestinationRoute } from "./config";

export interface RouteMatch {
  route: DestinationRoute;
  /** Path to request upstream (prefix removed when the route strips it). */
  upstreamPath: string;
}

export interface RouteTable {
  readonly routes: readonly DestinationRoute[];
  match(path: string): RouteMatch | undefined;
}

function matchesPrefix(path: string, prefix: string): boolean {
  if (prefix === "/") return true;
  return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * Longest-prefix route lookup.
 */
export function createRouteTable(routes: readonly DestinationRoute[]): RouteTable {
  const ordered = [...routes].sort((a, b) => b.prefix.length - a.prefix.length);

  return {
    routes: ordered,
    match(path) {
      const route = ordered.find((r) => matchesPrefix(path, r.prefix));
      if (!route) return undefined;

      let upstreamPath = path;
      if (route.stripPrefix && route.prefix !== "/") {
        upstreamPath = path.slice(route.prefix.length) || "/";
      }
      return { route, upstreamPath };
    },
  };
}
