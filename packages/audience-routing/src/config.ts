import { z } from "zod";

import { RouteConfigError } from "./errors";

export interface DestinationRoute {
  /** Destination identifier; the key of its audience mapping. */
  id: string;
  /** Gateway path prefix, e.g. "/api/competitions". */
  prefix: string;
  /** Upstream base URL, http or https. */
  target: string;
  /** Drop the prefix before forwarding. Default false. */
  stripPrefix: boolean;
}

/**
 * Destination id -> target audience. Read-only after startup.
 */
export type RouteAudienceMap = Readonly<Record<string, string>>;

export type UnmappedRoutePolicy =
  | { mode: "reject"; status: 404 | 501 }
  | { mode: "passthrough" };

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const RouteSchema = z
  .object({
    id: z.string().trim().min(1),
    prefix: z
      .string()
      .trim()
      .regex(/^\/[A-Za-z0-9/_.-]*$/, "prefix must start with / and use [A-Za-z0-9/_.-]"),
    target: z
      .string()
      .url()
      .refine(isHttpUrl, "target must be http or https"),
    stripPrefix: z.boolean().default(false),
  })
  .strict();

const RoutesSchema = z.array(RouteSchema);

const AudiencesSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function parseJson(raw: string, name: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new RouteConfigError(`${name} is not valid JSON`, [
      e instanceof Error ? e.message : String(e),
    ]);
  }
}

export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}

/**
 * Parses a ROUTES_JSON-style string.
 * Example raw: [{"id":"competition","prefix":"/api/competitions","target":"http://competition:8080"}]
 *
 * Unlike most env parsing, bad input is fatal: a gateway with a half-read
 * route table must not start.
 */
export function parseRoutesJson(raw: string | undefined): DestinationRoute[] {
  if (!raw || !raw.trim()) {
    throw new RouteConfigError("ROUTES_JSON is required");
  }

  const result = RoutesSchema.safeParse(parseJson(raw, "ROUTES_JSON"));
  if (!result.success) {
    throw new RouteConfigError("ROUTES_JSON is invalid", formatIssues(result.error));
  }

  const routes = result.data.map((r) => ({ ...r, prefix: normalizePrefix(r.prefix) }));

  const issues: string[] = [];
  const ids = new Set<string>();
  const prefixes = new Set<string>();
  for (const route of routes) {
    if (ids.has(route.id)) issues.push(`duplicate destination id "${route.id}"`);
    if (prefixes.has(route.prefix)) issues.push(`duplicate prefix "${route.prefix}"`);
    ids.add(route.id);
    prefixes.add(route.prefix);
  }
  if (issues.length) {
    throw new RouteConfigError("ROUTES_JSON is invalid", issues);
  }

  return routes;
}

/**
 * Parses a ROUTE_AUDIENCES_JSON-style string.
 * Example raw: {"competition":"competition-service","judging":"judging-service"}
 */
export function parseRouteAudiencesJson(raw: string | undefined): RouteAudienceMap {
  if (!raw || !raw.trim()) return {};

  const result = AudiencesSchema.safeParse(parseJson(raw, "ROUTE_AUDIENCES_JSON"));
  if (!result.success) {
    throw new RouteConfigError("ROUTE_AUDIENCES_JSON is invalid", formatIssues(result.error));
  }
  return Object.freeze({ ...result.data });
}

/**
 * Every mapping must name a configured destination.
 */
export function validateRouteAudiences(
  routes: readonly DestinationRoute[],
  audiences: RouteAudienceMap
): void {
  const ids = new Set(routes.map((r) => r.id));
  const unknown = Object.keys(audiences).filter((id) => !ids.has(id));
  if (unknown.length) {
    throw new RouteConfigError(
      "ROUTE_AUDIENCES_JSON maps unknown destinations",
      unknown.map((id) => `"${id}"`)
    );
  }
}
