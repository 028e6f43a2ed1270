export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

export const TENANT_HEADER = "X-Tenant-ID";
export const USER_HEADER = "X-User-ID";

export type HeaderBag = Record<string, string | string[] | undefined>;

/**
 * Headers listed in Connection are hop-by-hop for this message too.
 */
export function connectionListed(value: string | string[] | undefined | null): Set<string> {
  const raw = Array.isArray(value) ? value.join(",") : value ?? "";
  return new Set(
    raw
      .split(",")
      .map((h) => h.trim().toLowerCase())
      .filter(Boolean)
  );
}
