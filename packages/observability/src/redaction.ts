// packages/observability/src/redaction.ts

const SENSITIVE_SUBSTRINGS = [
  "token",
  "secret",
  "authorization",
  "cookie",
  "password",
] as const;

const REDACTED = "[REDACTED]";
const MAX_DEPTH = 8;

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function isSensitiveKey(key: string): boolean {
  const normalized = normalizeKey(key);
  return SENSITIVE_SUBSTRINGS.some((s) => normalized.includes(s));
}

function redactValue(value: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (depth > MAX_DEPTH) return "[TRUNCATED]";
  if (value === null || typeof value !== "object") return value;

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) return value.toISOString();

  if (seen.has(value)) return "[CIRCULAR]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((v) => redactValue(v, depth + 1, seen));
  }

  return redactRecord(value, depth, seen);
}

function redactRecord(value: object, depth: number, seen: WeakSet<object>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[key] = isSensitiveKey(key) ? REDACTED : redactValue(v, depth + 1, seen);
  }
  return out;
}

/**
 * Deep copy of `fields` with token, secret and credential values replaced.
 * Keys are matched on substrings, so `subject_token`, `client_secret` and
 * `rawToken` are all caught.
 */
export function redactForLog(fields: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();
  seen.add(fields);
  return redactRecord(fields, 0, seen);
}
