// packages/logging/src/redact.ts

export const REDACTED = "[redacted]";

/**
 * Keys whose values never reach a log line. Compared case-insensitively,
 * with "-" and "_" ignored, so `Authorization`, `code_verifier` and
 * `codeVerifier` all match.
 */
const SENSITIVE_KEYS = new Set(
  [
    "token",
    "access_token",
    "refresh_token",
    "id_token",
    "subject_token",
    "code",
    "code_verifier",
    "client_secret",
    "authorization",
    "dpop",
    "password",
  ].map(normalizeKey)
);

const MAX_DEPTH = 6;

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(normalizeKey(key));
}

/**
 * Return a copy of `value` with sensitive fields replaced by "[redacted]".
 * Errors are flattened to name/message/code so they serialize.
 */
export function redact(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return "[truncated]";

  if (value instanceof Error) {
    const out: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };
    const code: unknown = Reflect.get(value, "code");
    if (typeof code === "string") out.code = code;
    return out;
  }

  if (Array.isArray(value)) {
    return value.map((v) => redact(v, depth + 1));
  }

  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = isSensitiveKey(key) ? REDACTED : redact(v, depth + 1);
    }
    return out;
  }

  return value;
}

export type TokenShape = "jwt" | "opaque" | "none";

/**
 * Loggable description of a bearer token: its shape and length, nothing else.
 */
export function describeToken(token: string | undefined): {
  shape: TokenShape;
  len: number;
} {
  if (!token) return { shape: "none", len: 0 };
  const shape: TokenShape = token.split(".").length === 3 ? "jwt" : "opaque";
  return { shape, len: token.length };
}
