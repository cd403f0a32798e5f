// packages/scopes-core/src/scopes.ts
import type { AccessToken } from "@tokenrelay/request-context";

export type ScopeInput = string | readonly string[] | undefined;

export interface ScopeClaims {
  scope?: string | string[];
  scopes?: string[]; // some IdPs put scopes here instead
  scp?: string[]; // Okta access tokens
}

/**
 * Space-delimited string or list → set. Blank entries are dropped.
 */
export function normalizeScopes(input: ScopeInput): Set<string> {
  if (input === undefined) return new Set();
  const parts = typeof input === "string" ? input.split(/\s+/) : input;
  return new Set(parts.map((s) => s.trim()).filter(Boolean));
}

/**
 * Normalize scopes from various JWT claim shapes into a single space-delimited string.
 */
export function getScopeStringFromClaims(claims: ScopeClaims): string {
  if (typeof claims.scope === "string") {
    return claims.scope;
  }
  if (Array.isArray(claims.scope)) {
    return claims.scope.join(" ");
  }
  if (Array.isArray(claims.scp)) {
    return claims.scp.join(" ");
  }
  if (Array.isArray(claims.scopes)) {
    return claims.scopes.join(" ");
  }
  return "";
}

export function hasRequiredScope(granted: ScopeInput | ReadonlySet<string>, required: string): boolean {
  const set = isSet(granted) ? granted : normalizeScopes(granted);
  return set.has(required);
}

/**
 * Every required scope must be granted. An empty requirement allows.
 */
export function hasRequiredScopes(
  granted: ScopeInput | ReadonlySet<string>,
  required: readonly string[]
): boolean {
  return missingScopes(granted, required).length === 0;
}

export function missingScopes(
  granted: ScopeInput | ReadonlySet<string>,
  required: readonly string[]
): string[] {
  const set = isSet(granted) ? granted : normalizeScopes(granted);
  return [...normalizeScopes(required)].filter((s) => !set.has(s));
}

export type ScopeDecision =
  | { ok: true }
  | { ok: false; error: "insufficient_scope"; missing: string[] };

export function enforceScopes(
  accessToken: Pick<AccessToken, "scopes">,
  required: readonly string[]
): ScopeDecision {
  const missing = missingScopes(accessToken.scopes, required);
  if (missing.length === 0) return { ok: true };
  return { ok: false, error: "insufficient_scope", missing };
}

function isSet(value: ScopeInput | ReadonlySet<string>): value is ReadonlySet<string> {
  return value instanceof Set;
}
