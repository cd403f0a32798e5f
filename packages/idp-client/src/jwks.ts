// packages/idp-client/src/jwks.ts
import { importJWK, type JWK, type KeyLike } from "jose";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import { JwksFetchError, KeyNotFoundError } from "./errors";
import { requestWithTimeout, type FetchLike, type HttpResult } from "./http";
import { jwkSchema, jwksSchema } from "./schemas";

export type SigningKey = KeyLike | Uint8Array;

export interface SigningKeyCacheOptions {
  /** e.g. "https://idp.example.com/oauth2/default/v1/keys" */
  jwksUri: string;
  fetch?: FetchLike;
  logger?: Logger;
  timeoutMs?: number;
  /** Used when a JWK carries no "alg". Defaults to RS256. */
  defaultAlgorithm?: string;
}

export interface SigningKeyCache {
  /**
   * Key for `kid`. A miss re-fetches the key set once; still missing throws
   * KeyNotFoundError.
   */
  getKey(kid: string): Promise<SigningKey>;
  /** Re-fetch the key set now. Concurrent callers share one request. */
  refresh(): Promise<void>;
  knownKeyIds(): string[];
}

/**
 * Process-wide JWKS cache with a fetch-on-miss policy and no TTL.
 *
 * The key map is replaced wholesale after each fetch (copy-on-write), and
 * at most one fetch is in flight at a time.
 */
export function createSigningKeyCache(options: SigningKeyCacheOptions): SigningKeyCache {
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const log = options.logger ?? silentLogger;
  const defaultAlg = options.defaultAlgorithm ?? "RS256";

  let keys: ReadonlyMap<string, SigningKey> = new Map();
  let inFlight: Promise<void> | null = null;

  async function importKeySet(raw: unknown[]): Promise<Map<string, SigningKey>> {
    const next = new Map<string, SigningKey>();

    for (const entry of raw) {
      const parsed = jwkSchema.safeParse(entry);
      if (!parsed.success || !parsed.data.kid) continue;
      if (parsed.data.use && parsed.data.use !== "sig") continue;

      const { kty, kid, alg, n, e, crv, x, y } = parsed.data;
      const jwk: JWK = { kty, kid, alg, n, e, crv, x, y };
      try {
        next.set(kid, await importJWK(jwk, alg ?? defaultAlg));
      } catch (err) {
        log.debug("jwks.key_skipped", { kid, kty, err });
      }
    }

    return next;
  }

  async function fetchKeys(): Promise<void> {
    let res: HttpResult;
    try {
      res = await requestWithTimeout(
        fetchImpl,
        options.jwksUri,
        { method: "GET", headers: { accept: "application/json" } },
        options.timeoutMs
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new JwksFetchError(`JWKS request failed: ${message}`);
    }

    if (!res.ok) {
      throw new JwksFetchError(`JWKS endpoint answered ${res.status}`, res.status);
    }

    const parsed = jwksSchema.safeParse(res.body.json);
    if (!parsed.success) {
      throw new JwksFetchError("JWKS response is not a key set", res.status);
    }

    keys = await importKeySet(parsed.data.keys);
    log.debug("jwks.refreshed", { keyCount: keys.size, kids: [...keys.keys()] });
  }

  function refresh(): Promise<void> {
    if (!inFlight) {
      inFlight = fetchKeys().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    async getKey(kid: string): Promise<SigningKey> {
      const cached = keys.get(kid);
      if (cached) return cached;

      await refresh();

      const fetched = keys.get(kid);
      if (!fetched) {
        log.warn("jwks.kid_not_found", { kid, known: [...keys.keys()] });
        throw new KeyNotFoundError(kid);
      }
      return fetched;
    },

    refresh,

    knownKeyIds: () => [...keys.keys()],
  };
}
