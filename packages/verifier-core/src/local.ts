// packages/verifier-core/src/local.ts
import { decodeProtectedHeader, errors, jwtVerify, type JWTPayload } from "jose";
import { deepFreeze, trimTrailingSlashes } from "@tokenrelay/config";
import { isOAuthError, type SigningKey, type SigningKeyCache } from "@tokenrelay/idp-client";
import { describeToken, silentLogger, type Logger } from "@tokenrelay/logging";
import type { AccessToken } from "@tokenrelay/request-context";
import { getScopeStringFromClaims, normalizeScopes } from "@tokenrelay/scopes-core";
import {
  failure,
  type TokenClaims,
  type TokenVerifier,
  type VerifyResult,
  type VerifySuccess,
} from "./types";

export interface LocalVerifierConfig {
  issuer: string;
  audience: string;
  keys: SigningKeyCache;
  /** Seconds of leeway on exp/nbf. Defaults to 0. */
  clockToleranceSec?: number;
  algorithms?: string[];
  logger?: Logger;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function strList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === "string");
}

function clientIdFrom(payload: JWTPayload): string {
  return str(payload.cid) ?? str(payload.client_id) ?? str(payload.azp) ?? "unknown";
}

function scopesFrom(payload: JWTPayload): string[] {
  const scope = payload.scope;
  const scopeString = getScopeStringFromClaims({
    scope: typeof scope === "string" ? scope : strList(scope),
    scp: strList(payload.scp),
    scopes: strList(payload.scopes),
  });
  return [...normalizeScopes(scopeString)];
}

/**
 * Verifies JWT access tokens against the issuer's signing keys.
 *
 * The header is decoded without trust only to find `kid`; signature, issuer,
 * audience and expiry are all checked by jose before anything is returned.
 */
export function createLocalTokenVerifier(config: LocalVerifierConfig): TokenVerifier {
  const issuer = trimTrailingSlashes(config.issuer);
  const log = config.logger ?? silentLogger;
  const algorithms = config.algorithms ?? ["RS256"];
  const clockTolerance = config.clockToleranceSec ?? 0;

  async function verify(token: string): Promise<VerifyResult> {
    let kid: string | undefined;
    try {
      kid = decodeProtectedHeader(token).kid;
    } catch {
      return failure("invalid_token", "malformed token header");
    }
    if (!kid) {
      return failure("invalid_token", 'token header has no "kid"');
    }

    let key: SigningKey;
    try {
      key = await config.keys.getKey(kid);
    } catch (err) {
      if (isOAuthError(err) && (err.code === "key_not_found" || err.code === "jwks_fetch_failed")) {
        log.warn("token.key_unavailable", { kid, code: err.code, detail: err.message });
        return failure("key_not_found", err.message);
      }
      throw err;
    }

    try {
      const { payload } = await jwtVerify(token, key, {
        algorithms,
        issuer,
        audience: config.audience,
        clockTolerance,
      });

      const claims: TokenClaims = {
        issuer: str(payload.iss) ?? issuer,
        audience: payload.aud ?? config.audience,
        subject: str(payload.sub),
        expiresAt: payload.exp,
        scopes: scopesFrom(payload),
        keyId: kid,
        clientId: clientIdFrom(payload),
        raw: payload,
      };

      const accessToken: AccessToken = {
        token,
        clientId: claims.clientId,
        scopes: claims.scopes,
        expiresAt: claims.expiresAt,
        subject: claims.subject,
        source: "jwt",
      };

      log.debug("token.verified", {
        strategy: "jwt",
        kid,
        sub: claims.subject,
        scopeCount: claims.scopes.length,
        shape: describeToken(token),
      });

      const result: VerifySuccess = { ok: true, accessToken, verified: { kind: "jwt", claims } };
      return deepFreeze(result);
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        return failure("expired_token", "Token has expired");
      }
      const detail = err instanceof Error ? err.message : "JWT verification failed";
      log.debug("token.rejected", { strategy: "jwt", kid, detail });
      return failure("invalid_token", detail);
    }
  }

  return { strategy: "jwt", verify };
}
