// packages/verifier-core/src/types.ts
import type { JWTPayload } from "jose";
import type { IntrospectionResponse } from "@tokenrelay/idp-client";
import type { AccessToken, VerificationSource } from "@tokenrelay/request-context";

/**
 * Claims of a locally verified JWT. `raw` is the token payload as signed.
 */
export interface TokenClaims {
  issuer: string;
  audience: string | string[];
  subject?: string;
  expiresAt?: number;
  scopes: string[];
  keyId: string;
  clientId: string;
  raw: JWTPayload;
}

/**
 * Active introspection answer, normalized.
 */
export interface IntrospectionResult {
  active: true;
  scopes: string[];
  clientId: string;
  expiresAt?: number;
  subject?: string;
  raw: IntrospectionResponse;
}

export type VerifiedToken =
  | { kind: "jwt"; claims: TokenClaims }
  | { kind: "introspection"; result: IntrospectionResult };

export interface VerifySuccess {
  ok: true;
  accessToken: AccessToken;
  verified: VerifiedToken;
}

export type VerifyFailureCode =
  | "expired_token"
  | "invalid_token"
  | "key_not_found"
  | "not_verified";

export interface VerifyFailure {
  ok: false;
  error: VerifyFailureCode;
  detail: string;
}

export type VerifyResult = VerifySuccess | VerifyFailure;

/**
 * Common surface of both verification strategies. `verify` never throws.
 */
export interface TokenVerifier {
  readonly strategy: VerificationSource;
  verify(token: string): Promise<VerifyResult>;
}

export function failure(error: VerifyFailureCode, detail: string): VerifyFailure {
  const result: VerifyFailure = { ok: false, error, detail };
  return Object.freeze(result);
}

/**
 * 403 for scope denials, 401 for everything that means "authenticate again".
 */
export function statusForFailure(code: VerifyFailureCode | "insufficient_scope"): 401 | 403 {
  return code === "insufficient_scope" ? 403 : 401;
}
