// packages/idp-client/src/errors.ts

/**
 * Machine-readable failure codes shared by every package.
 */
export type OAuthErrorCode =
  | "expired_token"
  | "invalid_token"
  | "key_not_found"
  | "not_verified"
  | "insufficient_scope"
  | "missing_nonce"
  | "code_exchange_failed"
  | "token_exchange_failed"
  | "callback_timeout"
  | "callback_cancelled"
  | "csrf_mismatch"
  | "jwks_fetch_failed"
  | "invalid_session_transition";

/**
 * Base error type. No HTTP semantics beyond a suggested status + code string.
 */
export class OAuthError extends Error {
  readonly code: OAuthErrorCode;
  readonly status: number;

  constructor(code: OAuthErrorCode, message: string, status = 401) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class KeyNotFoundError extends OAuthError {
  readonly kid: string;

  constructor(kid: string) {
    super("key_not_found", `No signing key matches kid "${kid}"`, 401);
    this.kid = kid;
  }
}

export class JwksFetchError extends OAuthError {
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super("jwks_fetch_failed", message, 502);
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * An identity-provider endpoint answered with an unexpected status.
 * Carries the upstream status and body for diagnosis.
 */
export class UpstreamHttpError extends OAuthError {
  readonly upstreamStatus: number;
  readonly body: string;

  constructor(
    code: OAuthErrorCode,
    message: string,
    upstreamStatus: number,
    body: string,
    status = 502
  ) {
    super(code, `${message}: ${upstreamStatus} ${body}`, status);
    this.upstreamStatus = upstreamStatus;
    this.body = body;
  }
}

export function isOAuthError(err: unknown): err is OAuthError {
  return err instanceof OAuthError;
}
