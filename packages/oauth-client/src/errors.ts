// packages/oauth-client/src/errors.ts
import { OAuthError, UpstreamHttpError } from "@tokenrelay/idp-client";

export class CallbackTimeoutError extends OAuthError {
  constructor(message: string) {
    super("callback_timeout", message, 504);
  }
}

/**
 * The listener was closed while a caller was still waiting for the redirect.
 */
export class CallbackCancelledError extends OAuthError {
  constructor(message: string) {
    super("callback_cancelled", message, 500);
  }
}

/**
 * The callback's `state` differs from the one sent with the authorization request.
 */
export class CsrfMismatchError extends OAuthError {
  constructor() {
    super("csrf_mismatch", "Invalid state parameter - possible CSRF attack", 400);
  }
}

export class CodeExchangeError extends UpstreamHttpError {
  constructor(upstreamStatus: number, body: string, message = "Code exchange failed") {
    super("code_exchange_failed", message, upstreamStatus, body);
  }
}

export class InvalidSessionTransitionError extends OAuthError {
  constructor(from: string, to: string) {
    super("invalid_session_transition", `Cannot move OAuth session from ${from} to ${to}`, 500);
  }
}
