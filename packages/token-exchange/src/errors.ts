// packages/token-exchange/src/errors.ts
import { OAuthError, UpstreamHttpError } from "@tokenrelay/idp-client";

/**
 * The token endpoint asked for a DPoP nonce but sent no `DPoP-Nonce` header.
 */
export class MissingNonceError extends OAuthError {
  constructor() {
    super("missing_nonce", "Token endpoint requires a DPoP nonce but supplied none", 502);
  }
}

export class TokenExchangeError extends UpstreamHttpError {
  constructor(upstreamStatus: number, body: string, message = "Token exchange failed") {
    super("token_exchange_failed", message, upstreamStatus, body);
  }
}
