// packages/oauth-client/src/tokens.ts
import { postTokenRequest, tokenResponseSchema, type FetchLike } from "@tokenrelay/idp-client";
import { CodeExchangeError } from "./errors";
import type { OAuthTokens } from "./storage";

export interface CodeExchangeParams {
  tokenEndpoint: string;
  clientId: string;
  clientSecret?: string;
  code: string;
  codeVerifier: string;
  redirectUri: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * authorization_code grant with PKCE. Client credentials travel in the body.
 */
export async function exchangeCodeForTokens(p: CodeExchangeParams): Promise<OAuthTokens> {
  const res = await postTokenRequest({
    tokenEndpoint: p.tokenEndpoint,
    form: {
      grant_type: "authorization_code",
      code: p.code,
      redirect_uri: p.redirectUri,
      code_verifier: p.codeVerifier,
    },
    clientAuth: { method: "post", clientId: p.clientId, clientSecret: p.clientSecret },
    fetch: p.fetch,
    timeoutMs: p.timeoutMs,
  });

  if (res.status !== 200) {
    throw new CodeExchangeError(res.status, res.text);
  }

  const parsed = tokenResponseSchema.safeParse(res.json);
  if (!parsed.success) {
    throw new CodeExchangeError(res.status, res.text, "Code exchange response has no access_token");
  }

  const t = parsed.data;
  return {
    accessToken: t.access_token,
    tokenType: t.token_type ?? "Bearer",
    expiresIn: t.expires_in,
    refreshToken: t.refresh_token,
    scope: t.scope ?? "",
  };
}
