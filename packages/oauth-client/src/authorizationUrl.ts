// packages/oauth-client/src/authorizationUrl.ts

export interface AuthorizationUrlParams {
  authorizationEndpoint: string;
  clientId: string;
  scope: string;
  redirectUri: string;
  state: string;
  codeChallenge: string;
}

/**
 * Authorization request URL. Carries the S256 challenge, never the verifier
 * or the client secret.
 */
export function buildAuthorizationUrl(p: AuthorizationUrlParams): string {
  const url = new URL(p.authorizationEndpoint);
  url.searchParams.set("client_id", p.clientId);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("scope", p.scope);
  url.searchParams.set("redirect_uri", p.redirectUri);
  url.searchParams.set("state", p.state);
  url.searchParams.set("code_challenge", p.codeChallenge);
  url.searchParams.set("code_challenge_method", "S256");
  return url.toString();
}
