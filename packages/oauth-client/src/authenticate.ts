// packages/oauth-client/src/authenticate.ts
import open from "open";
import { ConfigError, type ClientConfig, type IdpConfig } from "@tokenrelay/config";
import type { FetchLike } from "@tokenrelay/idp-client";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import { buildAuthorizationUrl } from "./authorizationUrl";
import { startCallbackListener } from "./callbackListener";
import { generateCodeChallenge, generateCodeVerifier, generateState } from "./pkce";
import { OAuthSession } from "./session";
import { InMemoryTokenStorage, type OAuthTokens, type TokenStorage } from "./storage";
import { exchangeCodeForTokens } from "./tokens";

export interface AuthenticateConfig {
  idp: Pick<IdpConfig, "authorizationEndpoint" | "tokenEndpoint" | "clientId" | "clientSecret">;
  client: ClientConfig;
}

export interface AuthenticateDeps {
  fetch?: FetchLike;
  logger?: Logger;
  storage?: TokenStorage;
  /** Defaults to the `open` package. */
  openBrowser?: (url: string) => Promise<unknown>;
  generateVerifier?: () => string;
  generateState?: () => string;
  /** Observe the session, e.g. to inspect its final status. */
  onSession?: (session: OAuthSession) => void;
}

/**
 * Authorization-code + PKCE login through the system browser and a loopback
 * redirect. The listener is closed whether the flow succeeds or fails.
 */
export async function authenticate(
  config: AuthenticateConfig,
  deps: AuthenticateDeps = {}
): Promise<OAuthTokens> {
  const { idp, client } = config;
  if (!idp.clientId) throw new ConfigError(["OAUTH_CLIENT_ID is required"]);

  const log = deps.logger ?? silentLogger;
  const storage = deps.storage ?? new InMemoryTokenStorage();
  const openBrowser = deps.openBrowser ?? ((url: string) => open(url));

  const session = new OAuthSession();
  deps.onSession?.(session);

  const codeVerifier = (deps.generateVerifier ?? generateCodeVerifier)();
  const state = (deps.generateState ?? generateState)();
  const codeChallenge = generateCodeChallenge(codeVerifier);

  const listener = await startCallbackListener({
    host: client.callbackHost,
    port: client.callbackPort,
    path: client.callbackPath,
    logger: log,
  });
  const redirectUri = client.callbackPort === 0 ? listener.redirectUri : client.redirectUri;

  try {
    session.begin({ codeVerifier, codeChallenge, state });
    await storage.setClientInfo({ clientId: idp.clientId, redirectUris: [redirectUri] });

    const authorizationUrl = buildAuthorizationUrl({
      authorizationEndpoint: idp.authorizationEndpoint,
      clientId: idp.clientId,
      scope: client.scope,
      redirectUri,
      state,
      codeChallenge,
    });

    log.info("oauth.authorize", { url: authorizationUrl });
    try {
      await openBrowser(authorizationUrl);
    } catch (err) {
      log.warn("oauth.browser_open_failed", { url: authorizationUrl, err });
    }

    const callback = await listener.waitForCallback(client.timeoutMs);
    session.receiveCallback(callback);

    const { code, codeVerifier: verifier } = session.startExchange();
    const tokens = await exchangeCodeForTokens({
      tokenEndpoint: idp.tokenEndpoint,
      clientId: idp.clientId,
      clientSecret: idp.clientSecret,
      code,
      codeVerifier: verifier,
      redirectUri,
      fetch: deps.fetch,
    });

    session.complete(tokens);
    await storage.setTokens(tokens);
    log.info("oauth.authenticated", {
      tokenType: tokens.tokenType,
      expiresIn: tokens.expiresIn,
      scope: tokens.scope,
      hasRefreshToken: tokens.refreshToken !== undefined,
    });
    return tokens;
  } catch (err) {
    if (!session.isTerminal) session.fail(err);
    log.error("oauth.failed", { err });
    throw err;
  } finally {
    await listener.close();
  }
}
