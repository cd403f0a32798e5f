// packages/token-exchange/src/index.ts
import { createProof, generateDPoPKeyPair, type DPoPAlgorithm } from "@tokenrelay/dpop";
import {
  postTokenRequest,
  tokenResponseSchema,
  type FetchLike,
  type TokenEndpointResponse,
} from "@tokenrelay/idp-client";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import { MissingNonceError, TokenExchangeError } from "./errors";

export * from "./errors";

export const TOKEN_EXCHANGE_GRANT = "urn:ietf:params:oauth:grant-type:token-exchange";
export const ACCESS_TOKEN_TYPE = "urn:ietf:params:oauth:token-type:access_token";

export interface TokenExchangeConfig {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  /** Audience of the downstream API. */
  audience: string;
  /** Scope requested for the downstream API. */
  scope: string;
  fetch?: FetchLike;
  logger?: Logger;
  dpopAlgorithm?: DPoPAlgorithm;
  timeoutMs?: number;
}

export interface TokenExchangeClient {
  /** Trade the caller's access token for one scoped to the downstream API. */
  exchange(subjectToken: string): Promise<string>;
}

function asksForNonce(res: TokenEndpointResponse): boolean {
  return res.status === 400 && res.error === "use_dpop_nonce";
}

/**
 * RFC 8693 token exchange with DPoP proofs.
 *
 * Each call generates its own DPoP key. When the server answers
 * `use_dpop_nonce`, the request is repeated exactly once with a new proof
 * carrying the nonce; no other failure is retried.
 */
export function createTokenExchangeClient(config: TokenExchangeConfig): TokenExchangeClient {
  const log = config.logger ?? silentLogger;

  return {
    async exchange(subjectToken: string): Promise<string> {
      const key = await generateDPoPKeyPair(config.dpopAlgorithm);

      const form = {
        grant_type: TOKEN_EXCHANGE_GRANT,
        subject_token: subjectToken,
        subject_token_type: ACCESS_TOKEN_TYPE,
        requested_token_type: ACCESS_TOKEN_TYPE,
        scope: config.scope,
        audience: config.audience,
      };

      const attempt = async (nonce?: string): Promise<TokenEndpointResponse> =>
        postTokenRequest({
          tokenEndpoint: config.tokenEndpoint,
          form,
          clientAuth: { method: "basic", clientId: config.clientId, clientSecret: config.clientSecret },
          headers: {
            DPoP: await createProof({ method: "POST", url: config.tokenEndpoint, key, nonce }),
          },
          fetch: config.fetch,
          timeoutMs: config.timeoutMs,
        });

      let res = await attempt();

      if (asksForNonce(res)) {
        const nonce = res.headers.get("DPoP-Nonce")?.trim();
        if (!nonce) {
          log.warn("token_exchange.nonce_missing", { status: res.status });
          throw new MissingNonceError();
        }
        log.debug("token_exchange.nonce_retry");
        res = await attempt(nonce);
      }

      if (!res.ok) {
        log.warn("token_exchange.failed", { status: res.status, error: res.error });
        throw new TokenExchangeError(res.status, res.text);
      }

      const parsed = tokenResponseSchema.safeParse(res.json);
      if (!parsed.success) {
        throw new TokenExchangeError(res.status, res.text, "Token exchange response has no access_token");
      }

      log.info("token_exchange.succeeded", {
        audience: config.audience,
        scope: parsed.data.scope ?? config.scope,
        tokenType: parsed.data.token_type,
        expiresIn: parsed.data.expires_in,
      });
      return parsed.data.access_token;
    },
  };
}
