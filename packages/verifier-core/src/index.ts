// packages/verifier-core/src/index.ts
import type { IdpConfig, VerificationStrategy } from "@tokenrelay/config";
import { createSigningKeyCache, type FetchLike } from "@tokenrelay/idp-client";
import type { Logger } from "@tokenrelay/logging";
import { createIntrospectionTokenVerifier } from "./introspection";
import { createLocalTokenVerifier } from "./local";
import type { TokenVerifier } from "./types";

export * from "./types";
export * from "./local";
export * from "./introspection";

export interface VerifierFromConfigOptions {
  strategy: VerificationStrategy;
  idp: IdpConfig;
  audience: string;
  clockToleranceSec?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Build the verifier for the configured strategy.
 */
export function createTokenVerifier(opts: VerifierFromConfigOptions): TokenVerifier {
  const logger = opts.logger?.child({ component: "verifier", strategy: opts.strategy });

  if (opts.strategy === "jwt") {
    return createLocalTokenVerifier({
      issuer: opts.idp.issuer,
      audience: opts.audience,
      clockToleranceSec: opts.clockToleranceSec,
      keys: createSigningKeyCache({ jwksUri: opts.idp.jwksUri, fetch: opts.fetch, logger }),
      logger,
    });
  }

  return createIntrospectionTokenVerifier({
    introspectionEndpoint: opts.idp.introspectionEndpoint,
    clientId: opts.idp.clientId,
    clientSecret: opts.idp.clientSecret,
    fetch: opts.fetch,
    logger,
  });
}
