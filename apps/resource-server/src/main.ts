// apps/resource-server/src/main.ts
import { configFromEnv, requireClientCredentials } from "@tokenrelay/config";
import { createIdpFetch } from "@tokenrelay/idp-client";
import { createLogger } from "@tokenrelay/logging";
import { createTokenExchangeClient } from "@tokenrelay/token-exchange";
import { createTokenVerifier } from "@tokenrelay/verifier-core";
import { buildApp } from "./app";

const config = configFromEnv();
const logger = createLogger({
  serviceName: "resource-server",
  environment: config.logging.environment,
  level: config.logging.level,
});

const fetch = createIdpFetch(config.tls, logger);
const rs = config.resourceServer;

const verifier = createTokenVerifier({
  strategy: rs.verification,
  idp: config.idp,
  audience: rs.audience,
  clockToleranceSec: rs.clockToleranceSec,
  fetch,
  logger,
});

const exchangeClient = config.downstream
  ? createTokenExchangeClient({
      tokenEndpoint: config.idp.tokenEndpoint,
      ...requireClientCredentials(config.idp),
      audience: config.downstream.audience,
      scope: config.downstream.scope,
      fetch,
      logger,
    })
  : undefined;

const app = buildApp({ config, verifier, exchangeClient, logger, fetch });

app.listen(rs.port, rs.host, () => {
  logger.info("boot.listening", {
    url: rs.serverUrl,
    issuer: config.idp.issuer,
    requiredScopes: rs.requiredScopes,
  });
});
