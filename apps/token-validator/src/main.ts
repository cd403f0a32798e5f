// apps/token-validator/src/main.ts
import { configFromEnv } from "@tokenrelay/config";
import { createIdpFetch, createSigningKeyCache } from "@tokenrelay/idp-client";
import { createLogger } from "@tokenrelay/logging";
import { createLocalTokenVerifier } from "@tokenrelay/verifier-core";
import { buildValidatorApp } from "./app";

const config = configFromEnv();
const logger = createLogger({
  serviceName: "token-validator",
  environment: config.logging.environment,
  level: config.logging.level,
});

const keys = createSigningKeyCache({
  jwksUri: config.idp.jwksUri,
  fetch: createIdpFetch(config.tls, logger),
  logger,
});

const verifier = createLocalTokenVerifier({
  issuer: config.idp.issuer,
  audience: config.validator.audience,
  clockToleranceSec: config.validator.clockToleranceSec,
  keys,
  logger,
});

const { host, port } = config.validator;
buildValidatorApp({ verifier, logger }).listen(port, host, () => {
  logger.info("boot.listening", { host, port, issuer: config.idp.issuer, audience: config.validator.audience });
});
