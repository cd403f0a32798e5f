// demos/mock-idp/src/main.ts
import { configFromEnv } from "@tokenrelay/config";
import { createLogger, requestLoggingMiddleware } from "@tokenrelay/logging";
import { startMockIdp } from "./server";

// Serves the identity provider named by OAUTH_ISSUER, e.g.
// OAUTH_ISSUER=http://localhost:9000/oauth2/default
const config = configFromEnv();
const logger = createLogger({
  serviceName: "mock-idp",
  environment: config.logging.environment,
  level: config.logging.level,
});

const { clientId, clientSecret } = config.idp;
if (!clientId || !clientSecret) {
  logger.error("mock_idp.missing_client", { hint: "set OAUTH_CLIENT_ID and OAUTH_CLIENT_SECRET" });
  process.exit(1);
}

const issuerUrl = new URL(config.idp.issuer);

const running = await startMockIdp({
  host: issuerUrl.hostname,
  port: Number(issuerUrl.port || 80),
  path: issuerUrl.pathname,
  audience: config.resourceServer.audience,
  clientId,
  clientSecret,
  defaultScopes: config.resourceServer.requiredScopes,
  before: [requestLoggingMiddleware(logger)],
  logger,
});

logger.info("mock_idp.listening", { issuer: running.issuer });
