// apps/mcp-client/src/main.ts
import { configFromEnv } from "@tokenrelay/config";
import { createIdpFetch } from "@tokenrelay/idp-client";
import { createLogger } from "@tokenrelay/logging";
import { runClient } from "./run";

const config = configFromEnv();
const logger = createLogger({
  serviceName: "mcp-client",
  environment: config.logging.environment,
  level: config.logging.level,
});

try {
  const summary = await runClient(config, { fetch: createIdpFetch(config.tls, logger), logger });
  logger.info("client.done", {
    tools: summary.tools.length,
    calls: summary.calls.map((c) => ({ tool: c.name, isError: c.result.isError ?? false })),
  });
} catch (err) {
  logger.error("client.failed", { err });
  process.exitCode = 1;
}
