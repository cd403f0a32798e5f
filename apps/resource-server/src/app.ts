// apps/resource-server/src/app.ts
import express, { type ErrorRequestHandler, type Express } from "express";
import bodyParser from "body-parser";
import type { AppConfig } from "@tokenrelay/config";
import type { FetchLike } from "@tokenrelay/idp-client";
import { requestLoggingMiddleware, type Logger } from "@tokenrelay/logging";
import type { TokenExchangeClient } from "@tokenrelay/token-exchange";
import {
  protectedResourceRouter,
  requestContextMiddleware,
  requireBearer,
  requireScopes,
  type DenialBody,
} from "@tokenrelay/verifier";
import type { TokenVerifier } from "@tokenrelay/verifier-core";
import { JSON_RPC_ERRORS, jsonRpcError, requestIdOf } from "./jsonRpc";
import { mcpHandler } from "./mcp";
import { mcpRateLimiter } from "./rateLimit";
import { buildToolCatalog } from "./tools";

export { mcpHandler, PROTOCOL_VERSION } from "./mcp";
export * from "./jsonRpc";
export * from "./tools";

export interface ResourceServerDeps {
  config: Pick<AppConfig, "idp" | "resourceServer" | "downstream" | "rateLimit">;
  verifier: TokenVerifier;
  /** Required for call_third_party_api; the tool is hidden without it. */
  exchangeClient?: TokenExchangeClient;
  logger: Logger;
  /** Used for downstream API calls. */
  fetch?: FetchLike;
  now?: () => Date;
}

const WELL_KNOWN = "/.well-known/oauth-protected-resource";

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

export function buildApp(deps: ResourceServerDeps): Express {
  const { config, logger } = deps;
  const rs = config.resourceServer;
  const resourceMetadataUrl = `${rs.serverUrl}${WELL_KNOWN}`;

  const jsonRpcDenial: DenialBody = (req, denial) =>
    jsonRpcError(
      requestIdOf(req.body),
      JSON_RPC_ERRORS.UNAUTHORIZED,
      denial.error === "insufficient_scope" ? "Forbidden" : "Unauthorized",
      denial
    );
  const authOptions = { resourceMetadataUrl, logger, errorBody: jsonRpcDenial };

  const thirdPartyApi =
    config.downstream && deps.exchangeClient
      ? { downstream: config.downstream, exchangeClient: deps.exchangeClient, fetch: deps.fetch }
      : undefined;
  if (config.downstream && !deps.exchangeClient) {
    logger.warn("boot.exchange_client_missing", { hint: "call_third_party_api is disabled" });
  }
  const tools = buildToolCatalog({ thirdPartyApi, now: deps.now });

  const app = express();
  app.disable("x-powered-by");
  app.use(bodyParser.json({ limit: "2mb" }));
  app.use(requestContextMiddleware());
  app.use(requestLoggingMiddleware(logger));

  app.get("/", (_req, res) => res.status(200).json({ ok: true }));

  app.use(
    protectedResourceRouter({
      resource: rs.serverUrl,
      issuer: config.idp.issuer,
      scopes: rs.requiredScopes,
    })
  );

  app.post(
    "/mcp",
    mcpRateLimiter(config.rateLimit),
    requireBearer({ verifier: deps.verifier, ...authOptions }),
    requireScopes(rs.requiredScopes, authOptions),
    mcpHandler({ tools, logger })
  );

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (isBodyParseError(err)) {
      res.status(400).json(jsonRpcError(null, JSON_RPC_ERRORS.PARSE_ERROR, "Parse error"));
      return;
    }
    logger.error("http.unhandled_error", { path: req.path, err });
    res.status(500).json(jsonRpcError(null, JSON_RPC_ERRORS.INTERNAL_ERROR, "Internal error"));
  };
  app.use(onError);

  logger.info("boot.resource_server", {
    verification: deps.verifier.strategy,
    requiredScopes: rs.requiredScopes,
    tools: tools.map((t) => t.name),
  });

  return app;
}
