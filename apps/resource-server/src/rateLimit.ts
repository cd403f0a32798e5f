// apps/resource-server/src/rateLimit.ts
import type { Request, RequestHandler } from "express";
import rateLimit from "express-rate-limit";
import type { RateLimitConfig } from "@tokenrelay/config";
import { JSON_RPC_ERRORS, jsonRpcError, requestIdOf } from "./jsonRpc";

function clientKey(req: Request): string {
  const xf = req.get("x-forwarded-for");
  if (xf) return xf.split(",")[0].trim();
  return req.ip ?? "unknown";
}

/**
 * Per-client limiter for the JSON-RPC endpoint, keyed on the first
 * X-Forwarded-For hop or the socket address.
 */
export function mcpRateLimiter(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.limit,
    keyGenerator: clientKey,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    validate: { xForwardedForHeader: false },
    handler: (req, res, _next, options) => {
      res
        .status(options.statusCode)
        .json(jsonRpcError(requestIdOf(req.body), JSON_RPC_ERRORS.RATE_LIMITED, "Too many requests"));
    },
  });
}
