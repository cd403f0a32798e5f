// apps/token-validator/src/app.ts
import express, { type ErrorRequestHandler, type Express } from "express";
import { describeToken, requestLoggingMiddleware, type Logger } from "@tokenrelay/logging";
import { buildWwwAuthenticate, extractBearer, requestContextMiddleware } from "@tokenrelay/verifier";
import { statusForFailure, type TokenVerifier, type VerifiedToken } from "@tokenrelay/verifier-core";

export interface ValidatorDeps {
  verifier: TokenVerifier;
  logger: Logger;
}

function summarize(verified: VerifiedToken): Record<string, unknown> {
  if (verified.kind === "jwt") {
    const c = verified.claims;
    return { issuer: c.issuer, subject: c.subject, clientId: c.clientId, scopes: c.scopes, expiresAt: c.expiresAt, keyId: c.keyId };
  }
  const r = verified.result;
  return { subject: r.subject, clientId: r.clientId, scopes: r.scopes, expiresAt: r.expiresAt };
}

/**
 * `GET /` verifies the bearer token and echoes its claims.
 */
export function buildValidatorApp(deps: ValidatorDeps): Express {
  const { verifier, logger } = deps;

  const app = express();
  app.disable("x-powered-by");
  app.use(requestContextMiddleware());
  app.use(requestLoggingMiddleware(logger));

  app.get("/", async (req, res, next) => {
    const token = extractBearer(req.headers.authorization);
    if (!token) {
      res.setHeader("WWW-Authenticate", buildWwwAuthenticate({}));
      res.status(401).json({ error: "invalid_token", detail: "missing bearer token" });
      return;
    }

    try {
      const result = await verifier.verify(token);
      if (!result.ok) {
        logger.info("validator.rejected", {
          error: result.error,
          detail: result.detail,
          tokenShape: describeToken(token),
        });
        res.setHeader(
          "WWW-Authenticate",
          buildWwwAuthenticate({ error: "invalid_token", description: result.detail })
        );
        res.status(statusForFailure(result.error)).json({ error: result.error, detail: result.detail });
        return;
      }

      logger.info("validator.accepted", summarize(result.verified));
      res.status(200).json(result.verified.kind === "jwt" ? result.verified.claims.raw : result.verified.result.raw);
    } catch (err) {
      next(err);
    }
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    logger.error("http.unhandled_error", { path: req.path, err });
    res.status(500).json({ error: "internal_error", detail: "unexpected failure" });
  };
  app.use(onError);

  return app;
}
