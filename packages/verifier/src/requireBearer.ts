// packages/verifier/src/requireBearer.ts
import type { Request, RequestHandler, Response } from "express";
import { describeToken, silentLogger, type Logger } from "@tokenrelay/logging";
import { getRequestContext, updateRequestContext } from "@tokenrelay/request-context";
import { enforceScopes } from "@tokenrelay/scopes-core";
import { statusForFailure, type TokenVerifier, type VerifyFailureCode } from "@tokenrelay/verifier-core";
import { buildWwwAuthenticate, resourceMetadataUrlFor } from "./wwwAuthenticate";
import "./locals";

export type DenyCode = VerifyFailureCode | "insufficient_scope";

export interface Denial {
  error: DenyCode;
  detail: string;
  missing?: string[];
}

/**
 * Shapes the JSON body of a 401/403. Defaults to the denial itself.
 */
export type DenialBody = (req: Request, denial: Denial) => unknown;

export interface AuthMiddlewareOptions {
  /** Absolute URL of this server's protected-resource metadata. Derived from the request when unset. */
  resourceMetadataUrl?: string;
  logger?: Logger;
  errorBody?: DenialBody;
}

export interface RequireBearerOptions extends AuthMiddlewareOptions {
  verifier: TokenVerifier;
}

/**
 * "Bearer <token>" → token. Scheme is case-insensitive; anything else is undefined.
 */
export function extractBearer(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match ? match[1] : undefined;
}

function deny(
  req: Request,
  res: Response,
  denial: Denial,
  opts: AuthMiddlewareOptions,
  challenge: { withError: boolean; scope?: readonly string[] }
): void {
  const status = statusForFailure(denial.error);
  res.setHeader(
    "WWW-Authenticate",
    buildWwwAuthenticate({
      error: challenge.withError
        ? status === 403
          ? "insufficient_scope"
          : "invalid_token"
        : undefined,
      scope: challenge.scope,
      resourceMetadata: opts.resourceMetadataUrl ?? resourceMetadataUrlFor(req),
    })
  );
  res.status(status).json(opts.errorBody ? opts.errorBody(req, denial) : denial);
}

/**
 * Verifies the bearer token and stores the AccessToken in the request
 * context and `res.locals`. Failures answer 401 with a Bearer challenge.
 */
export function requireBearer(opts: RequireBearerOptions): RequestHandler {
  const log = opts.logger ?? silentLogger;

  return async (req, res, next) => {
    const token = extractBearer(req.headers.authorization);
    if (!token) {
      log.info("auth.missing_bearer", { path: req.path });
      deny(req, res, { error: "invalid_token", detail: "missing bearer token" }, opts, {
        withError: false,
      });
      return;
    }

    try {
      const result = await opts.verifier.verify(token);

      if (!result.ok) {
        log.info("auth.rejected", {
          strategy: opts.verifier.strategy,
          error: result.error,
          detail: result.detail,
          tokenShape: describeToken(token),
        });
        deny(req, res, { error: result.error, detail: result.detail }, opts, { withError: true });
        return;
      }

      const { accessToken } = result;
      updateRequestContext({ accessToken });
      res.locals.accessToken = accessToken;
      res.locals.subject = accessToken.subject;
      next();
    } catch (err) {
      next(err);
    }
  };
}

/**
 * Requires every scope in `required` on the verified token. Mount after
 * requireBearer. Denials answer 403 with `error="insufficient_scope"`.
 */
export function requireScopes(
  required: readonly string[],
  opts: AuthMiddlewareOptions = {}
): RequestHandler {
  const log = opts.logger ?? silentLogger;

  return (req, res, next) => {
    const accessToken = res.locals.accessToken ?? getRequestContext()?.accessToken;
    if (!accessToken) {
      deny(req, res, { error: "invalid_token", detail: "no verified bearer token" }, opts, {
        withError: false,
      });
      return;
    }

    const decision = enforceScopes(accessToken, required);
    updateRequestContext({
      authz: {
        decision: decision.ok ? "allow" : "deny",
        reason: decision.ok ? undefined : decision.error,
        requiredScopes: [...required],
        grantedScopes: accessToken.scopes,
      },
    });

    if (!decision.ok) {
      log.info("authz.insufficient_scope", {
        subject: accessToken.subject,
        missing: decision.missing,
      });
      deny(
        req,
        res,
        {
          error: "insufficient_scope",
          detail: `missing scopes: ${decision.missing.join(" ")}`,
          missing: decision.missing,
        },
        opts,
        { withError: true, scope: required }
      );
      return;
    }

    next();
  };
}
