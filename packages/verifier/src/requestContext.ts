// packages/verifier/src/requestContext.ts
import type { RequestHandler } from "express";
import { getRequestContext, runWithRequestContext } from "@tokenrelay/request-context";
import "./locals";

const REQUEST_ID = /^[\w.:-]{1,128}$/;

/**
 * Binds a fresh RequestContext to every request and echoes its id in
 * `X-Request-Id`. Mount after the body parser.
 */
export function requestContextMiddleware(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get("x-request-id");

    runWithRequestContext(
      {
        request: {
          requestId: incoming && REQUEST_ID.test(incoming) ? incoming : undefined,
          method: req.method,
          path: req.path,
          ip: req.ip,
          userAgent: req.get("user-agent") ?? undefined,
        },
      },
      () => {
        const requestId = getRequestContext()?.request.requestId;
        if (requestId) {
          res.locals.requestId = requestId;
          res.setHeader("X-Request-Id", requestId);
        }
        next();
      }
    );
  };
}
