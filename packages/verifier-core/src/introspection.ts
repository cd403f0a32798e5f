// packages/verifier-core/src/introspection.ts
import { deepFreeze } from "@tokenrelay/config";
import {
  introspectToken,
  type FetchLike,
  type IntrospectionCallResult,
} from "@tokenrelay/idp-client";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import type { AccessToken } from "@tokenrelay/request-context";
import { normalizeScopes } from "@tokenrelay/scopes-core";
import {
  failure,
  type IntrospectionResult,
  type TokenVerifier,
  type VerifyResult,
  type VerifySuccess,
} from "./types";

export interface IntrospectionVerifierConfig {
  introspectionEndpoint: string;
  clientId?: string;
  clientSecret?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
}

const NOT_VERIFIED_DETAIL = "token could not be verified";

/**
 * Verifies tokens through RFC 7662 introspection. Fails closed: inactive
 * tokens, HTTP errors and transport errors all come back as `not_verified`
 * with the same detail.
 */
export function createIntrospectionTokenVerifier(
  config: IntrospectionVerifierConfig
): TokenVerifier {
  const log = config.logger ?? silentLogger;

  async function verify(token: string): Promise<VerifyResult> {
    const { clientId, clientSecret } = config;
    if (!clientId || !clientSecret) {
      log.warn("introspection.no_credentials");
      return failure("not_verified", NOT_VERIFIED_DETAIL);
    }

    let call: IntrospectionCallResult;
    try {
      call = await introspectToken({
        introspectionEndpoint: config.introspectionEndpoint,
        clientId,
        clientSecret,
        token,
        fetch: config.fetch,
        timeoutMs: config.timeoutMs,
      });
    } catch (err) {
      log.warn("introspection.transport_error", { err });
      return failure("not_verified", NOT_VERIFIED_DETAIL);
    }

    if (!call.ok) {
      log.warn("introspection.rejected", { status: call.status, reason: call.reason });
      return failure("not_verified", NOT_VERIFIED_DETAIL);
    }

    const body = call.body;
    if (body.active !== true) {
      log.debug("introspection.inactive");
      return failure("not_verified", NOT_VERIFIED_DETAIL);
    }

    const result: IntrospectionResult = {
      active: true,
      scopes: [...normalizeScopes(body.scope ?? body.scp)],
      clientId: body.client_id ?? "unknown",
      expiresAt: body.exp,
      subject: body.username ?? body.sub,
      raw: body,
    };

    const accessToken: AccessToken = {
      token,
      clientId: result.clientId,
      scopes: result.scopes,
      expiresAt: result.expiresAt,
      subject: result.subject,
      source: "introspection",
    };

    log.debug("token.verified", {
      strategy: "introspection",
      sub: result.subject,
      clientId: result.clientId,
      scopeCount: result.scopes.length,
    });

    const success: VerifySuccess = {
      ok: true,
      accessToken,
      verified: { kind: "introspection", result },
    };
    return deepFreeze(success);
  }

  return { strategy: "introspection", verify };
}
