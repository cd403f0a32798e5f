// packages/idp-client/src/introspection.ts
import {
  basicAuthorization,
  requestWithTimeout,
  type FetchLike,
} from "./http";
import { introspectionResponseSchema, type IntrospectionResponse } from "./schemas";

export interface IntrospectionRequest {
  introspectionEndpoint: string;
  clientId: string;
  clientSecret: string;
  token: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export type IntrospectionCallResult =
  | { ok: true; status: number; body: IntrospectionResponse }
  | { ok: false; status: number; reason: string };

/**
 * POST the token to the RFC 7662 introspection endpoint with HTTP Basic
 * client authentication. Transport errors propagate; HTTP and schema
 * failures come back as `{ ok: false }`.
 */
export async function introspectToken(req: IntrospectionRequest): Promise<IntrospectionCallResult> {
  const fetchImpl: FetchLike = req.fetch ?? ((url, init) => fetch(url, init));

  const form = new URLSearchParams({
    token: req.token,
    token_type_hint: "access_token",
  });

  const res = await requestWithTimeout(
    fetchImpl,
    req.introspectionEndpoint,
    {
      method: "POST",
      headers: {
        accept: "application/json",
        "content-type": "application/x-www-form-urlencoded",
        authorization: basicAuthorization(req.clientId, req.clientSecret),
      },
      body: form.toString(),
    },
    req.timeoutMs
  );

  if (res.status !== 200) {
    return { ok: false, status: res.status, reason: `introspection answered ${res.status}` };
  }

  const parsed = introspectionResponseSchema.safeParse(res.body.json);
  if (!parsed.success) {
    return { ok: false, status: res.status, reason: "malformed introspection response" };
  }

  return { ok: true, status: res.status, body: parsed.data };
}
