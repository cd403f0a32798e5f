// packages/idp-client/src/token-endpoint.ts
import {
  basicAuthorization,
  requestWithTimeout,
  type FetchLike,
  type HttpHeadersLike,
} from "./http";
import { oauthErrorResponseSchema } from "./schemas";

/**
 * How the client authenticates at the token endpoint:
 * - "basic": client_secret_basic (Authorization header)
 * - "post": client_secret_post (credentials in the form body)
 */
export type ClientAuthMethod = "basic" | "post";

export interface ClientAuth {
  method: ClientAuthMethod;
  clientId: string;
  clientSecret?: string;
}

export interface TokenRequest {
  tokenEndpoint: string;
  form: Record<string, string>;
  clientAuth?: ClientAuth;
  /** Extra headers, e.g. { DPoP: proof }. */
  headers?: Record<string, string>;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface TokenEndpointResponse {
  status: number;
  ok: boolean;
  headers: HttpHeadersLike;
  /** Parsed JSON, or undefined when the body is not JSON. */
  json: unknown;
  text: string;
  /** RFC 6749 §5.2 "error" value, when the body carries one. */
  error?: string;
}

/**
 * Form-encoded POST to a token endpoint. Never throws on HTTP status;
 * callers decide what a non-2xx means for their grant.
 */
export async function postTokenRequest(req: TokenRequest): Promise<TokenEndpointResponse> {
  const fetchImpl: FetchLike = req.fetch ?? ((url, init) => fetch(url, init));

  const form = new URLSearchParams(req.form);
  const headers: Record<string, string> = {
    accept: "application/json",
    "content-type": "application/x-www-form-urlencoded",
    ...req.headers,
  };

  const auth = req.clientAuth;
  if (auth?.method === "basic" && auth.clientSecret) {
    headers.authorization = basicAuthorization(auth.clientId, auth.clientSecret);
  } else if (auth) {
    form.set("client_id", auth.clientId);
    if (auth.clientSecret) form.set("client_secret", auth.clientSecret);
  }

  const res = await requestWithTimeout(
    fetchImpl,
    req.tokenEndpoint,
    { method: "POST", headers, body: form.toString() },
    req.timeoutMs
  );

  const { json, text } = res.body;
  const error = oauthErrorResponseSchema.safeParse(json);

  return {
    status: res.status,
    ok: res.ok,
    headers: res.headers,
    json,
    text,
    error: error.success ? error.data.error : undefined,
  };
}
