import { describe, it, expect } from "vitest";
import { decodeProof } from "@tokenrelay/dpop";
import { basicAuthorization } from "@tokenrelay/idp-client";
import { createRecordingFetch, jsonResponse } from "@tokenrelay/idp-client/testing";

import {
  ACCESS_TOKEN_TYPE,
  MissingNonceError,
  TOKEN_EXCHANGE_GRANT,
  TokenExchangeError,
  createTokenExchangeClient,
} from "../src/index";

const TOKEN_ENDPOINT = "https://idp.example.test/oauth2/default/v1/token";

const nonceChallenge = () =>
  jsonResponse(400, { error: "use_dpop_nonce", error_description: "nonce required" }, { "DPoP-Nonce": "abc123" });

const issued = () =>
  jsonResponse(200, {
    access_token: "downstream-token",
    issued_token_type: ACCESS_TOKEN_TYPE,
    token_type: "DPoP",
    expires_in: 300,
  });

function client(fetch: ReturnType<typeof createRecordingFetch>) {
  return createTokenExchangeClient({
    tokenEndpoint: TOKEN_ENDPOINT,
    clientId: "client-1",
    clientSecret: "test-secret",
    audience: "api://downstream",
    scope: "downstream:read",
    fetch,
  });
}

describe("createTokenExchangeClient", () => {
  it("retries exactly once with the server's nonce", async () => {
    const fetch = createRecordingFetch((_req, i) => (i === 0 ? nonceChallenge() : issued()));

    await expect(client(fetch).exchange("subject-token")).resolves.toBe("downstream-token");

    expect(fetch.calls).toHaveLength(2);
    const first = decodeProof(fetch.calls[0].headers.dpop);
    const second = decodeProof(fetch.calls[1].headers.dpop);
    expect(first.payload.nonce).toBeUndefined();
    expect(second.payload.nonce).toBe("abc123");
    expect(second.header.jwk).toEqual(first.header.jwk);
    expect(second.payload.jti).not.toBe(first.payload.jti);
  });

  it("sends the RFC 8693 form with basic client auth and a DPoP proof", async () => {
    const fetch = createRecordingFetch(() => issued());

    await client(fetch).exchange("subject-token");

    expect(fetch.calls).toHaveLength(1);
    const call = fetch.calls[0];
    expect(call.url).toBe(TOKEN_ENDPOINT);
    expect(call.method).toBe("POST");
    expect(call.headers.authorization).toBe(basicAuthorization("client-1", "test-secret"));
    expect(Object.fromEntries(call.form)).toEqual({
      grant_type: TOKEN_EXCHANGE_GRANT,
      subject_token: "subject-token",
      subject_token_type: ACCESS_TOKEN_TYPE,
      requested_token_type: ACCESS_TOKEN_TYPE,
      scope: "downstream:read",
      audience: "api://downstream",
    });

    const proof = decodeProof(call.headers.dpop);
    expect(proof.header.typ).toBe("dpop+jwt");
    expect(proof.payload.htm).toBe("POST");
    expect(proof.payload.htu).toBe(TOKEN_ENDPOINT);
  });

  it("fails with MissingNonceError when no nonce header comes back", async () => {
    const fetch = createRecordingFetch(() => jsonResponse(400, { error: "use_dpop_nonce" }));

    await expect(client(fetch).exchange("subject-token")).rejects.toBeInstanceOf(MissingNonceError);
    expect(fetch.calls).toHaveLength(1);
  });

  it("does not retry a second nonce challenge", async () => {
    const fetch = createRecordingFetch(() => nonceChallenge());

    const err = await client(fetch)
      .exchange("subject-token")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenExchangeError);
    expect(fetch.calls).toHaveLength(2);
  });

  it("surfaces other failures with status and body, without retrying", async () => {
    const fetch = createRecordingFetch(() => jsonResponse(401, { error: "invalid_client" }));

    const err = await client(fetch)
      .exchange("subject-token")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenExchangeError);
    expect(err).toMatchObject({
      code: "token_exchange_failed",
      upstreamStatus: 401,
      body: '{"error":"invalid_client"}',
      message: 'Token exchange failed: 401 {"error":"invalid_client"}',
    });
    expect(fetch.calls).toHaveLength(1);
  });

  it("rejects a success response without an access token", async () => {
    const fetch = createRecordingFetch(() => jsonResponse(200, { token_type: "DPoP" }));

    await expect(client(fetch).exchange("subject-token")).rejects.toMatchObject({
      code: "token_exchange_failed",
      upstreamStatus: 200,
    });
  });

  it("uses a new DPoP key for every exchange", async () => {
    const fetch = createRecordingFetch(() => issued());
    const c = client(fetch);

    await c.exchange("a");
    await c.exchange("b");

    const k1 = decodeProof(fetch.calls[0].headers.dpop).header.jwk;
    const k2 = decodeProof(fetch.calls[1].headers.dpop).header.jwk;
    expect(k1).not.toEqual(k2);
  });
});
