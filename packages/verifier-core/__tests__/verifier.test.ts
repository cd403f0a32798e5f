import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createServer, type Server } from "http";
import { SignJWT, exportJWK, generateKeyPair, type JWTPayload, type KeyLike } from "jose";
import { createSigningKeyCache } from "@tokenrelay/idp-client";
import { createRecordingFetch, jsonResponse, textResponse } from "@tokenrelay/idp-client/testing";

import {
  createIntrospectionTokenVerifier,
  createLocalTokenVerifier,
  createTokenVerifier,
  statusForFailure,
} from "../src/index";

const ISSUER = "https://idp.example.test/oauth2/default";
const AUDIENCE = "api://default";

let signingKey: KeyLike;
let otherKey: KeyLike;
let jwks: { keys: unknown[] };

beforeAll(async () => {
  const pair = await generateKeyPair("RS256");
  const other = await generateKeyPair("RS256");
  signingKey = pair.privateKey;
  otherKey = other.privateKey;
  jwks = { keys: [{ ...(await exportJWK(pair.publicKey)), kid: "k1", alg: "RS256", use: "sig" }] };
});

function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

function basePayload(overrides: JWTPayload = {}): JWTPayload {
  const iat = nowSec();
  return {
    iss: ISSUER,
    aud: AUDIENCE,
    sub: "user@example.test",
    cid: "client-1",
    scp: ["openid", "mcp:access"],
    iat,
    exp: iat + 300,
    ...overrides,
  };
}

function sign(payload: JWTPayload, opts: { kid?: string; key?: KeyLike } = {}): Promise<string> {
  const header = opts.kid === undefined ? { alg: "RS256", kid: "k1" } : { alg: "RS256", kid: opts.kid };
  return new SignJWT(payload).setProtectedHeader(header).sign(opts.key ?? signingKey);
}

function localVerifier(clockToleranceSec?: number) {
  const fetch = createRecordingFetch(() => jsonResponse(200, jwks));
  const keys = createSigningKeyCache({ jwksUri: `${ISSUER}/v1/keys`, fetch });
  const verifier = createLocalTokenVerifier({ issuer: ISSUER, audience: AUDIENCE, keys, clockToleranceSec });
  return { verifier, fetch };
}

describe("createLocalTokenVerifier", () => {
  it("returns claims equal to the token payload", async () => {
    const { verifier } = localVerifier();
    const payload = basePayload();
    const token = await sign(payload);

    const result = await verifier.verify(token);

    expect(result.ok).toBe(true);
    if (!result.ok || result.verified.kind !== "jwt") throw new Error("expected jwt success");
    expect(result.verified.claims.raw).toEqual(payload);
    expect(result.verified.claims.keyId).toBe("k1");
    expect(result.accessToken).toEqual({
      token,
      clientId: "client-1",
      scopes: ["openid", "mcp:access"],
      expiresAt: payload.exp,
      subject: "user@example.test",
      source: "jwt",
    });
    expect(Object.isFrozen(result.verified.claims)).toBe(true);
    expect(Object.isFrozen(result.accessToken)).toBe(true);
  });

  it("reads scopes from a scope string and the client id from azp", async () => {
    const { verifier } = localVerifier();
    const token = await sign(basePayload({ scp: undefined, cid: undefined, scope: "a b", azp: "spa" }));

    const result = await verifier.verify(token);

    if (!result.ok) throw new Error(result.detail);
    expect(result.accessToken.scopes).toEqual(["a", "b"]);
    expect(result.accessToken.clientId).toBe("spa");
  });

  it("fails expired tokens with expired_token", async () => {
    const { verifier } = localVerifier();
    const past = nowSec() - 3600;
    const token = await sign(basePayload({ iat: past - 300, exp: past }));

    await expect(verifier.verify(token)).resolves.toEqual({
      ok: false,
      error: "expired_token",
      detail: "Token has expired",
    });
  });

  it("accepts slightly expired tokens within the clock tolerance", async () => {
    const { verifier } = localVerifier(30);
    const token = await sign(basePayload({ exp: nowSec() - 5 }));

    const result = await verifier.verify(token);
    expect(result.ok).toBe(true);
  });

  it("re-fetches the key set exactly once for an unknown kid", async () => {
    const { verifier, fetch } = localVerifier();
    await verifier.verify(await sign(basePayload()));
    expect(fetch.calls).toHaveLength(1);

    const result = await verifier.verify(await sign(basePayload(), { kid: "rotated" }));

    expect(result).toMatchObject({ ok: false, error: "key_not_found" });
    expect(fetch.calls).toHaveLength(2);
  });

  it("maps an unreachable key set to key_not_found", async () => {
    const fetch = createRecordingFetch(() => textResponse(500, "down"));
    const keys = createSigningKeyCache({ jwksUri: `${ISSUER}/v1/keys`, fetch });
    const verifier = createLocalTokenVerifier({ issuer: ISSUER, audience: AUDIENCE, keys });

    const result = await verifier.verify(await sign(basePayload()));
    expect(result).toMatchObject({ ok: false, error: "key_not_found" });
  });

  it("rejects a wrong audience as invalid_token", async () => {
    const { verifier } = localVerifier();
    const result = await verifier.verify(await sign(basePayload({ aud: "api://other" })));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe("invalid_token");
    expect(result.detail).toMatch(/aud/);
  });

  it("rejects a wrong issuer as invalid_token", async () => {
    const { verifier } = localVerifier();
    const result = await verifier.verify(await sign(basePayload({ iss: "https://evil.example.test" })));

    expect(result).toMatchObject({ ok: false, error: "invalid_token" });
  });

  it("requires the issuer to match exactly", async () => {
    const { verifier } = localVerifier();
    const result = await verifier.verify(await sign(basePayload({ iss: `${ISSUER}/` })));

    expect(result).toMatchObject({ ok: false, error: "invalid_token" });
  });

  it("rejects a bad signature as invalid_token", async () => {
    const { verifier } = localVerifier();
    const result = await verifier.verify(await sign(basePayload(), { key: otherKey }));

    expect(result).toMatchObject({ ok: false, error: "invalid_token" });
  });

  it("rejects malformed tokens and tokens without kid", async () => {
    const { verifier, fetch } = localVerifier();
    const noKid = await new SignJWT(basePayload()).setProtectedHeader({ alg: "RS256" }).sign(signingKey);

    await expect(verifier.verify("not-a-jwt")).resolves.toEqual({
      ok: false,
      error: "invalid_token",
      detail: "malformed token header",
    });
    await expect(verifier.verify(noKid)).resolves.toEqual({
      ok: false,
      error: "invalid_token",
      detail: 'token header has no "kid"',
    });
    expect(fetch.calls).toHaveLength(0);
  });
});

describe("createIntrospectionTokenVerifier", () => {
  const endpoint = `${ISSUER}/v1/introspect`;
  const creds = { clientId: "client-1", clientSecret: "test-secret" };
  const notVerified = { ok: false, error: "not_verified", detail: "token could not be verified" };

  it("normalizes an active answer", async () => {
    const fetch = createRecordingFetch(() =>
      jsonResponse(200, { active: true, scope: "openid mcp:access", exp: 1700000000, username: "alice", sub: "00u1" })
    );
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, ...creds, fetch });

    const result = await verifier.verify("opaque-token");

    if (!result.ok) throw new Error(result.detail);
    expect(result.accessToken).toEqual({
      token: "opaque-token",
      clientId: "unknown",
      scopes: ["openid", "mcp:access"],
      expiresAt: 1700000000,
      subject: "alice",
      source: "introspection",
    });
    expect(verifier.strategy).toBe("introspection");
  });

  it("accepts a scope list", async () => {
    const fetch = createRecordingFetch(() =>
      jsonResponse(200, { active: true, scope: ["mcp:access"], client_id: "client-9" })
    );
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, ...creds, fetch });

    const result = await verifier.verify("opaque-token");
    expect(result).toMatchObject({ ok: true, accessToken: { scopes: ["mcp:access"], clientId: "client-9" } });
  });

  it("treats inactive tokens as not_verified", async () => {
    const fetch = createRecordingFetch(() => jsonResponse(200, { active: false }));
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, ...creds, fetch });

    await expect(verifier.verify("t")).resolves.toEqual(notVerified);
  });

  it("treats HTTP errors as not_verified", async () => {
    const fetch = createRecordingFetch(() => textResponse(500, "boom"));
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, ...creds, fetch });

    await expect(verifier.verify("t")).resolves.toEqual(notVerified);
  });

  it("treats transport errors the same as inactive tokens", async () => {
    const fetch = createRecordingFetch(() => {
      throw new Error("ECONNREFUSED");
    });
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, ...creds, fetch });

    await expect(verifier.verify("t")).resolves.toEqual(notVerified);
  });

  it("does not call out without client credentials", async () => {
    const fetch = createRecordingFetch(() => jsonResponse(200, { active: true }));
    const verifier = createIntrospectionTokenVerifier({ introspectionEndpoint: endpoint, fetch });

    await expect(verifier.verify("t")).resolves.toEqual(notVerified);
    expect(fetch.calls).toHaveLength(0);
  });
});

describe("createTokenVerifier", () => {
  const idp = {
    issuer: ISSUER,
    clientId: "client-1",
    clientSecret: "test-secret",
    jwksUri: `${ISSUER}/v1/keys`,
    introspectionEndpoint: `${ISSUER}/v1/introspect`,
    tokenEndpoint: `${ISSUER}/v1/token`,
    authorizationEndpoint: `${ISSUER}/v1/authorize`,
  };

  it("selects the configured strategy", async () => {
    const fetch = createRecordingFetch((req) =>
      req.url.endsWith("/v1/keys") ? jsonResponse(200, jwks) : jsonResponse(200, { active: false })
    );

    const jwt = createTokenVerifier({ strategy: "jwt", idp, audience: AUDIENCE, fetch });
    const introspection = createTokenVerifier({ strategy: "introspection", idp, audience: AUDIENCE, fetch });

    expect(jwt.strategy).toBe("jwt");
    expect(introspection.strategy).toBe("introspection");
    await expect(jwt.verify(await sign(basePayload()))).resolves.toMatchObject({ ok: true });
    expect(fetch.calls.map((c) => c.url)).toEqual([`${ISSUER}/v1/keys`]);
  });
});

describe("statusForFailure", () => {
  it("maps authentication failures to 401 and scope failures to 403", () => {
    expect(statusForFailure("expired_token")).toBe(401);
    expect(statusForFailure("invalid_token")).toBe(401);
    expect(statusForFailure("key_not_found")).toBe(401);
    expect(statusForFailure("not_verified")).toBe(401);
    expect(statusForFailure("insufficient_scope")).toBe(403);
  });
});

describe("introspection against a stalled identity provider", () => {
  let server: Server;
  let endpoint: string;

  beforeAll(async () => {
    server = createServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.write('{"active":');
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not on TCP");
    endpoint = `http://127.0.0.1:${address.port}/v1/introspect`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  });

  it("answers not_verified within the timeout when the body never ends", async () => {
    const verifier = createIntrospectionTokenVerifier({
      introspectionEndpoint: endpoint,
      clientId: "client-1",
      clientSecret: "test-secret",
      timeoutMs: 200,
    });
    const started = Date.now();

    const result = await verifier.verify("tok");

    expect(result).toEqual({ ok: false, error: "not_verified", detail: "token could not be verified" });
    expect(Date.now() - started).toBeLessThan(2_000);
  });
});
