import { describe, it, expect, beforeAll, afterAll } from "vitest";
import request from "supertest";
import { decodeJwt } from "jose";
import { createSigningKeyCache } from "@tokenrelay/idp-client";
import { createLogger, type LogEvent } from "@tokenrelay/logging";
import { createMockIdp, startMockIdp, type RunningMockIdp } from "@tokenrelay/mock-idp";
import { createLocalTokenVerifier } from "@tokenrelay/verifier-core";

import { buildValidatorApp } from "../src/app";

const CLIENT = { clientId: "client-1", clientSecret: "test-secret" };

let idp: RunningMockIdp;
let events: LogEvent[];
let app: ReturnType<typeof buildValidatorApp>;

beforeAll(async () => {
  idp = await startMockIdp({ audience: "api://default", subject: "alice", ...CLIENT });
  events = [];
  const logger = createLogger({ level: "debug", sink: (e) => events.push(e) });
  const keys = createSigningKeyCache({ jwksUri: `${idp.issuer}/v1/keys` });
  app = buildValidatorApp({
    verifier: createLocalTokenVerifier({ issuer: idp.issuer, audience: "api://default", keys }),
    logger,
  });
});

afterAll(async () => {
  await idp.close();
});

describe("token validator", () => {
  it("echoes the claims of a valid token", async () => {
    const token = await idp.idp.signAccessToken({ scopes: ["openid", "mcp:access"] });

    const res = await request(app).get("/").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual(decodeJwt(token));
  });

  it("logs a claims summary and never the token", async () => {
    const token = await idp.idp.signAccessToken({ scopes: ["mcp:access"] });
    events.length = 0;

    await request(app).get("/").set("Authorization", `Bearer ${token}`);

    const accepted = events.find((e) => e.msg === "validator.accepted");
    expect(accepted).toMatchObject({ subject: "alice", clientId: "client-1", scopes: ["mcp:access"] });
    expect(JSON.stringify(events)).not.toContain(token);
  });

  it("answers 401 without a bearer token", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe("Bearer");
    expect(res.body).toEqual({ error: "invalid_token", detail: "missing bearer token" });
  });

  it("answers 401 expired_token for an expired token", async () => {
    const token = await idp.idp.signAccessToken({ expiresInSec: -60 });

    const res = await request(app).get("/").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer error="invalid_token", error_description="Token has expired"');
    expect(res.body).toEqual({ error: "expired_token", detail: "Token has expired" });
  });

  it("answers 401 invalid_token for another audience", async () => {
    const token = await idp.idp.signAccessToken({ audience: "api://other" });

    const res = await request(app).get("/").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.body.error).toBe("invalid_token");
  });

  it("answers 401 key_not_found for a key the issuer does not publish", async () => {
    const stranger = createMockIdp({ issuer: idp.issuer, audience: "api://default", kid: "rotated", ...CLIENT });
    const token = await stranger.signAccessToken();

    const res = await request(app).get("/").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(401);
    expect(res.body.error).toBe("key_not_found");
  });
});
