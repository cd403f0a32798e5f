import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import type { AddressInfo } from "net";
import { decodeJwt } from "jose";
import { idpEndpoints, type ClientConfig, type IdpConfig } from "@tokenrelay/config";
import { createRecordingFetch, jsonResponse } from "@tokenrelay/idp-client/testing";
import { silentLogger } from "@tokenrelay/logging";
import { startMockIdp, type RunningMockIdp } from "@tokenrelay/mock-idp";
import { buildApp } from "@tokenrelay/resource-server";
import { createTokenExchangeClient } from "@tokenrelay/token-exchange";
import { createTokenVerifier } from "@tokenrelay/verifier-core";

import { McpRpcError } from "../src/rpcClient";
import { runClient } from "../src/run";

const CLIENT = { clientId: "client-1", clientSecret: "test-secret" };

let idp: RunningMockIdp;
let server: Server;
let idpConfig: IdpConfig;
let mcpEndpoint: string;
const downstream = createRecordingFetch(() => jsonResponse(200, { items: [1, 2, 3] }));

beforeAll(async () => {
  idp = await startMockIdp({ audience: "api://default", ...CLIENT, subject: "dana" });
  idpConfig = { issuer: idp.issuer, ...CLIENT, ...idpEndpoints(idp.issuer) };

  const app = buildApp({
    config: {
      idp: idpConfig,
      resourceServer: {
        host: "127.0.0.1",
        port: 0,
        serverUrl: "http://127.0.0.1",
        audience: "api://default",
        requiredScopes: ["mcp:access"],
        verification: "jwt",
        clockToleranceSec: 0,
      },
      downstream: { url: "https://api.example.test/data", scope: "downstream:read", audience: "api://downstream" },
      rateLimit: { windowMs: 60_000, limit: 100 },
    },
    verifier: createTokenVerifier({ strategy: "jwt", idp: idpConfig, audience: "api://default" }),
    exchangeClient: createTokenExchangeClient({
      tokenEndpoint: idpConfig.tokenEndpoint,
      ...CLIENT,
      audience: "api://downstream",
      scope: "downstream:read",
    }),
    logger: silentLogger,
    fetch: downstream,
  });

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address: string | AddressInfo | null = server.address();
  if (address === null || typeof address === "string") throw new Error("resource server is not on TCP");
  mcpEndpoint = `http://127.0.0.1:${address.port}/mcp`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
  await idp.close();
});

function clientConfig(scope: string): ClientConfig {
  return {
    mcpEndpoint,
    callbackHost: "127.0.0.1",
    callbackPort: 0,
    callbackPath: "/oauth/callback",
    redirectUri: "http://127.0.0.1:0/oauth/callback",
    scope,
    timeoutMs: 5_000,
  };
}

// Stands in for the browser: follows the IdP's redirect to the loopback listener.
const browser = async (url: string) => {
  const res = await fetch(url);
  await res.text();
};

describe("mcp client against the resource server", () => {
  it("logs in and runs every demo tool", async () => {
    const summary = await runClient(
      { idp: idpConfig, client: clientConfig("openid mcp:access") },
      { auth: { openBrowser: browser } }
    );

    expect(decodeJwt(summary.tokens.accessToken)).toMatchObject({
      aud: "api://default",
      sub: "dana",
      scp: ["openid", "mcp:access"],
    });
    expect(summary.serverInfo).toMatchObject({ serverInfo: { name: "tokenrelay-resource-server" } });
    expect(summary.tools.map((t) => t.name)).toEqual(["get_current_time", "calculate_square", "call_third_party_api"]);
    expect(summary.calls.map((c) => c.name)).toEqual(["get_current_time", "calculate_square", "call_third_party_api"]);

    const [, square, thirdParty] = summary.calls;
    expect(square.result.structuredContent).toEqual({ input: 7, square: 49, calculation: "7² = 49" });
    expect(thirdParty.result).toMatchObject({
      isError: false,
      structuredContent: { status: 200, body: { items: [1, 2, 3] } },
    });

    const bearer = downstream.calls[0].headers.authorization.replace(/^Bearer /, "");
    expect(decodeJwt(bearer)).toMatchObject({ aud: "api://downstream", sub: "dana", scp: ["downstream:read"] });
  });

  it("is refused when the login did not grant the server's scope", async () => {
    const err = await runClient(
      { idp: idpConfig, client: clientConfig("openid") },
      { auth: { openBrowser: browser } }
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(McpRpcError);
    expect(err).toMatchObject({ code: -32001, message: "Forbidden", httpStatus: 403 });
  });
});
