import { describe, it, expect } from "vitest";

import {
  createRequestContext,
  getRequestContext,
  mergeRequestContext,
  runWithRequestContext,
  updateRequestContext,
  type AccessToken,
} from "../src/index";

const accessToken: AccessToken = {
  token: "tok-a",
  clientId: "client-1",
  scopes: ["mcp:access"],
  subject: "alice",
  source: "jwt",
};

describe("createRequestContext", () => {
  it("fills request defaults", () => {
    const ctx = createRequestContext({ request: { method: "POST", path: "/mcp" } });

    expect(ctx.request.method).toBe("POST");
    expect(ctx.request.path).toBe("/mcp");
    expect(ctx.request.requestId).toMatch(/^req_/);
    expect(ctx.accessToken).toBeUndefined();
    expect(ctx.extras).toEqual({});
  });

  it("keeps an explicit request id", () => {
    const ctx = createRequestContext({ request: { requestId: "req_fixed" } });
    expect(ctx.request.requestId).toBe("req_fixed");
  });
});

describe("mergeRequestContext", () => {
  it("merges authz and extras without dropping the access token", () => {
    const base = createRequestContext({ accessToken, extras: { a: 1 } });
    const merged = mergeRequestContext(base, {
      authz: { decision: "allow" },
      extras: { b: 2 },
    });

    expect(merged.accessToken).toBe(accessToken);
    expect(merged.authz).toEqual({ decision: "allow" });
    expect(merged.extras).toEqual({ a: 1, b: 2 });
  });
});

describe("runWithRequestContext", () => {
  it("scopes the context to the async call chain", async () => {
    expect(getRequestContext()).toBeUndefined();

    await runWithRequestContext({ request: { path: "/one" } }, async () => {
      await Promise.resolve();
      updateRequestContext({ accessToken });
      expect(getRequestContext()?.accessToken?.token).toBe("tok-a");
      expect(getRequestContext()?.request.path).toBe("/one");
    });

    expect(getRequestContext()).toBeUndefined();
  });

  it("keeps concurrent requests apart", async () => {
    const seen: string[] = [];

    const run = (token: string, delayMs: number) =>
      runWithRequestContext({}, async () => {
        updateRequestContext({ accessToken: { ...accessToken, token } });
        await new Promise((r) => setTimeout(r, delayMs));
        seen.push(getRequestContext()?.accessToken?.token ?? "none");
      });

    await Promise.all([run("first", 20), run("second", 5)]);

    expect(seen).toEqual(["second", "first"]);
  });

  it("ignores updates outside a context", () => {
    expect(() => updateRequestContext({ tool: "x" })).not.toThrow();
    expect(getRequestContext()).toBeUndefined();
  });
});
