// packages/request-context/src/index.ts

export * from "./types";

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import type { RequestContext, RequestMeta } from "./types";

type RequestContextOverrides = Omit<Partial<RequestContext>, "request"> & {
  request?: Partial<RequestMeta>;
};

export function createRequestContext(
  overrides: RequestContextOverrides = {}
): RequestContext {
  const reqOverrides: Partial<RequestMeta> = overrides.request ?? {};

  const request: RequestMeta = {
    requestId: reqOverrides.requestId ?? `req_${randomUUID()}`,
    startedAt: reqOverrides.startedAt ?? new Date().toISOString(),
    method: reqOverrides.method ?? "UNKNOWN",
    path: reqOverrides.path ?? "UNKNOWN",
    ip: reqOverrides.ip,
    userAgent: reqOverrides.userAgent,
  };

  return {
    request,
    accessToken: overrides.accessToken,
    authz: overrides.authz,
    tool: overrides.tool,
    extras: overrides.extras ?? {},
  };
}

export function mergeRequestContext(
  base: RequestContext,
  updates: Partial<RequestContext>
): RequestContext {
  return {
    ...base,
    ...updates,
    request: { ...base.request, ...(updates.request ?? {}) },
    accessToken: updates.accessToken ?? base.accessToken,
    authz: { ...base.authz, ...updates.authz },
    extras: { ...(base.extras ?? {}), ...(updates.extras ?? {}) },
  };
}

const requestAls = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with a fresh RequestContext bound to the current async call
 * chain. Called once per inbound HTTP request.
 */
export function runWithRequestContext<T>(
  overrides: RequestContextOverrides,
  fn: () => T
): T {
  const ctx = createRequestContext(overrides);
  return requestAls.run(ctx, fn);
}

/**
 * The RequestContext for this async call chain, or undefined outside
 * runWithRequestContext.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestAls.getStore();
}

/**
 * Merge updates into the current context in place, so references held
 * elsewhere stay valid. No-op outside a context.
 */
export function updateRequestContext(updates: Partial<RequestContext>): void {
  const current = requestAls.getStore();
  if (!current) return;

  Object.assign(current, mergeRequestContext(current, updates));
}
