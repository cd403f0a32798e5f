// packages/idp-client/src/http.ts
import { readFileSync } from "fs";
import { Agent, fetch as undiciFetch } from "undici";
import type { TlsConfig } from "@tokenrelay/config";
import { silentLogger, type Logger } from "@tokenrelay/logging";

export interface HttpHeadersLike {
  get(name: string): string | null;
}

/**
 * The slice of a fetch Response this package reads. Both the global fetch
 * and undici's fetch satisfy it, and so do hand-built test doubles.
 */
export interface HttpResponseLike {
  status: number;
  ok: boolean;
  headers: HttpHeadersLike;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Fetch honouring the TLS settings: the global fetch when verification is on
 * with the system CAs, otherwise undici with a dedicated Agent.
 */
export function createIdpFetch(tls: TlsConfig, logger: Logger = silentLogger): FetchLike {
  if (tls.verify && !tls.caBundlePath) {
    return (url, init) => fetch(url, init);
  }

  if (!tls.verify) {
    logger.warn("tls.verification_disabled", {
      hint: "only use this against test identity providers",
    });
  }
  if (tls.caBundlePath) {
    logger.info("tls.custom_ca_bundle", { path: tls.caBundlePath });
  }

  const ca = tls.caBundlePath ? readFileSync(tls.caBundlePath, "utf8") : undefined;
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: tls.verify, ...(ca ? { ca } : {}) },
  });

  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export interface ParsedBody {
  text: string;
  /** Parsed JSON, or undefined when the body is not JSON. */
  json: unknown;
}

/** A response whose body has already been read. */
export interface HttpResult {
  status: number;
  ok: boolean;
  headers: HttpHeadersLike;
  body: ParsedBody;
}

export class RequestTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

/**
 * Run one request and read its body under a single deadline.
 */
export async function requestWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: HttpRequestInit,
  timeoutMs = DEFAULT_TIMEOUT_MS
): Promise<HttpResult> {
  const ctrl = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ctrl.abort();
      reject(new RequestTimeoutError(url, timeoutMs));
    }, timeoutMs);
  });

  const exchange = async (): Promise<HttpResult> => {
    const res = await fetchImpl(url, { ...init, signal: ctrl.signal });
    const body = await readBody(res);
    return { status: res.status, ok: res.ok, headers: res.headers, body };
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function readBody(res: HttpResponseLike): Promise<ParsedBody> {
  const text = await res.text();
  if (!text) return { text, json: undefined };
  try {
    const json: unknown = JSON.parse(text);
    return { text, json };
  } catch {
    return { text, json: undefined };
  }
}

/**
 * RFC 6749 §2.3.1 client_secret_basic header value.
 */
export function basicAuthorization(clientId: string, clientSecret: string): string {
  const user = encodeURIComponent(clientId);
  const pass = encodeURIComponent(clientSecret);
  return `Basic ${Buffer.from(`${user}:${pass}`).toString("base64")}`;
}
