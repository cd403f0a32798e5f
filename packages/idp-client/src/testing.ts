// packages/idp-client/src/testing.ts
//
// In-process stand-ins for identity-provider HTTP calls.

import type { FetchLike, HttpRequestInit, HttpResponseLike } from "./http";

export interface RecordedRequest {
  url: string;
  method: string;
  /** Header names lower-cased. */
  headers: Record<string, string>;
  body: string;
  form: URLSearchParams;
}

export type FetchHandler = (
  req: RecordedRequest,
  index: number
) => HttpResponseLike | Promise<HttpResponseLike>;

export interface RecordingFetch extends FetchLike {
  calls: RecordedRequest[];
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function textResponse(status: number, body: string): Response {
  return new Response(body, { status, headers: { "content-type": "text/plain" } });
}

/**
 * Fetch double that records every request and answers through `handler`.
 */
export function createRecordingFetch(handler: FetchHandler): RecordingFetch {
  const calls: RecordedRequest[] = [];

  const impl = async (url: string, init: HttpRequestInit): Promise<HttpResponseLike> => {
    const headers: Record<string, string> = {};
    for (const [k, v] of Object.entries(init.headers)) headers[k.toLowerCase()] = v;
    const body = init.body ?? "";

    const recorded: RecordedRequest = {
      url,
      method: init.method,
      headers,
      body,
      form: new URLSearchParams(body),
    };
    calls.push(recorded);
    return handler(recorded, calls.length - 1);
  };

  return Object.assign(impl, { calls });
}
