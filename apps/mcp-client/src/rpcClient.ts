// apps/mcp-client/src/rpcClient.ts
import { z } from "zod";
import { requestWithTimeout, type FetchLike } from "@tokenrelay/idp-client";
import { silentLogger, type Logger } from "@tokenrelay/logging";

export const CLIENT_PROTOCOL_VERSION = "2025-06-18";

const SESSION_HEADER = "mcp-session-id";

const rpcId = z.union([z.string(), z.number(), z.null()]);

// Error first: `result` is optional under z.unknown(), so the success shape
// would also match an error reply.
const rpcResponse = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: rpcId,
    error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }),
  }),
  z.object({ jsonrpc: z.literal("2.0"), id: rpcId, result: z.unknown() }),
]);

const toolListResult = z.object({
  tools: z.array(
    z
      .object({
        name: z.string(),
        description: z.string().optional(),
        inputSchema: z.unknown().optional(),
      })
      .passthrough()
  ),
});

const toolCallResult = z
  .object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
    structuredContent: z.unknown().optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

export type ToolDescriptor = z.infer<typeof toolListResult>["tools"][number];
export type ToolCallResult = z.infer<typeof toolCallResult>;

/**
 * JSON-RPC error answered by the server. `httpStatus` is 401/403 when the
 * bearer token was refused.
 */
export class McpRpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly httpStatus: number,
    readonly data?: unknown
  ) {
    super(message);
    this.name = "McpRpcError";
  }
}

/** The server answered something that is not JSON-RPC. */
export class McpProtocolError extends Error {
  constructor(message: string, readonly httpStatus: number, readonly body: string) {
    super(`${message}: ${httpStatus} ${body}`);
    this.name = "McpProtocolError";
  }
}

export interface McpClientOptions {
  endpoint: string;
  accessToken: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
  clientInfo?: { name: string; version: string };
}

export interface McpClient {
  initialize(): Promise<unknown>;
  listTools(): Promise<ToolDescriptor[]>;
  callTool(name: string, args?: Record<string, unknown>): Promise<ToolCallResult>;
  /** Session id announced by the server, if any. */
  sessionId(): string | undefined;
}

/**
 * Minimal JSON-RPC client for the resource server's tool endpoint. Every
 * request carries the bearer token.
 */
export function createMcpClient(opts: McpClientOptions): McpClient {
  const fetchImpl: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));
  const log = opts.logger ?? silentLogger;
  const clientInfo = opts.clientInfo ?? { name: "tokenrelay-mcp-client", version: "0.1.0" };
  let nextId = 1;
  let session: string | undefined;

  async function post(body: Record<string, unknown>) {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${opts.accessToken}`,
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
    };
    if (session) headers["Mcp-Session-Id"] = session;

    const res = await requestWithTimeout(
      fetchImpl,
      opts.endpoint,
      { method: "POST", headers, body: JSON.stringify(body) },
      opts.timeoutMs
    );
    session = res.headers.get(SESSION_HEADER) ?? session;
    return { res, body: res.body };
  }

  async function send(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const id = nextId++;
    log.debug("mcp_client.request", { method, id });
    const { res, body } = await post({ jsonrpc: "2.0", id, method, ...(params ? { params } : {}) });

    const parsed = rpcResponse.safeParse(body.json);
    if (!parsed.success) {
      throw new McpProtocolError(`Unexpected response to ${method}`, res.status, body.text);
    }
    if ("error" in parsed.data) {
      const { code, message, data } = parsed.data.error;
      throw new McpRpcError(code, message, res.status, data);
    }
    return parsed.data.result;
  }

  async function notify(method: string): Promise<void> {
    const { res, body } = await post({ jsonrpc: "2.0", method });
    if (!res.ok) throw new McpProtocolError(`Notification ${method} refused`, res.status, body.text);
  }

  return {
    async initialize() {
      const result = await send("initialize", {
        protocolVersion: CLIENT_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo,
      });
      await notify("notifications/initialized");
      return result;
    },

    async listTools() {
      const result = await send("tools/list");
      const parsed = toolListResult.safeParse(result);
      if (!parsed.success) throw new McpProtocolError("Malformed tools/list result", 200, JSON.stringify(result));
      return parsed.data.tools;
    },

    async callTool(name, args = {}) {
      const result = await send("tools/call", { name, arguments: args });
      const parsed = toolCallResult.safeParse(result);
      if (!parsed.success) throw new McpProtocolError("Malformed tools/call result", 200, JSON.stringify(result));
      return parsed.data;
    },

    sessionId: () => session,
  };
}

/**
 * Text of a tool result, falling back to its structured content.
 */
export function toolResultText(result: ToolCallResult): string {
  const text = result.content.find((c) => typeof c.text === "string")?.text;
  return text ?? JSON.stringify(result.structuredContent ?? result.content);
}
