// apps/mcp-client/src/run.ts
import type { AppConfig } from "@tokenrelay/config";
import type { FetchLike } from "@tokenrelay/idp-client";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import { authenticate, type AuthenticateDeps, type OAuthTokens } from "@tokenrelay/oauth-client";
import { createMcpClient, toolResultText, type ToolCallResult, type ToolDescriptor } from "./rpcClient";

export interface ClientRunDeps {
  fetch?: FetchLike;
  logger?: Logger;
  /** Passed through to authenticate, e.g. to drive the browser step in tests. */
  auth?: Omit<AuthenticateDeps, "fetch" | "logger">;
}

export interface ToolRun {
  name: string;
  arguments: Record<string, unknown>;
  result: ToolCallResult;
}

export interface ClientRunSummary {
  tokens: OAuthTokens;
  serverInfo: unknown;
  tools: ToolDescriptor[];
  calls: ToolRun[];
}

const DEMO_CALLS: Array<{ name: string; arguments: Record<string, unknown> }> = [
  { name: "get_current_time", arguments: {} },
  { name: "calculate_square", arguments: { number: 7 } },
  { name: "call_third_party_api", arguments: {} },
];

/**
 * Logs in, then walks the server's tool catalog: initialize, tools/list
 * and each demo tool the server offers.
 */
export async function runClient(
  config: Pick<AppConfig, "idp" | "client">,
  deps: ClientRunDeps = {}
): Promise<ClientRunSummary> {
  const log = deps.logger ?? silentLogger;

  const tokens = await authenticate(
    { idp: config.idp, client: config.client },
    { ...deps.auth, fetch: deps.fetch, logger: log }
  );
  log.info("client.authenticated", { tokenType: tokens.tokenType, scope: tokens.scope });

  const client = createMcpClient({
    endpoint: config.client.mcpEndpoint,
    accessToken: tokens.accessToken,
    fetch: deps.fetch,
    timeoutMs: 30_000,
    logger: log,
  });

  const serverInfo = await client.initialize();
  const tools = await client.listTools();
  log.info("client.tools", { tools: tools.map((t) => t.name) });

  const offered = new Set(tools.map((t) => t.name));
  const calls: ToolRun[] = [];
  for (const call of DEMO_CALLS) {
    if (!offered.has(call.name)) {
      log.info("client.tool_skipped", { tool: call.name });
      continue;
    }
    const result = await client.callTool(call.name, call.arguments);
    log.info("client.tool_result", { tool: call.name, isError: result.isError ?? false, text: toolResultText(result) });
    calls.push({ ...call, result });
  }

  return { tokens, serverInfo, tools, calls };
}
