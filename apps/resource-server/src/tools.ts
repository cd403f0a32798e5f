// apps/resource-server/src/tools.ts
import { z } from "zod";
import type { DownstreamApiConfig } from "@tokenrelay/config";
import { isOAuthError, requestWithTimeout, type FetchLike } from "@tokenrelay/idp-client";
import type { Logger } from "@tokenrelay/logging";
import type { AccessToken } from "@tokenrelay/request-context";
import type { TokenExchangeClient } from "@tokenrelay/token-exchange";

export interface ToolContext {
  accessToken: AccessToken;
  logger: Logger;
}

export interface ToolResult {
  isError: boolean;
  value: unknown;
}

/** JSON Schema advertised by tools/list. */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  call(args: unknown, ctx: ToolContext): Promise<ToolResult>;
}

export class InvalidToolArgumentsError extends Error {
  constructor(readonly tool: string, readonly issues: string[]) {
    super(`Invalid arguments for ${tool}: ${issues.join("; ")}`);
    this.name = "InvalidToolArgumentsError";
  }
}

interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: S;
  run(args: z.infer<S>, ctx: ToolContext): Promise<ToolResult>;
}

export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): Tool {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    async call(args, ctx) {
      const parsed = spec.args.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidToolArgumentsError(
          spec.name,
          parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
        );
      }
      return spec.run(parsed.data, ctx);
    },
  };
}

const ok = (value: unknown): ToolResult => ({ isError: false, value });
const failed = (value: unknown): ToolResult => ({ isError: true, value });

/** "YYYY-MM-DD HH:MM:SS" in UTC. */
function formatUtc(d: Date): string {
  return d.toISOString().replace("T", " ").slice(0, 19);
}

export function currentTimeTool(now: () => Date = () => new Date()): Tool {
  return defineTool({
    name: "get_current_time",
    description: "Get the current server time.",
    inputSchema: { type: "object", properties: {}, additionalProperties: false },
    args: z.object({}),
    async run() {
      const d = now();
      return ok({
        current_time: d.toISOString(),
        timezone: "UTC",
        timestamp: d.getTime() / 1000,
        formatted: formatUtc(d),
        message: "Hello from authenticated MCP server!",
      });
    },
  });
}

export function squareTool(): Tool {
  return defineTool({
    name: "calculate_square",
    description: "Calculate the square of a number.",
    inputSchema: {
      type: "object",
      required: ["number"],
      properties: { number: { type: "number", description: "The number to square" } },
      additionalProperties: false,
    },
    args: z.object({ number: z.number().finite() }),
    async run({ number }) {
      const square = number ** 2;
      return ok({ input: number, square, calculation: `${number}² = ${square}` });
    },
  });
}

export interface ThirdPartyApiDeps {
  downstream: DownstreamApiConfig;
  exchangeClient: TokenExchangeClient;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Trades the caller's token for one audienced to the downstream API, then
 * calls it. Exchange failures come back as a tool error carrying the
 * OAuth error code.
 */
export function thirdPartyApiTool(deps: ThirdPartyApiDeps): Tool {
  const fetchImpl: FetchLike = deps.fetch ?? ((url, init) => fetch(url, init));

  return defineTool({
    name: "call_third_party_api",
    description: "Call the downstream API on behalf of the caller using an exchanged token.",
    inputSchema: { type: "object", properties: {} },
    args: z.object({}),
    async run(_args, ctx) {
      let downstreamToken: string;
      try {
        downstreamToken = await deps.exchangeClient.exchange(ctx.accessToken.token);
      } catch (err) {
        if (!isOAuthError(err)) throw err;
        ctx.logger.warn("tool.token_exchange_failed", { code: err.code, err });
        return failed({ error: err.code, detail: err.message });
      }

      const res = await requestWithTimeout(
        fetchImpl,
        deps.downstream.url,
        {
          method: "GET",
          headers: { Authorization: `Bearer ${downstreamToken}`, Accept: "application/json" },
        },
        deps.timeoutMs
      );
      const { body } = res;
      ctx.logger.info("tool.downstream_called", { status: res.status });

      const value = { status: res.status, body: body.json ?? body.text };
      return res.ok ? ok(value) : failed(value);
    },
  });
}

export interface ToolCatalogOptions {
  /** Without it, call_third_party_api is not offered. */
  thirdPartyApi?: ThirdPartyApiDeps;
  now?: () => Date;
}

export function buildToolCatalog(opts: ToolCatalogOptions = {}): Tool[] {
  const tools = [currentTimeTool(opts.now), squareTool()];
  if (opts.thirdPartyApi) tools.push(thirdPartyApiTool(opts.thirdPartyApi));
  return tools;
}
