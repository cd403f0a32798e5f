// apps/resource-server/src/mcp.ts
import type { RequestHandler, Response } from "express";
import { z } from "zod";
import type { Logger } from "@tokenrelay/logging";
import { getRequestContext, updateRequestContext } from "@tokenrelay/request-context";
import {
  JSON_RPC_ERRORS,
  jsonRpcError,
  jsonRpcRequestSchema,
  jsonRpcResult,
  requestIdOf,
  type JsonRpcId,
} from "./jsonRpc";
import { InvalidToolArgumentsError, type Tool } from "./tools";

export const PROTOCOL_VERSION = "2025-06-18";

export interface McpHandlerOptions {
  tools: Tool[];
  logger: Logger;
  serverInfo?: { name: string; version: string };
}

const toolCallParams = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

function reply(res: Response, status: number, body: unknown): void {
  res.status(status).json(body);
}

/**
 * JSON-RPC 2.0 endpoint for the tool catalog. Mount after the bearer and
 * scope middleware; every method here assumes a verified caller.
 */
export function mcpHandler(opts: McpHandlerOptions): RequestHandler {
  const tools = new Map(opts.tools.map((t) => [t.name, t]));
  const serverInfo = opts.serverInfo ?? { name: "tokenrelay-resource-server", version: "0.1.0" };

  return async (req, res) => {
    const log = opts.logger.child({ requestId: res.locals.requestId });

    if (Array.isArray(req.body)) {
      reply(res, 400, jsonRpcError(null, JSON_RPC_ERRORS.INVALID_REQUEST, "Batch requests are not supported"));
      return;
    }

    const parsed = jsonRpcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      reply(res, 400, jsonRpcError(requestIdOf(req.body), JSON_RPC_ERRORS.INVALID_REQUEST, "Invalid Request"));
      return;
    }

    const rpc = parsed.data;
    const id: JsonRpcId = rpc.id ?? null;
    log.debug("mcp.request", { method: rpc.method });

    if (rpc.method === "initialize") {
      reply(
        res,
        200,
        jsonRpcResult(id, {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: { tools: { listChanged: false } },
          serverInfo,
        })
      );
      return;
    }

    // Notifications carry no id and get no body.
    if (rpc.method.startsWith("notifications/")) {
      res.status(202).end();
      return;
    }

    if (rpc.method === "tools/list") {
      reply(
        res,
        200,
        jsonRpcResult(id, {
          tools: opts.tools.map((t) => ({
            name: t.name,
            description: t.description,
            inputSchema: t.inputSchema,
          })),
        })
      );
      return;
    }

    if (rpc.method === "tools/call") {
      const params = toolCallParams.safeParse(rpc.params);
      if (!params.success) {
        reply(res, 400, jsonRpcError(id, JSON_RPC_ERRORS.INVALID_PARAMS, "tools/call needs a tool name"));
        return;
      }

      const tool = tools.get(params.data.name);
      if (!tool) {
        reply(res, 404, jsonRpcError(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown tool: ${params.data.name}`));
        return;
      }

      const accessToken = res.locals.accessToken ?? getRequestContext()?.accessToken;
      if (!accessToken) {
        reply(res, 401, jsonRpcError(id, JSON_RPC_ERRORS.UNAUTHORIZED, "Unauthorized"));
        return;
      }

      updateRequestContext({ tool: tool.name });

      try {
        const result = await tool.call(params.data.arguments, { accessToken, logger: log });
        log.info("mcp.tool_called", { tool: tool.name, isError: result.isError });
        reply(
          res,
          200,
          jsonRpcResult(id, {
            content: [{ type: "text", text: JSON.stringify(result.value) }],
            structuredContent: result.value,
            isError: result.isError,
          })
        );
      } catch (err) {
        if (err instanceof InvalidToolArgumentsError) {
          reply(res, 400, jsonRpcError(id, JSON_RPC_ERRORS.INVALID_PARAMS, err.message, { issues: err.issues }));
          return;
        }
        log.error("mcp.tool_failed", { tool: tool.name, err });
        reply(res, 500, jsonRpcError(id, JSON_RPC_ERRORS.INTERNAL_ERROR, "Internal error"));
      }
      return;
    }

    reply(res, 404, jsonRpcError(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Method not found: ${rpc.method}`));
  };
}
