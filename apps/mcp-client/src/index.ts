// apps/mcp-client/src/index.ts
export * from "./rpcClient";
export * from "./run";
