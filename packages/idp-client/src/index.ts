// packages/idp-client/src/index.ts
export * from "./errors";
export * from "./http";
export * from "./schemas";
export * from "./jwks";
export * from "./introspection";
export * from "./token-endpoint";
