// packages/oauth-client/src/index.ts
export * from "./errors";
export * from "./pkce";
export * from "./authorizationUrl";
export * from "./storage";
export * from "./session";
export * from "./callbackListener";
export * from "./tokens";
export * from "./authenticate";
