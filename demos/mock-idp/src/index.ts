// demos/mock-idp/src/index.ts
export * from "./keys";
export * from "./idp";
export * from "./server";
