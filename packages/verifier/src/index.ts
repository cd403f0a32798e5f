// packages/verifier/src/index.ts
import "./locals";

export * from "./wwwAuthenticate";
export * from "./requestContext";
export * from "./requireBearer";
export * from "./protectedResourceRouter";
