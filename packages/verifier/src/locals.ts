// packages/verifier/src/locals.ts
import type { AccessToken } from "@tokenrelay/request-context";

declare global {
  namespace Express {
    interface Locals {
      requestId?: string;
      /** Set by requireBearer. */
      accessToken?: AccessToken;
      subject?: string;
    }
  }
}

export {};
