// packages/verifier/src/protectedResourceRouter.ts
import { Router } from "express";
import { buildProtectedResourcePayload, type ProtectedResourceConfig } from "@tokenrelay/scopes-core";

export function protectedResourceRouter(cfg: ProtectedResourceConfig): Router {
  const r = Router();
  r.get("/.well-known/oauth-protected-resource", (_req, res) => {
    res.json(buildProtectedResourcePayload(cfg));
  });
  return r;
}
