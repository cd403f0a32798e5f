// packages/verifier/src/wwwAuthenticate.ts
import type { Request } from "express";

export interface BearerChallenge {
  error?: "invalid_token" | "insufficient_scope" | "invalid_request";
  description?: string;
  scope?: readonly string[];
  resourceMetadata?: string;
}

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, "\\$&")}"`;
}

/**
 * RFC 6750 §3 challenge, with the RFC 9728 `resource_metadata` parameter.
 */
export function buildWwwAuthenticate(challenge: BearerChallenge): string {
  const params: string[] = [];
  if (challenge.error) params.push(`error=${quote(challenge.error)}`);
  if (challenge.description) params.push(`error_description=${quote(challenge.description)}`);
  if (challenge.scope?.length) params.push(`scope=${quote(challenge.scope.join(" "))}`);
  if (challenge.resourceMetadata) params.push(`resource_metadata=${quote(challenge.resourceMetadata)}`);
  return params.length ? `Bearer ${params.join(", ")}` : "Bearer";
}

/**
 * Metadata URL for the server answering `req`, honouring proxy headers.
 */
export function resourceMetadataUrlFor(req: Request): string {
  const proto = req.get("x-forwarded-proto") || req.protocol || "https";
  const host = req.get("x-forwarded-host") || req.get("host") || "";
  return `${proto}://${host}/.well-known/oauth-protected-resource`;
}
