// packages/oauth-client/src/pkce.ts
import { createHash, randomBytes } from "crypto";

/**
 * RFC 7636 code verifier: 32 random bytes, base64url without padding (43 chars).
 */
export function generateCodeVerifier(): string {
  return randomBytes(32).toString("base64url");
}

/**
 * S256 challenge: BASE64URL(SHA256(verifier)), no padding.
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier).digest("base64url");
}

/**
 * Random anti-CSRF `state` value.
 */
export function generateState(): string {
  return randomBytes(32).toString("base64url");
}
