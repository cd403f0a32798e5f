// packages/idp-client/src/schemas.ts
import { z } from "zod";

export const jwkSchema = z
  .object({
    kty: z.string(),
    kid: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
    n: z.string().optional(),
    e: z.string().optional(),
    crv: z.string().optional(),
    x: z.string().optional(),
    y: z.string().optional(),
  })
  .passthrough();

export const jwksSchema = z.object({
  keys: z.array(z.unknown()),
});

const scopeValue = z.union([z.string(), z.array(z.string())]);

/**
 * RFC 7662 introspection response. Only `active` is mandatory.
 */
export const introspectionResponseSchema = z
  .object({
    active: z.boolean(),
    scope: scopeValue.optional(),
    scp: z.array(z.string()).optional(),
    client_id: z.string().optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
    sub: z.string().optional(),
    username: z.string().optional(),
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    token_type: z.string().optional(),
  })
  .passthrough();

export type IntrospectionResponse = z.infer<typeof introspectionResponseSchema>;

/**
 * Successful token-endpoint response (RFC 6749 §5.1, RFC 8693 §2.2.1).
 */
export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
    issued_token_type: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Error response (RFC 6749 §5.2).
 */
export const oauthErrorResponseSchema = z
  .object({
    error: z.string(),
    error_description: z.string().optional(),
  })
  .passthrough();

export type OAuthErrorResponse = z.infer<typeof oauthErrorResponseSchema>;
