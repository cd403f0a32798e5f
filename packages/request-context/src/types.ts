// packages/request-context/src/types.ts

/**
 * How a bearer token was verified.
 */
export type VerificationSource = "jwt" | "introspection";

/**
 * Canonical, verified view of the caller's access token.
 * This is what every token verifier outputs.
 */
export interface AccessToken {
  /** The bearer string exactly as presented. */
  token: string;

  /** OAuth client the token was issued to ("unknown" when the IdP omits it). */
  clientId: string;

  /** Granted scopes, de-duplicated. */
  scopes: string[];

  /** Expiry as a Unix timestamp in seconds. */
  expiresAt?: number;

  /** Subject or username, when the IdP reports one. */
  subject?: string;

  source: VerificationSource;
}

/**
 * Basic HTTP request metadata, useful for logging and debugging.
 */
export interface RequestMeta {
  /** Correlation id for this hop. */
  requestId: string;

  /** ISO timestamp of when the server received the request. */
  startedAt: string;

  method: string;
  path: string;

  ip?: string;
  userAgent?: string;
}

export type AuthzDecision = "allow" | "deny";

export interface AuthzMeta {
  decision?: AuthzDecision;
  /** Failure code when denied, e.g. "insufficient_scope". */
  reason?: string;

  requiredScopes?: string[];
  grantedScopes?: string[];
}

export interface RequestContext {
  /** Always present once the context is created. */
  request: RequestMeta;

  /** Filled by the bearer middleware after verification succeeds. */
  accessToken?: AccessToken;

  /** Filled by the scope middleware. */
  authz?: AuthzMeta;

  /** Name of the tool being invoked, for JSON-RPC tool calls. */
  tool?: string;

  extras?: Record<string, unknown>;
}
