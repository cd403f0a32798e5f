// packages/config/src/index.ts
import { isLogLevel, type LogLevel } from "@tokenrelay/logging";

export interface IdpConfig {
  /**
   * OIDC / OAuth issuer, e.g. "https://YOUR_TENANT.okta.com/oauth2/default".
   * Trailing slashes are trimmed.
   */
  issuer: string;
  clientId?: string;
  clientSecret?: string;
  /** `{issuer}/v1/keys` unless OAUTH_JWKS_URI overrides it. */
  jwksUri: string;
  introspectionEndpoint: string;
  tokenEndpoint: string;
  authorizationEndpoint: string;
}

export type VerificationStrategy = "jwt" | "introspection";

export interface ResourceServerConfig {
  host: string;
  port: number;
  /** Public base URL, used as the RFC 9728 `resource` identifier. */
  serverUrl: string;
  audience: string;
  /** Every scope listed here must be present on the caller's token. */
  requiredScopes: string[];
  verification: VerificationStrategy;
  clockToleranceSec: number;
}

export interface ValidatorConfig {
  host: string;
  port: number;
  audience: string;
  clockToleranceSec: number;
}

/**
 * Third-party API reached with a token obtained through token exchange.
 */
export interface DownstreamApiConfig {
  url: string;
  scope: string;
  audience: string;
}

export interface ClientConfig {
  /** JSON-RPC endpoint of the resource server, e.g. "http://localhost:8001/mcp". */
  mcpEndpoint: string;
  callbackHost: string;
  callbackPort: number;
  callbackPath: string;
  redirectUri: string;
  /** Scopes requested at login. */
  scope: string;
  timeoutMs: number;
}

export interface TlsConfig {
  verify: boolean;
  caBundlePath?: string;
}

export interface LoggingConfig {
  level: LogLevel;
  environment: string;
}

export interface RateLimitConfig {
  windowMs: number;
  limit: number;
}

export interface AppConfig {
  idp: IdpConfig;
  resourceServer: ResourceServerConfig;
  validator: ValidatorConfig;
  /** Absent when DOWNSTREAM_API_URL is not set; the exchange tool is then disabled. */
  downstream?: DownstreamApiConfig;
  client: ClientConfig;
  tls: TlsConfig;
  logging: LoggingConfig;
  rateLimit: RateLimitConfig;
}

export interface EnvLike {
  [key: string]: string | undefined;
}

/**
 * Thrown by configFromEnv with every problem found, not just the first.
 */
export class ConfigError extends Error {
  readonly code = "config_invalid";
  readonly status = 500;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function trimTrailingSlashes(input: string): string {
  let out = input;
  while (out.endsWith("/")) {
    out = out.slice(0, -1);
  }
  return out;
}

/**
 * Standard endpoint layout for an issuer (Okta-style `/v1/...` paths).
 */
export function idpEndpoints(issuer: string): Omit<IdpConfig, "issuer" | "clientId" | "clientSecret"> {
  const base = trimTrailingSlashes(issuer);
  return {
    jwksUri: `${base}/v1/keys`,
    introspectionEndpoint: `${base}/v1/introspect`,
    tokenEndpoint: `${base}/v1/token`,
    authorizationEndpoint: `${base}/v1/authorize`,
  };
}

export function parseScopeList(raw: string | undefined): string[] {
  return (raw ?? "").split(/\s+/).filter(Boolean);
}

/**
 * Recursively freeze a plain configuration object.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Client id/secret for roles that authenticate to the identity provider.
 */
export function requireClientCredentials(idp: IdpConfig): {
  clientId: string;
  clientSecret: string;
} {
  const problems: string[] = [];
  if (!idp.clientId) problems.push("OAUTH_CLIENT_ID is required");
  if (!idp.clientSecret) problems.push("OAUTH_CLIENT_SECRET is required");
  if (!idp.clientId || !idp.clientSecret) throw new ConfigError(problems);
  return { clientId: idp.clientId, clientSecret: idp.clientSecret };
}

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: EnvLike) {}

  str(name: string): string | undefined {
    const v = this.env[name]?.trim();
    return v ? v : undefined;
  }

  url(name: string, fallback?: string): string | undefined {
    const raw = this.str(name) ?? fallback;
    if (raw === undefined) return undefined;
    try {
      const u = new URL(raw);
      if (u.protocol !== "http:" && u.protocol !== "https:") {
        this.problems.push(`${name} must be an http(s) URL`);
      }
    } catch {
      this.problems.push(`${name} is not a valid URL`);
    }
    return trimTrailingSlashes(raw);
  }

  int(name: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
    const raw = this.str(name);
    if (raw === undefined) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min || n > max) {
      this.problems.push(`${name} must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return n;
  }

  bool(name: string, fallback: boolean): boolean {
    const raw = this.str(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    return raw !== "false" && raw !== "0" && raw !== "no";
  }
}

/**
 * Builds the AppConfig from process.env-style variables. This is the only
 * place that reads the environment; components receive their section.
 */
export function configFromEnv(env: EnvLike = process.env): Readonly<AppConfig> {
  const r = new EnvReader(env);

  const issuer = r.url("OAUTH_ISSUER");
  if (!issuer) r.problems.push("OAUTH_ISSUER is required");
  const issuerBase = issuer ?? "";
  const endpoints = idpEndpoints(issuerBase);

  const idp: IdpConfig = {
    issuer: issuerBase,
    clientId: r.str("OAUTH_CLIENT_ID"),
    clientSecret: r.str("OAUTH_CLIENT_SECRET"),
    jwksUri: r.url("OAUTH_JWKS_URI") ?? endpoints.jwksUri,
    introspectionEndpoint: endpoints.introspectionEndpoint,
    tokenEndpoint: endpoints.tokenEndpoint,
    authorizationEndpoint: endpoints.authorizationEndpoint,
  };

  const audience = r.str("OAUTH_AUDIENCE") ?? "api://default";
  const clockToleranceSec = r.int("CLOCK_TOLERANCE_SEC", 0, 0, 600);

  const verificationRaw = r.str("TOKEN_VERIFICATION") ?? "introspection";
  let verification: VerificationStrategy = "introspection";
  if (verificationRaw === "jwt" || verificationRaw === "introspection") {
    verification = verificationRaw;
  } else {
    r.problems.push(`TOKEN_VERIFICATION must be "jwt" or "introspection"`);
  }

  const host = r.str("MCP_SERVER_HOST") ?? "localhost";
  const port = r.int("MCP_SERVER_PORT", 8001, 0, 65535);
  const serverUrl = r.url("MCP_SERVER_URL", `http://${host}:${port}`) ?? `http://${host}:${port}`;
  const requiredScopes = parseScopeList(r.str("MCP_REQUIRED_SCOPES") ?? "mcp:access");

  const resourceServer: ResourceServerConfig = {
    host,
    port,
    serverUrl,
    audience,
    requiredScopes,
    verification,
    clockToleranceSec,
  };

  const validator: ValidatorConfig = {
    host: r.str("VALIDATOR_HOST") ?? "0.0.0.0",
    port: r.int("VALIDATOR_PORT", 8000, 0, 65535),
    audience,
    clockToleranceSec,
  };

  let downstream: DownstreamApiConfig | undefined;
  const downstreamUrl = r.url("DOWNSTREAM_API_URL");
  if (downstreamUrl) {
    const scope = r.str("DOWNSTREAM_API_SCOPE");
    const downstreamAudience = r.str("DOWNSTREAM_API_AUDIENCE");
    if (!scope) r.problems.push("DOWNSTREAM_API_SCOPE is required with DOWNSTREAM_API_URL");
    if (!downstreamAudience) {
      r.problems.push("DOWNSTREAM_API_AUDIENCE is required with DOWNSTREAM_API_URL");
    }
    downstream = {
      url: downstreamUrl,
      scope: scope ?? "",
      audience: downstreamAudience ?? "",
    };
  }

  const needsCredentials = verification === "introspection" || downstream !== undefined;
  if (needsCredentials && (!idp.clientId || !idp.clientSecret)) {
    r.problems.push(
      "OAUTH_CLIENT_ID and OAUTH_CLIENT_SECRET are required for introspection and token exchange"
    );
  }

  const callbackHost = r.str("OAUTH_CALLBACK_HOST") ?? "localhost";
  const callbackPort = r.int("OAUTH_CALLBACK_PORT", 3030, 0, 65535);
  let callbackPath = r.str("OAUTH_CALLBACK_PATH") ?? "/oauth/callback";
  if (!callbackPath.startsWith("/")) callbackPath = `/${callbackPath}`;

  const client: ClientConfig = {
    mcpEndpoint: r.url("MCP_ENDPOINT_URL", `${serverUrl}/mcp`) ?? `${serverUrl}/mcp`,
    callbackHost,
    callbackPort,
    callbackPath,
    redirectUri: `http://${callbackHost}:${callbackPort}${callbackPath}`,
    scope: ["openid", "profile", "offline_access", ...requiredScopes].join(" "),
    timeoutMs: r.int("OAUTH_CALLBACK_TIMEOUT_MS", 300_000, 1),
  };

  const tls: TlsConfig = {
    verify: r.bool("VERIFY_SSL", true),
    caBundlePath: r.str("CA_BUNDLE_PATH"),
  };

  const levelRaw = r.str("LOG_LEVEL") ?? "info";
  let level: LogLevel = "info";
  if (isLogLevel(levelRaw)) level = levelRaw;
  else r.problems.push("LOG_LEVEL must be one of debug, info, warn, error");

  const logging: LoggingConfig = {
    level,
    environment: r.str("NODE_ENV") ?? "dev",
  };

  const rateLimit: RateLimitConfig = {
    windowMs: r.int("RATE_LIMIT_WINDOW_MS", 60_000, 1),
    limit: r.int("RATE_LIMIT_MAX", 60, 1),
  };

  if (r.problems.length) {
    throw new ConfigError(r.problems);
  }

  return deepFreeze({
    idp,
    resourceServer,
    validator,
    downstream,
    client,
    tls,
    logging,
    rateLimit,
  });
}
