// packages/scopes-core/src/index.ts
export * from "./scopes";

export interface ProtectedResourceConfig {
  /** Resource identifier, normally the server's public base URL. */
  resource: string;
  issuer: string;
  scopes: readonly string[];
}

/**
 * RFC 9728 protected-resource metadata document.
 */
export interface ProtectedResourceMetadata {
  resource: string;
  authorization_servers: string[];
  scopes_supported: string[];
  bearer_methods_supported: string[];
}

export function buildProtectedResourcePayload(cfg: ProtectedResourceConfig): ProtectedResourceMetadata {
  return {
    resource: cfg.resource,
    authorization_servers: [cfg.issuer],
    scopes_supported: [...cfg.scopes],
    bearer_methods_supported: ["header"],
  };
}
