// packages/oauth-client/src/storage.ts

export interface OAuthTokens {
  accessToken: string;
  tokenType: string;
  expiresIn?: number;
  refreshToken?: string;
  scope: string;
}

export interface OAuthClientInfo {
  clientId: string;
  redirectUris: string[];
}

/**
 * Where the client keeps what it obtained. Swap the in-memory default for
 * a persistent backend without touching the flow.
 */
export interface TokenStorage {
  getTokens(): Promise<OAuthTokens | undefined>;
  setTokens(tokens: OAuthTokens): Promise<void>;
  getClientInfo(): Promise<OAuthClientInfo | undefined>;
  setClientInfo(info: OAuthClientInfo): Promise<void>;
}

export class InMemoryTokenStorage implements TokenStorage {
  private tokens?: OAuthTokens;
  private clientInfo?: OAuthClientInfo;

  async getTokens(): Promise<OAuthTokens | undefined> {
    return this.tokens;
  }

  async setTokens(tokens: OAuthTokens): Promise<void> {
    this.tokens = tokens;
  }

  async getClientInfo(): Promise<OAuthClientInfo | undefined> {
    return this.clientInfo;
  }

  async setClientInfo(info: OAuthClientInfo): Promise<void> {
    this.clientInfo = info;
  }
}
