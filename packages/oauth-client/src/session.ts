// packages/oauth-client/src/session.ts
import { CsrfMismatchError, InvalidSessionTransitionError } from "./errors";
import type { OAuthTokens } from "./storage";

export type OAuthSessionStatus =
  | "idle"
  | "awaiting_callback"
  | "code_received"
  | "exchanging"
  | "complete"
  | "failed";

const NEXT: Record<OAuthSessionStatus, readonly OAuthSessionStatus[]> = {
  idle: ["awaiting_callback", "failed"],
  awaiting_callback: ["code_received", "failed"],
  code_received: ["exchanging", "failed"],
  exchanging: ["complete", "failed"],
  complete: [],
  failed: [],
};

export interface CallbackParams {
  code: string;
  state?: string;
}

export interface PkceParams {
  codeVerifier: string;
  codeChallenge: string;
  state: string;
}

/**
 * One login attempt:
 * idle → awaiting_callback → code_received → exchanging → complete | failed.
 * Any other move throws InvalidSessionTransitionError.
 */
export class OAuthSession {
  private current: OAuthSessionStatus = "idle";
  private pkce?: PkceParams;
  private callback?: CallbackParams;
  private result?: OAuthTokens;
  private failure?: unknown;

  get status(): OAuthSessionStatus {
    return this.current;
  }

  get isTerminal(): boolean {
    return NEXT[this.current].length === 0;
  }

  get tokens(): OAuthTokens | undefined {
    return this.result;
  }

  get error(): unknown {
    return this.failure;
  }

  begin(pkce: PkceParams): void {
    this.move("awaiting_callback");
    this.pkce = pkce;
  }

  receiveCallback(callback: CallbackParams): void {
    this.move("code_received");
    this.callback = callback;
  }

  /**
   * Checks the returned state and hands out what the token request needs.
   * A mismatch fails the session before any token request exists.
   */
  startExchange(): { code: string; codeVerifier: string } {
    this.assertCanMove("exchanging");
    const { pkce, callback } = this;
    if (!pkce || !callback) throw new InvalidSessionTransitionError(this.current, "exchanging");

    if (callback.state !== pkce.state) {
      const err = new CsrfMismatchError();
      this.fail(err);
      throw err;
    }

    this.move("exchanging");
    return { code: callback.code, codeVerifier: pkce.codeVerifier };
  }

  complete(tokens: OAuthTokens): void {
    this.move("complete");
    this.result = tokens;
  }

  fail(err: unknown): void {
    this.move("failed");
    this.failure = err;
  }

  private assertCanMove(to: OAuthSessionStatus): void {
    if (!NEXT[this.current].includes(to)) {
      throw new InvalidSessionTransitionError(this.current, to);
    }
  }

  private move(to: OAuthSessionStatus): void {
    this.assertCanMove(to);
    this.current = to;
  }
}
