// packages/oauth-client/src/callbackListener.ts
import express from "express";
import type { Server } from "http";
import { silentLogger, type Logger } from "@tokenrelay/logging";
import { CallbackCancelledError, CallbackTimeoutError } from "./errors";
import type { CallbackParams } from "./session";

export const DEFAULT_CALLBACK_TIMEOUT_MS = 300_000;

const SUCCESS_PAGE = `<!doctype html>
<html>
  <body>
    <h1>Authorization Successful!</h1>
    <p>You can close this window and return to the application.</p>
    <script>setTimeout(() => window.close(), 2000);</script>
  </body>
</html>`;

export interface CallbackListenerOptions {
  host: string;
  /** 0 picks a free port. */
  port: number;
  path: string;
  logger?: Logger;
}

export interface CallbackListener {
  readonly port: number;
  /** Redirect URI served by this listener. */
  readonly redirectUri: string;
  /** Resolves with the first callback carrying a code. */
  waitForCallback(timeoutMs?: number): Promise<CallbackParams>;
  /** Idempotent. */
  close(): Promise<void>;
}

interface Waiter {
  resolve(params: CallbackParams): void;
  reject(err: Error): void;
  timer: NodeJS.Timeout;
}

function queryValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Loopback HTTP listener for the authorization redirect.
 */
export async function startCallbackListener(opts: CallbackListenerOptions): Promise<CallbackListener> {
  const log = opts.logger ?? silentLogger;
  const waiters = new Set<Waiter>();
  let received: CallbackParams | undefined;

  const app = express();
  app.disable("x-powered-by");

  app.get(opts.path, (req, res) => {
    const code = queryValue(req.query.code);
    const state = queryValue(req.query.state);

    if (!code) {
      log.warn("oauth.callback_without_code", {
        error: queryValue(req.query.error),
        description: queryValue(req.query.error_description),
      });
      res.status(400).type("text/plain").send("Missing authorization code");
      return;
    }

    if (received) {
      res.status(409).type("text/plain").send("Authorization already received");
      return;
    }

    received = { code, state };
    log.info("oauth.callback_received", { hasState: state !== undefined });
    res.status(200).type("html").send(SUCCESS_PAGE);

    for (const w of waiters) {
      clearTimeout(w.timer);
      w.resolve(received);
    }
    waiters.clear();
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(opts.port, opts.host, () => resolve(s));
    s.once("error", reject);
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : opts.port;
  const redirectUri = `http://${opts.host}:${port}${opts.path}`;
  log.debug("oauth.callback_listening", { redirectUri });

  let closing: Promise<void> | undefined;

  return {
    port,
    redirectUri,

    waitForCallback(timeoutMs = DEFAULT_CALLBACK_TIMEOUT_MS): Promise<CallbackParams> {
      if (received) return Promise.resolve(received);
      if (closing) return Promise.reject(new CallbackCancelledError("Callback listener is closed"));

      return new Promise<CallbackParams>((resolve, reject) => {
        const waiter: Waiter = {
          resolve,
          reject,
          timer: setTimeout(() => {
            waiters.delete(waiter);
            reject(new CallbackTimeoutError(`Timeout waiting for OAuth callback after ${timeoutMs}ms`));
          }, timeoutMs),
        };
        waiters.add(waiter);
      });
    },

    close(): Promise<void> {
      if (!closing) {
        for (const w of waiters) {
          clearTimeout(w.timer);
          w.reject(new CallbackCancelledError("Callback listener closed before a code arrived"));
        }
        waiters.clear();

        closing = new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
          server.closeAllConnections();
        });
      }
      return closing;
    },
  };
}
