// demos/mock-idp/src/server.ts
import type { Server } from "http";
import express, { type RequestHandler } from "express";
import { createMockIdp, type MockIdp, type MockIdpOptions } from "./idp";

export interface StartMockIdpOptions extends Omit<MockIdpOptions, "issuer"> {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  /** Issuer path, e.g. "/oauth2/default". */
  path?: string;
  /** Runs before the identity provider's routes, e.g. request logging. */
  before?: RequestHandler[];
}

export interface RunningMockIdp {
  idp: MockIdp;
  issuer: string;
  port: number;
  close(): Promise<void>;
}

/**
 * Listen on a loopback port and serve a mock identity provider whose issuer
 * is derived from the bound address.
 */
export async function startMockIdp(opts: StartMockIdpOptions): Promise<RunningMockIdp> {
  const { host = "127.0.0.1", port = 0, path = "/oauth2/default", before = [], ...idpOptions } = opts;

  const app = express();
  app.disable("x-powered-by");
  for (const handler of before) app.use(handler);

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(port, host, () => resolve(s));
    s.once("error", reject);
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address ? address.port : port;
  const issuer = `http://${host}:${boundPort}${path}`;

  const idp = createMockIdp({ ...idpOptions, issuer });
  app.use(idp.router);

  let closing: Promise<void> | undefined;

  return {
    idp,
    issuer,
    port: boundPort,
    close(): Promise<void> {
      if (!closing) {
        closing = new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
          server.closeAllConnections();
        });
      }
      return closing;
    },
  };
}
