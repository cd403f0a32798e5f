// demos/mock-idp/src/idp.ts
import { createHash, randomBytes, randomUUID } from "crypto";
import { Router, type Request, type Response } from "express";
import bodyParser from "body-parser";
import { EmbeddedJWK, SignJWT, calculateJwkThumbprint, jwtVerify, type JWTPayload } from "jose";
import { z } from "zod";
import { trimTrailingSlashes } from "@tokenrelay/config";
import { describeToken, silentLogger, type Logger } from "@tokenrelay/logging";
import { ACCESS_TOKEN_TYPE, TOKEN_EXCHANGE_GRANT } from "@tokenrelay/token-exchange";
import { lazySigningKey, SIGNING_ALG, type MockSigningKey } from "./keys";


export interface MockIdpOptions {
  /** Absolute issuer URL; routes are served under its path. */
  issuer: string;
  /** `aud` of tokens issued by the authorization-code grant. */
  audience: string;
  clientId: string;
  clientSecret: string;
  /** `sub` of every login. */
  subject?: string;
  /** Granted when the authorization request names no scope. */
  defaultScopes?: string[];
  accessTokenTtlSec?: number;
  /** Challenge token-exchange proofs that lack the current nonce. Default true. */
  requireDpopNonce?: boolean;
  kid?: string;
  logger?: Logger;
  /** Clock for authorization codes and proof replay tracking, in ms. */
  now?: () => number;
}

export interface AccessTokenOptions {
  audience?: string;
  scopes?: string[];
  subject?: string;
  clientId?: string;
  /** Negative values mint an already-expired token. */
  expiresInSec?: number;
  extra?: JWTPayload;
}

export interface MockIdp {
  issuer: string;
  /** Mount at the application root. */
  router: Router;
  signingKey(): Promise<MockSigningKey>;
  signAccessToken(opts?: AccessTokenOptions): Promise<string>;
  /** Nonce the token endpoint currently expects in DPoP proofs. */
  currentNonce(): string;
  /** Authorization codes and proof ids currently held. */
  pendingCounts(): { codes: number; proofIds: number };
}

interface PendingCode {
  clientId: string;
  redirectUri: string;
  codeChallenge: string;
  scopes: string[];
  expiresAt: number;
}

const CODE_TTL_MS = 60_000;
const PROOF_MAX_AGE_MS = 5 * 60_000;

const authorizeQuery = z.object({
  client_id: z.string().min(1),
  response_type: z.literal("code"),
  redirect_uri: z.string().url(),
  scope: z.string().optional(),
  state: z.string().optional(),
  code_challenge: z.string().min(43),
  code_challenge_method: z.literal("S256"),
});

const clientFields = {
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
};

const authorizationCodeForm = z.object({
  grant_type: z.literal("authorization_code"),
  code: z.string().min(1),
  redirect_uri: z.string().min(1),
  code_verifier: z.string().min(43).max(128),
  ...clientFields,
});

const tokenExchangeForm = z.object({
  grant_type: z.literal(TOKEN_EXCHANGE_GRANT),
  subject_token: z.string().min(1),
  subject_token_type: z.literal(ACCESS_TOKEN_TYPE),
  requested_token_type: z.literal(ACCESS_TOKEN_TYPE).optional(),
  scope: z.string().optional(),
  audience: z.string().min(1),
  ...clientFields,
});

const tokenForm = z.discriminatedUnion("grant_type", [authorizationCodeForm, tokenExchangeForm]);

const introspectForm = z.object({
  token: z.string().min(1),
  token_type_hint: z.string().optional(),
});

function oauthError(
  res: Response,
  status: number,
  error: string,
  description: string,
  headers: Record<string, string> = {}
): void {
  for (const [name, value] of Object.entries(headers)) res.setHeader(name, value);
  res.status(status).json({ error, error_description: description });
}

function splitScopes(raw: string | undefined): string[] {
  return (raw ?? "").split(/\s+/).filter(Boolean);
}

function s256(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

function basicCredentials(req: Request): ClientCredentials | undefined {
  const header = req.headers.authorization;
  if (!header || !/^Basic\s+/i.test(header)) return undefined;
  const decoded = Buffer.from(header.replace(/^Basic\s+/i, ""), "base64").toString("utf8");
  const sep = decoded.indexOf(":");
  if (sep < 0) return undefined;
  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, sep)),
      clientSecret: decodeURIComponent(decoded.slice(sep + 1)),
    };
  } catch {
    // Malformed percent-encoding counts as no credentials.
    return undefined;
  }
}

function bodyCredentials(form: { client_id?: string; client_secret?: string }): ClientCredentials | undefined {
  if (!form.client_id || !form.client_secret) return undefined;
  return { clientId: form.client_id, clientSecret: form.client_secret };
}

/**
 * In-process identity provider for local runs and end-to-end tests:
 * JWKS, introspection, an auto-approving authorize endpoint and a token
 * endpoint for the authorization-code and token-exchange grants.
 */
export function createMockIdp(opts: MockIdpOptions): MockIdp {
  const issuer = trimTrailingSlashes(opts.issuer);
  const base = trimTrailingSlashes(new URL(issuer).pathname);
  const tokenEndpoint = `${issuer}/v1/token`;
  const subject = opts.subject ?? "user@example.test";
  const ttlSec = opts.accessTokenTtlSec ?? 3600;
  const requireNonce = opts.requireDpopNonce ?? true;
  const log = (opts.logger ?? silentLogger).child({ component: "mock-idp" });
  const signingKey = lazySigningKey(opts.kid ?? "mock-key-1");

  const clock = opts.now ?? Date.now;
  const codes = new Map<string, PendingCode>();
  // jti -> time after which maxTokenAge rejects the proof anyway
  const seenJti = new Map<string, number>();
  const nonce = randomBytes(16).toString("base64url");

  function prune(): void {
    const now = clock();
    for (const [code, pending] of codes) {
      if (pending.expiresAt < now) codes.delete(code);
    }
    for (const [jti, until] of seenJti) {
      if (until < now) seenJti.delete(jti);
    }
  }

  const clientMatches = (creds: ClientCredentials | undefined): boolean =>
    creds !== undefined && creds.clientId === opts.clientId && creds.clientSecret === opts.clientSecret;

  async function signAccessToken(claims: AccessTokenOptions = {}): Promise<string> {
    const key = await signingKey();
    const now = Math.floor(Date.now() / 1000);
    return new SignJWT({
      ...claims.extra,
      cid: claims.clientId ?? opts.clientId,
      scp: claims.scopes ?? opts.defaultScopes ?? [],
    })
      .setProtectedHeader({ alg: SIGNING_ALG, kid: key.kid, typ: "JWT" })
      .setIssuer(issuer)
      .setAudience(claims.audience ?? opts.audience)
      .setSubject(claims.subject ?? subject)
      .setIssuedAt(now)
      .setExpirationTime(now + (claims.expiresInSec ?? ttlSec))
      .setJti(randomUUID())
      .sign(key.privateKey);
  }

  async function verifyIssued(token: string): Promise<JWTPayload | undefined> {
    const key = await signingKey();
    try {
      const { payload } = await jwtVerify(token, key.publicKey, { issuer, algorithms: [SIGNING_ALG] });
      return payload;
    } catch (err) {
      log.debug("mock_idp.token_rejected", { tokenShape: describeToken(token), err });
      return undefined;
    }
  }

  type ProofCheck =
    | { ok: true; nonce?: string; jkt: string }
    | { ok: false; description: string };

  async function checkProof(proof: string): Promise<ProofCheck> {
    prune();
    try {
      const { payload, protectedHeader } = await jwtVerify(proof, EmbeddedJWK, {
        typ: "dpop+jwt",
        algorithms: ["RS256", "ES256"],
        maxTokenAge: "5m",
        currentDate: new Date(clock()),
      });
      if (!protectedHeader.jwk) return { ok: false, description: "proof has no jwk" };
      if (payload.htm !== "POST") return { ok: false, description: "htm mismatch" };
      if (payload.htu !== tokenEndpoint) return { ok: false, description: "htu mismatch" };
      if (typeof payload.jti !== "string" || seenJti.has(payload.jti)) {
        return { ok: false, description: "jti missing or replayed" };
      }
      seenJti.set(payload.jti, clock() + PROOF_MAX_AGE_MS);
      return {
        ok: true,
        nonce: typeof payload.nonce === "string" ? payload.nonce : undefined,
        jkt: await calculateJwkThumbprint(protectedHeader.jwk),
      };
    } catch (err) {
      return { ok: false, description: err instanceof Error ? err.message : "invalid proof" };
    }
  }

  async function authorizationCodeGrant(
    req: Request,
    res: Response,
    form: z.infer<typeof authorizationCodeForm>
  ): Promise<void> {
    const creds = basicCredentials(req) ?? bodyCredentials(form);
    if (!clientMatches(creds)) {
      oauthError(res, 401, "invalid_client", "client authentication failed");
      return;
    }

    const pending = codes.get(form.code);
    codes.delete(form.code);
    if (!pending || pending.expiresAt < clock() || pending.clientId !== opts.clientId) {
      oauthError(res, 400, "invalid_grant", "authorization code is invalid or expired");
      return;
    }
    if (pending.redirectUri !== form.redirect_uri) {
      oauthError(res, 400, "invalid_grant", "redirect_uri does not match the authorization request");
      return;
    }
    if (s256(form.code_verifier) !== pending.codeChallenge) {
      oauthError(res, 400, "invalid_grant", "PKCE verification failed");
      return;
    }

    const accessToken = await signAccessToken({ scopes: pending.scopes });
    log.info("mock_idp.token_issued", { grant: "authorization_code", scopes: pending.scopes });
    res.json({
      access_token: accessToken,
      token_type: "Bearer",
      expires_in: ttlSec,
      scope: pending.scopes.join(" "),
    });
  }

  async function tokenExchangeGrant(
    req: Request,
    res: Response,
    form: z.infer<typeof tokenExchangeForm>
  ): Promise<void> {
    if (!clientMatches(basicCredentials(req))) {
      oauthError(res, 401, "invalid_client", "client authentication failed");
      return;
    }

    const proof = req.get("DPoP");
    if (!proof) {
      oauthError(res, 400, "invalid_dpop_proof", "DPoP proof is required");
      return;
    }
    const check = await checkProof(proof);
    if (!check.ok) {
      oauthError(res, 400, "invalid_dpop_proof", check.description);
      return;
    }
    if (requireNonce && check.nonce !== nonce) {
      log.info("mock_idp.dpop_nonce_challenge", { hadNonce: check.nonce !== undefined });
      oauthError(res, 400, "use_dpop_nonce", "Authorization server requires nonce in DPoP proof", {
        "DPoP-Nonce": nonce,
      });
      return;
    }

    const subjectClaims = await verifyIssued(form.subject_token);
    if (!subjectClaims) {
      oauthError(res, 400, "invalid_grant", "subject token is not active");
      return;
    }

    const scopes = splitScopes(form.scope);
    const accessToken = await signAccessToken({
      audience: form.audience,
      scopes,
      subject: subjectClaims.sub,
      extra: { cnf: { jkt: check.jkt } },
    });
    log.info("mock_idp.token_issued", { grant: "token_exchange", audience: form.audience, scopes });
    res.json({
      access_token: accessToken,
      issued_token_type: ACCESS_TOKEN_TYPE,
      token_type: "DPoP",
      expires_in: ttlSec,
      scope: scopes.join(" "),
    });
  }

  const router = Router();
  const form = bodyParser.urlencoded({ extended: false });

  router.get(`${base}/v1/keys`, async (_req, res, next) => {
    try {
      const key = await signingKey();
      res.json({ keys: [key.jwk] });
    } catch (err) {
      next(err);
    }
  });

  router.get(`${base}/v1/authorize`, (req, res) => {
    const parsed = authorizeQuery.safeParse(req.query);
    if (!parsed.success) {
      oauthError(res, 400, "invalid_request", parsed.error.issues.map((i) => i.path.join(".")).join(", "));
      return;
    }
    const q = parsed.data;
    if (q.client_id !== opts.clientId) {
      oauthError(res, 400, "invalid_client", "unknown client_id");
      return;
    }

    prune();
    const code = randomBytes(16).toString("base64url");
    const scopes = q.scope ? splitScopes(q.scope) : opts.defaultScopes ?? [];
    codes.set(code, {
      clientId: q.client_id,
      redirectUri: q.redirect_uri,
      codeChallenge: q.code_challenge,
      scopes,
      expiresAt: clock() + CODE_TTL_MS,
    });

    const target = new URL(q.redirect_uri);
    target.searchParams.set("code", code);
    if (q.state !== undefined) target.searchParams.set("state", q.state);
    log.info("mock_idp.authorized", { scopes });
    res.redirect(302, target.toString());
  });

  router.post(`${base}/v1/token`, form, async (req, res, next) => {
    const grant = z.object({ grant_type: z.string() }).safeParse(req.body);
    if (!grant.success) {
      oauthError(res, 400, "invalid_request", "grant_type is required");
      return;
    }

    const parsed = tokenForm.safeParse(req.body);
    if (!parsed.success) {
      const known = grant.data.grant_type === "authorization_code" || grant.data.grant_type === TOKEN_EXCHANGE_GRANT;
      oauthError(
        res,
        400,
        known ? "invalid_request" : "unsupported_grant_type",
        known ? "missing or malformed parameters" : `unsupported grant_type ${grant.data.grant_type}`
      );
      return;
    }

    try {
      if (parsed.data.grant_type === "authorization_code") {
        await authorizationCodeGrant(req, res, parsed.data);
      } else {
        await tokenExchangeGrant(req, res, parsed.data);
      }
    } catch (err) {
      next(err);
    }
  });

  router.post(`${base}/v1/introspect`, form, async (req, res, next) => {
    if (!clientMatches(basicCredentials(req))) {
      oauthError(res, 401, "invalid_client", "client authentication failed");
      return;
    }
    const parsed = introspectForm.safeParse(req.body);
    if (!parsed.success) {
      oauthError(res, 400, "invalid_request", "token is required");
      return;
    }

    try {
      const claims = await verifyIssued(parsed.data.token);
      if (!claims) {
        res.json({ active: false });
        return;
      }
      const scp = Array.isArray(claims.scp) ? claims.scp.filter((s): s is string => typeof s === "string") : [];
      res.json({
        active: true,
        scope: scp.join(" "),
        client_id: claims.cid,
        username: claims.sub,
        sub: claims.sub,
        aud: claims.aud,
        iss: claims.iss,
        exp: claims.exp,
        iat: claims.iat,
        token_type: "Bearer",
      });
    } catch (err) {
      next(err);
    }
  });

  return {
    issuer,
    router,
    signingKey,
    signAccessToken,
    currentNonce: () => nonce,
    pendingCounts: () => ({ codes: codes.size, proofIds: seenJti.size }),
  };
}

