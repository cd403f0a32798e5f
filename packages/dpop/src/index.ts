// packages/dpop/src/index.ts
import { randomUUID } from "crypto";
import {
  SignJWT,
  decodeJwt,
  decodeProtectedHeader,
  exportJWK,
  generateKeyPair,
  type JWK,
  type JWTPayload,
  type KeyLike,
  type ProtectedHeaderParameters,
} from "jose";

export type DPoPAlgorithm = "RS256" | "ES256";

/**
 * Ephemeral proof-of-possession key. Lives for one token-exchange call.
 */
export interface DPoPKeyPair {
  alg: DPoPAlgorithm;
  privateKey: KeyLike;
  /** Public members only: kty/n/e for RSA, kty/crv/x/y for EC. */
  publicJwk: JWK;
}

export interface DPoPProofClaims extends JWTPayload {
  jti: string;
  htm: string;
  htu: string;
  iat: number;
  nonce?: string;
}

export interface CreateProofOptions {
  method: string;
  url: string;
  key: DPoPKeyPair;
  /** Server-issued value from a `DPoP-Nonce` header. */
  nonce?: string;
  now?: Date;
  jti?: string;
}

function publicMembers(jwk: JWK): JWK {
  if (jwk.kty === "RSA") return { kty: jwk.kty, n: jwk.n, e: jwk.e };
  if (jwk.kty === "EC") return { kty: jwk.kty, crv: jwk.crv, x: jwk.x, y: jwk.y };
  throw new Error(`unsupported DPoP key type: ${jwk.kty ?? "unknown"}`);
}

export async function generateDPoPKeyPair(alg: DPoPAlgorithm = "RS256"): Promise<DPoPKeyPair> {
  const { privateKey, publicKey } = await generateKeyPair(alg);
  const publicJwk = publicMembers(await exportJWK(publicKey));
  return { alg, privateKey, publicJwk };
}

/**
 * `htu` per RFC 9449 §4.2: the target URI without query and fragment.
 */
export function htuFor(url: string): string {
  const u = new URL(url);
  u.search = "";
  u.hash = "";
  return u.toString();
}

/**
 * Signs a fresh DPoP proof (RFC 9449) for one HTTP request.
 */
export async function createProof(opts: CreateProofOptions): Promise<string> {
  const claims: DPoPProofClaims = {
    jti: opts.jti ?? randomUUID(),
    htm: opts.method.toUpperCase(),
    htu: htuFor(opts.url),
    iat: Math.floor((opts.now ?? new Date()).getTime() / 1000),
  };
  if (opts.nonce) claims.nonce = opts.nonce;

  return new SignJWT(claims)
    .setProtectedHeader({ typ: "dpop+jwt", alg: opts.key.alg, jwk: opts.key.publicJwk })
    .sign(opts.key.privateKey);
}

export interface DecodedProof {
  header: ProtectedHeaderParameters;
  payload: JWTPayload;
}

/**
 * Header and claims of a proof, without verifying the signature.
 */
export function decodeProof(proof: string): DecodedProof {
  return { header: decodeProtectedHeader(proof), payload: decodeJwt(proof) };
}
