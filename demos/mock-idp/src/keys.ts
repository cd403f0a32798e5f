// demos/mock-idp/src/keys.ts
import { exportJWK, generateKeyPair, type JWK, type KeyLike } from "jose";

export const SIGNING_ALG = "RS256";

export interface MockSigningKey {
  kid: string;
  privateKey: KeyLike;
  publicKey: KeyLike;
  jwk: JWK;
}

/**
 * Ephemeral RS256 key pair, generated on first use and kept for the life of
 * the returned getter (dev only).
 */
export function lazySigningKey(kid: string): () => Promise<MockSigningKey> {
  let pending: Promise<MockSigningKey> | null = null;

  const create = async (): Promise<MockSigningKey> => {
    const { publicKey, privateKey } = await generateKeyPair(SIGNING_ALG, { extractable: true });
    const jwk = await exportJWK(publicKey);
    jwk.alg = SIGNING_ALG;
    jwk.use = "sig";
    jwk.kid = kid;
    return { kid, privateKey, publicKey, jwk };
  };

  return () => {
    if (!pending) pending = create();
    return pending;
  };
}
