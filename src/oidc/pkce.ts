/**
 * PKCE and nonce helpers for the authorization-code flow.
 */

import { createHash, randomBytes, randomInt } from "node:crypto";
import { PKCE_VERIFIER_BYTES } from "../shared/constants.js";

export interface PkcePair {
  readonly verifier: string;
  readonly challenge: string;
}

/**
 * Random string of decimal digits, used for `state` and `nonce` values.
 */
export function generateNonce(length: number): string {
  let nonce = "";
  for (let i = 0; i < length; i++) {
    nonce += String(randomInt(10));
  }
  return nonce;
}

/** S256 code challenge for a verifier (RFC 7636 section 4.2) */
export function createChallenge(verifier: string): string {
  return createHash("sha256").update(verifier, "utf8").digest("base64url");
}

export function createVerifier(byteLength = PKCE_VERIFIER_BYTES): string {
  return randomBytes(byteLength).toString("base64url");
}

export function createPkcePair(byteLength = PKCE_VERIFIER_BYTES): PkcePair {
  const verifier = createVerifier(byteLength);
  return { verifier, challenge: createChallenge(verifier) };
}
