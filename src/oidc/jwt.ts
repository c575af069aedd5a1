/**
 * JWT encoding helpers.
 *
 * Decoding here never checks a signature. It is for inspecting our own
 * tokens (expiry timing, API key extraction); trust decisions go through
 * TokenValidator.
 */

import { createSign, type KeyObject } from "node:crypto";
import { jwtClaimsSchema, jwtHeaderSchema, type JwtClaims, type JwtHeader } from "./types.js";

export interface DecodedJwt {
  readonly header: JwtHeader;
  readonly claims: JwtClaims;
  /** base64url header and payload, as signed */
  readonly signingInput: string;
  readonly signature: Buffer;
}

/**
 * Split and decode a compact JWS without verifying it.
 *
 * @throws Error if the token is not three base64url JSON segments
 */
export function decodeJwt(token: string): DecodedJwt {
  const parts = token.split(".");
  if (parts.length !== 3) {
    throw new Error("Invalid JWT format: expected 3 parts");
  }

  const [headerB64, payloadB64, signatureB64] = parts;
  if (!headerB64 || !payloadB64 || signatureB64 === undefined) {
    throw new Error("Invalid JWT format: missing parts");
  }

  const header = jwtHeaderSchema.safeParse(decodeJsonPart(headerB64, "header"));
  if (!header.success) {
    throw new Error("Invalid JWT header");
  }

  const claims = jwtClaimsSchema.safeParse(decodeJsonPart(payloadB64, "payload"));
  if (!claims.success) {
    throw new Error(`Invalid JWT payload: ${claims.error.issues[0]?.message ?? "unknown"}`);
  }

  return {
    header: header.data,
    claims: claims.data,
    signingInput: `${headerB64}.${payloadB64}`,
    signature: Buffer.from(signatureB64, "base64url"),
  };
}

/** Claims of a JWT, unverified */
export function decodeJwtClaims(token: string): JwtClaims {
  return decodeJwt(token).claims;
}

/**
 * Sign claims as an RS256 compact JWS.
 */
export function signJwtRs256(
  claims: Readonly<Record<string, unknown>>,
  privateKey: KeyObject,
  keyId?: string
): string {
  const header = keyId ? { alg: "RS256", typ: "JWT", kid: keyId } : { alg: "RS256", typ: "JWT" };
  const signingInput = `${encodeJsonPart(header)}.${encodeJsonPart(claims)}`;
  const signature = createSign("RSA-SHA256").update(signingInput).sign(privateKey);
  return `${signingInput}.${signature.toString("base64url")}`;
}

function decodeJsonPart(part: string, name: string): unknown {
  try {
    return JSON.parse(Buffer.from(part, "base64url").toString("utf-8"));
  } catch {
    throw new Error(`Invalid JWT ${name}: not valid base64url JSON`);
  }
}

function encodeJsonPart(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf-8").toString("base64url");
}
