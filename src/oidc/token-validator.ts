/**
 * Token Validator
 *
 * Validates signed JWTs (access and ID tokens) against the authorization
 * server's published keys.
 *
 * Keys rarely change; a new key is normally published well before the old
 * one leaves circulation. Key fetches on unknown key ids are throttled so
 * that tokens carrying bogus key ids cannot drive unbounded traffic to the
 * JWKS endpoint.
 */

import { createPublicKey, createVerify, type KeyObject } from "node:crypto";
import { getConfig } from "../config/index.js";
import {
  NonceMismatchError,
  TokenValidationError,
  UnknownSigningKeyError,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { decodeJwt } from "./jwt.js";
import {
  DEFAULT_ALLOWED_ALGORITHMS,
  type JsonWebKey,
  type JwtClaims,
  type SigningAlgorithm,
} from "./types.js";

const logger = createLogger("TokenValidator");

/** Source of the current key set */
export interface JwksSource {
  jwksKeys(): Promise<readonly JsonWebKey[]>;
}

export interface TokenValidatorOptions {
  /** Minimum time between key set fetches (default: configured interval) */
  readonly minFetchIntervalMs?: number;
  /** Accepted signing algorithms (default: RS256, RS512) */
  readonly allowedAlgorithms?: readonly SigningAlgorithm[];
  /** Leeway for exp/nbf checks, in seconds (default: 0) */
  readonly clockToleranceSec?: number;
}

export interface ValidateOptions {
  readonly issuer: string;
  /** Expected audience; with several, any one matching is enough */
  readonly audience: string | readonly string[];
  /** Claims that must be present beyond aud, exp and iss */
  readonly requiredClaims?: readonly string[];
  /** When given, the token must carry this nonce */
  readonly nonce?: string;
}

export interface ValidateIdTokenOptions {
  readonly issuer: string;
  readonly clientId: string;
  readonly requiredClaims?: readonly string[];
  readonly nonce?: string;
}

const NODE_ALGORITHMS: Record<SigningAlgorithm, string> = {
  RS256: "RSA-SHA256",
  RS384: "RSA-SHA384",
  RS512: "RSA-SHA512",
};

export class TokenValidator {
  private readonly jwks: JwksSource;
  private readonly minFetchIntervalMs: number;
  private readonly allowedAlgorithms: readonly SigningAlgorithm[];
  private readonly clockToleranceSec: number;
  private keysById = new Map<string, KeyObject>();
  private loadTime = 0;

  constructor(jwks: JwksSource, options: TokenValidatorOptions = {}) {
    this.jwks = jwks;
    this.minFetchIntervalMs = options.minFetchIntervalMs ?? getConfig().jwksMinFetchIntervalMs;
    this.allowedAlgorithms = options.allowedAlgorithms ?? DEFAULT_ALLOWED_ALGORITHMS;
    this.clockToleranceSec = options.clockToleranceSec ?? 0;
  }

  /**
   * Look up a verification key. A miss refetches the whole key set, but
   * only once the minimum fetch interval has passed since the last fetch.
   *
   * @throws UnknownSigningKeyError
   */
  async getSigningKey(keyId: string | undefined): Promise<KeyObject> {
    let key = keyId === undefined ? undefined : this.keysById.get(keyId);

    if (!key && Date.now() - this.loadTime >= this.minFetchIntervalMs) {
      await this.update();
      key = keyId === undefined ? undefined : this.keysById.get(keyId);
    }

    if (!key) {
      throw new UnknownSigningKeyError(keyId);
    }
    return key;
  }

  /**
   * Validate a token's signature and claims.
   *
   * @returns The verified claims
   * @throws TokenValidationError for any failure; the reason is its `cause`
   */
  async validate(token: string, options: ValidateOptions): Promise<JwtClaims> {
    try {
      return await this.validateOrThrow(token, options);
    } catch (error) {
      throw wrapValidationError(error);
    }
  }

  /**
   * Validate an OIDC ID token: the client must be an audience, and with
   * several audiences the `azp` claim must name the client.
   *
   * @throws TokenValidationError
   */
  async validateIdToken(token: string, options: ValidateIdTokenOptions): Promise<JwtClaims> {
    const claims = await this.validate(token, {
      issuer: options.issuer,
      audience: options.clientId,
      requiredClaims: options.requiredClaims,
      nonce: options.nonce,
    });

    if (Array.isArray(claims.aud) && claims.aud.length > 1 && !claims.azp) {
      throw new TokenValidationError(
        '"azp" claim must be present when ID token contains multiple audiences.'
      );
    }

    if (claims.azp !== undefined && claims.azp !== options.clientId) {
      throw new TokenValidationError(
        `ID token "azp" claim expected to match the client ID "${options.clientId}", but was "${claims.azp}"`
      );
    }

    return claims;
  }

  private async validateOrThrow(token: string, options: ValidateOptions): Promise<JwtClaims> {
    const decoded = decodeJwt(token);

    // Never trust the token's own choice of algorithm
    const algorithm = this.trustedAlgorithm(decoded.header.alg);
    const key = await this.getSigningKey(decoded.header.kid);

    const verifier = createVerify(NODE_ALGORITHMS[algorithm]);
    verifier.update(decoded.signingInput);
    if (!verifier.verify(key, decoded.signature)) {
      throw new Error("Signature verification failed");
    }

    const claims = decoded.claims;
    const required = ["aud", "exp", "iss", ...(options.requiredClaims ?? [])];
    if (options.nonce !== undefined) {
      required.push("nonce");
    }
    for (const claim of required) {
      if (claims[claim] === undefined) {
        throw new Error(`Token is missing the "${claim}" claim`);
      }
    }

    if (claims.iss !== options.issuer) {
      throw new Error(`Invalid issuer: expected ${options.issuer}, got ${claims.iss ?? "(none)"}`);
    }

    const expected = typeof options.audience === "string" ? [options.audience] : options.audience;
    const actual = typeof claims.aud === "string" ? [claims.aud] : (claims.aud ?? []);
    if (!expected.some((aud) => actual.includes(aud))) {
      throw new Error(`Invalid audience: expected ${expected.join(" or ")}`);
    }

    const now = Math.floor(Date.now() / 1000);
    if (claims.exp === undefined || claims.exp <= now - this.clockToleranceSec) {
      throw new Error("Token has expired");
    }
    if (claims.nbf !== undefined && claims.nbf > now + this.clockToleranceSec) {
      throw new Error("Token is not yet valid");
    }

    if (options.nonce !== undefined && claims.nonce !== options.nonce) {
      throw new NonceMismatchError();
    }

    return claims;
  }

  private trustedAlgorithm(alg: string | undefined): SigningAlgorithm {
    const normalized = alg?.toUpperCase();
    const match = this.allowedAlgorithms.find((allowed) => allowed === normalized);
    if (!match) {
      throw new Error(`Unknown or unsupported token algorithm ${alg ?? "(none)"}`);
    }
    return match;
  }

  /** Replace the entire key set */
  private async update(): Promise<void> {
    const keys = await this.jwks.jwksKeys();
    const next = new Map<string, KeyObject>();

    for (const jwk of keys) {
      if (jwk.kid === undefined) {
        continue;
      }
      if (jwk.kty !== "RSA" || !jwk.n || !jwk.e) {
        logger.debug("Skipping non-RSA key", { kid: jwk.kid, kty: jwk.kty });
        continue;
      }
      try {
        next.set(jwk.kid, createPublicKey({ key: { kty: "RSA", n: jwk.n, e: jwk.e }, format: "jwk" }));
      } catch (error) {
        logger.warn("Ignoring unusable JWKS key", { kid: jwk.kid, error: String(error) });
      }
    }

    this.keysById = next;
    this.loadTime = Date.now();
    logger.info("JWKS cache refreshed", { keyCount: next.size });
  }
}

function wrapValidationError(error: unknown): TokenValidationError {
  if (error instanceof TokenValidationError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TokenValidationError(`Token validation failed: ${reason}`, { cause: error });
}
