/**
 * OIDC Client Authentication
 *
 * Token, introspection and revocation endpoints may require the client to
 * authenticate, and how depends on how the provider registered the client.
 * Each helper here builds a ClientAuthEnricher for one method; choosing the
 * right one is up to the auth client.
 */

import { randomUUID, createPrivateKey, type KeyObject } from "node:crypto";
import { readFileSync } from "node:fs";
import { CLIENT_ASSERTION_TTL_SEC } from "../shared/constants.js";
import { ConfigurationError } from "../shared/errors.js";
import type { ClientAuthEnricher } from "./api-client.js";
import { signJwtRs256 } from "./jwt.js";

export const JWT_BEARER_ASSERTION_TYPE = "urn:ietf:params:oauth:client-assertion-type:jwt-bearer";

/** HTTP Basic credentials header value */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

/** Public client: identify by `client_id` in the payload */
export function noAuthEnricher(clientId: string): ClientAuthEnricher {
  return (payload) => ({ payload: { ...payload, client_id: clientId }, headers: {} });
}

/** Confidential client, `client_secret_basic` */
export function clientSecretBasicEnricher(clientId: string, clientSecret: string): ClientAuthEnricher {
  return (payload) => ({
    payload,
    headers: { Authorization: basicAuthHeader(clientId, clientSecret) },
  });
}

/** Confidential client, `client_secret_post` */
export function clientSecretPostEnricher(clientId: string, clientSecret: string): ClientAuthEnricher {
  return (payload) => ({
    payload: { ...payload, client_id: clientId, client_secret: clientSecret },
    headers: {},
  });
}

/**
 * Claims of a client authentication assertion (RFC 7523 section 3).
 */
export function clientAssertionClaims(
  audience: string,
  clientId: string,
  ttlSec: number,
  nowSec = Math.floor(Date.now() / 1000)
): Record<string, string | number> {
  return {
    iss: clientId,
    sub: clientId,
    aud: audience,
    iat: nowSec,
    nbf: nowSec,
    exp: nowSec + ttlSec,
    jti: randomUUID(),
  };
}

/**
 * Confidential client, `private_key_jwt`. A fresh RS256 assertion is signed
 * for every request, addressed to the endpoint being called.
 *
 * @param privateKey - Key itself, or a loader called on first use
 */
export function privateKeyJwtEnricher(
  clientId: string,
  privateKey: KeyObject | (() => KeyObject),
  ttlSec = CLIENT_ASSERTION_TTL_SEC
): ClientAuthEnricher {
  return (payload, audience) => {
    const key = typeof privateKey === "function" ? privateKey() : privateKey;
    return {
      payload: {
        ...payload,
        client_assertion_type: JWT_BEARER_ASSERTION_TYPE,
        client_assertion: signJwtRs256(clientAssertionClaims(audience, clientId, ttlSec), key),
      },
      headers: {},
    };
  };
}

export interface PrivateKeySource {
  /** PEM text */
  readonly pem?: string;
  /** Path to a PEM file, used when no inline PEM is given */
  readonly pemFile?: string;
  /** Passphrase of an encrypted key */
  readonly password?: string;
}

/**
 * Load a PEM private key from inline text or a file.
 *
 * @throws ConfigurationError when no key is configured or it cannot be read
 */
export function loadPrivateKey(source: PrivateKeySource): KeyObject {
  let pem = source.pem;
  let origin = "configuration";

  if (!pem) {
    if (!source.pemFile) {
      throw new ConfigurationError(
        "Private key must be configured for public key auth client credentials flow."
      );
    }
    origin = `file "${source.pemFile}"`;
    try {
      pem = readFileSync(source.pemFile, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read private key from ${origin}`,
        { pemFile: source.pemFile },
        { cause: error }
      );
    }
  }

  try {
    return createPrivateKey({ key: pem, format: "pem", passphrase: source.password });
  } catch (error) {
    throw new ConfigurationError(`Unable to load private key from ${origin}`, undefined, {
      cause: error,
    });
  }
}
