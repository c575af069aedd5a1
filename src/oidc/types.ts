/**
 * OIDC Type Definitions
 *
 * Wire formats consumed from the authorization server, with zod schemas
 * for the payloads that are validated on receipt.
 */

import { z } from "zod";

/**
 * Signing algorithms a token validator may be configured to accept.
 * Symmetric and "none" algorithms are deliberately absent.
 */
export type SigningAlgorithm = "RS256" | "RS384" | "RS512";

/** Default allow-list for token validation */
export const DEFAULT_ALLOWED_ALGORITHMS: readonly SigningAlgorithm[] = ["RS256", "RS512"];

/**
 * JWT header, as read before the signature is checked.
 */
export const jwtHeaderSchema = z
  .object({
    alg: z.string().optional(),
    kid: z.string().optional(),
    typ: z.string().optional(),
  })
  .passthrough();

export type JwtHeader = z.infer<typeof jwtHeaderSchema>;

/**
 * JWT claims. Registered claims are typed when present; everything else
 * passes through untouched.
 */
export const jwtClaimsSchema = z
  .object({
    iss: z.string().optional(),
    sub: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
    nbf: z.number().optional(),
    jti: z.string().optional(),
    nonce: z.string().optional(),
    azp: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type JwtClaims = z.infer<typeof jwtClaimsSchema>;

/**
 * JSON Web Key (RFC 7517). Only the members used for RSA verification are
 * typed.
 */
export const jsonWebKeySchema = z
  .object({
    kty: z.string(),
    kid: z.string().optional(),
    use: z.string().optional(),
    alg: z.string().optional(),
    n: z.string().optional(),
    e: z.string().optional(),
  })
  .passthrough();

export type JsonWebKey = z.infer<typeof jsonWebKeySchema>;

export const jwksResponseSchema = z.object({
  keys: z.array(jsonWebKeySchema),
});

/**
 * OpenID Provider metadata (OpenID Connect Discovery 1.0, section 3).
 */
export const discoveryDocumentSchema = z
  .object({
    issuer: z.string(),
    authorization_endpoint: z.string(),
    token_endpoint: z.string(),
    jwks_uri: z.string(),
    introspection_endpoint: z.string().optional(),
    revocation_endpoint: z.string().optional(),
    device_authorization_endpoint: z.string().optional(),
    scopes_supported: z.array(z.string()).optional(),
  })
  .passthrough();

export type DiscoveryDocument = z.infer<typeof discoveryDocumentSchema>;

/**
 * Successful token endpoint response (RFC 6749 section 5.1).
 * `expires_in` is required: the refresh schedule depends on it.
 */
export const tokenResponseSchema = z
  .object({
    token_type: z.string().optional(),
    expires_in: z.number().positive(),
    access_token: z.string().min(1).optional(),
    scope: z.string().optional(),
    refresh_token: z.string().min(1).optional(),
    id_token: z.string().min(1).optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Device authorization response (RFC 8628 section 3.2).
 */
export const deviceAuthorizationResponseSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_uri: z.string().min(1),
    verification_uri_complete: z.string().optional(),
    expires_in: z.number().positive(),
    interval: z.number().nonnegative().optional(),
  })
  .passthrough();

export type DeviceAuthorizationResponse = z.infer<typeof deviceAuthorizationResponseSchema>;

/**
 * Introspection response (RFC 7662 section 2.2). Only `active` is
 * guaranteed; the rest is server specific.
 */
export const introspectionResponseSchema = z
  .object({
    active: z.boolean(),
  })
  .passthrough();

export type IntrospectionResponse = z.infer<typeof introspectionResponseSchema>;

/** Hint sent with introspection and revocation requests */
export type TokenTypeHint = "access_token" | "id_token" | "refresh_token";
