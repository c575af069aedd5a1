/**
 * OIDC Protocol Module
 */

export { OidcApiClient, parseMediaType } from "./api-client.js";
export type {
  AuthenticatedRequest,
  ClientAuthEnricher,
  FormPayload,
  OidcApiClientOptions,
} from "./api-client.js";
export { DiscoveryApiClient, discoveryUrl } from "./discovery-api.js";
export { JwksApiClient } from "./jwks-api.js";
export { TokenApiClient, DEVICE_CODE_GRANT_TYPE } from "./token-api.js";
export { IntrospectionApiClient } from "./introspection-api.js";
export { RevocationApiClient } from "./revocation-api.js";
export { DeviceAuthorizationApiClient } from "./device-authorization-api.js";
export { buildAuthorizationRequest, parseAuthorizationCallback } from "./authorization-api.js";
export type { AuthorizationRequest, AuthorizationRequestParams } from "./authorization-api.js";
export { awaitAuthorizationCallback, loopbackAddressOf } from "./callback-listener.js";
export type { CallbackListenerOptions, LoopbackAddress } from "./callback-listener.js";
export { ConsolePrompter, SystemBrowserOpener } from "./browser.js";
export type { BrowserOpener, UserPrompter } from "./browser.js";
export {
  JWT_BEARER_ASSERTION_TYPE,
  basicAuthHeader,
  clientAssertionClaims,
  clientSecretBasicEnricher,
  clientSecretPostEnricher,
  loadPrivateKey,
  noAuthEnricher,
  privateKeyJwtEnricher,
} from "./client-auth.js";
export type { PrivateKeySource } from "./client-auth.js";
export { createChallenge, createPkcePair, createVerifier, generateNonce } from "./pkce.js";
export type { PkcePair } from "./pkce.js";
export { decodeJwt, decodeJwtClaims, signJwtRs256 } from "./jwt.js";
export type { DecodedJwt } from "./jwt.js";
export { TokenValidator } from "./token-validator.js";
export type {
  JwksSource,
  TokenValidatorOptions,
  ValidateIdTokenOptions,
  ValidateOptions,
} from "./token-validator.js";
export { DEFAULT_ALLOWED_ALGORITHMS } from "./types.js";
export type {
  DeviceAuthorizationResponse,
  DiscoveryDocument,
  IntrospectionResponse,
  JsonWebKey,
  JwtClaims,
  JwtHeader,
  SigningAlgorithm,
  TokenResponse,
  TokenTypeHint,
} from "./types.js";
