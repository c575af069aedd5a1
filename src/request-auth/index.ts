/**
 * Request Authentication Module
 */

export {
  RequestAuthenticator,
  SimpleInMemoryRequestAuthenticator,
} from "./request-authenticator.js";
export type {
  FetchFunction,
  HeaderSource,
  RequestAuthenticatorOptions,
  SimpleInMemoryRequestAuthenticatorOptions,
} from "./request-authenticator.js";
export {
  RefreshingOidcTokenRequestAuthenticator,
  RefreshOrReloginOidcTokenRequestAuthenticator,
  computeRefreshAt,
} from "./oidc-authenticators.js";
export type { RefreshingOidcTokenRequestAuthenticatorOptions } from "./oidc-authenticators.js";
export {
  LegacyApiKeyRequestAuthenticator,
  StaticApiKeyRequestAuthenticator,
  LEGACY_API_KEY_PREFIX,
} from "./api-key-authenticators.js";
