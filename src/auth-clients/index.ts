/**
 * Auth Clients Module
 */

export { createAuthClient } from "./factory.js";
export { withCapabilityDefaults } from "./types.js";
export type {
  AuthClient,
  AuthClientImplementation,
  DeviceLoginCompleteOptions,
  DeviceLoginInitiation,
  LoginOptions,
  OidcTokenSource,
} from "./types.js";
export {
  DEFAULT_API_AUDIENCE,
  DEFAULT_AUTH_SERVER,
  DEFAULT_CLIENT_ID,
  DEFAULT_LEGACY_AUTH_ENDPOINT,
  defaultAuthClientConfig,
  isOidcClientConfig,
  legacyAuthClientConfig,
  loadAuthClientConfig,
  noopAuthClientConfig,
  parseAuthClientConfig,
} from "./config.js";
export type {
  AuthClientConfig,
  AuthClientConfigOf,
  AuthCodeClientConfig,
  ClientCredentialsPubKeyConfig,
  ClientCredentialsSecretConfig,
  ClientCredentialsSharedKeyConfig,
  ClientType,
  DeviceCodeClientConfig,
  LegacyClientConfig,
  NoOpClientConfig,
  OidcClientConfig,
  OidcClientConfigBase,
  StaticApiKeyClientConfig,
} from "./config.js";
export { OidcAuthClient } from "./oidc-client.js";
export type { AuthClientDependencies } from "./oidc-client.js";
export { AuthCodeAuthClient } from "./auth-code.js";
export type { PendingAuthCodeLogin } from "./auth-code.js";
export { DeviceCodeAuthClient } from "./device-code.js";
export type { DeviceCodePollingOptions } from "./device-code.js";
export {
  ClientCredentialsPubKeyAuthClient,
  ClientCredentialsSecretAuthClient,
  ClientCredentialsSharedKeyAuthClient,
} from "./client-credentials.js";
export { LegacyAuthClient } from "./legacy.js";
export { StaticApiKeyAuthClient } from "./static-api-key.js";
export { NoOpAuthClient } from "./noop.js";
