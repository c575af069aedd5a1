/**
 * Auth Client Factory
 */

import { AuthCodeAuthClient } from "./auth-code.js";
import {
  ClientCredentialsPubKeyAuthClient,
  ClientCredentialsSecretAuthClient,
  ClientCredentialsSharedKeyAuthClient,
} from "./client-credentials.js";
import type { AuthClientConfig, AuthClientConfigOf, ClientType } from "./config.js";
import { DeviceCodeAuthClient } from "./device-code.js";
import { LegacyAuthClient } from "./legacy.js";
import { NoOpAuthClient } from "./noop.js";
import type { AuthClientDependencies } from "./oidc-client.js";
import { StaticApiKeyAuthClient } from "./static-api-key.js";
import { withCapabilityDefaults, type AuthClient, type AuthClientImplementation } from "./types.js";

type ConfigMap = { [K in ClientType]: AuthClientConfigOf<K> };

type Factories = {
  readonly [K in ClientType]: (config: ConfigMap[K], deps: AuthClientDependencies) => AuthClientImplementation;
};

const FACTORIES: Factories = {
  oidc_auth_code: (config, deps) => new AuthCodeAuthClient(config, deps),
  oidc_device_code: (config, deps) => new DeviceCodeAuthClient(config, deps),
  oidc_client_credentials_secret: (config, deps) => new ClientCredentialsSecretAuthClient(config, deps),
  oidc_client_credentials_pubkey: (config, deps) => new ClientCredentialsPubKeyAuthClient(config, deps),
  oidc_client_credentials_sharedkey: (config, deps) =>
    new ClientCredentialsSharedKeyAuthClient(config, deps),
  legacy: (config, deps) => new LegacyAuthClient(config, deps),
  static_apikey: (config, deps) => new StaticApiKeyAuthClient(config, deps),
  none: () => new NoOpAuthClient(),
};

function implementationFor<K extends ClientType>(
  clientType: K,
  config: ConfigMap[K],
  deps: AuthClientDependencies
): AuthClientImplementation {
  return FACTORIES[clientType](config, deps);
}

/**
 * Create the auth client for a config. Capabilities the mechanism lacks
 * reject with NotImplementedForMechanismError.
 */
export function createAuthClient(
  config: AuthClientConfig,
  deps: AuthClientDependencies = {}
): AuthClient {
  return withCapabilityDefaults(implementationFor(config.clientType, config, deps));
}
