/**
 * Auth Client Configuration
 *
 * One tagged union covers every auth mechanism. Config files use the
 * snake_case keys below; in code the same values are camelCase and
 * read-only. Builders return a fresh value on every call.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError } from "../shared/errors.js";

export type ClientType =
  | "oidc_auth_code"
  | "oidc_device_code"
  | "oidc_client_credentials_secret"
  | "oidc_client_credentials_pubkey"
  | "oidc_client_credentials_sharedkey"
  | "legacy"
  | "static_apikey"
  | "none";

/** Settings shared by every OIDC mechanism */
export interface OidcClientConfigBase {
  readonly authServer: string;
  readonly clientId: string;
  readonly defaultRequestScopes: readonly string[];
  readonly defaultRequestAudiences: readonly string[];
  /** Explicit settings win over discovery */
  readonly issuer?: string;
  readonly authorizationEndpoint?: string;
  readonly tokenEndpoint?: string;
  readonly jwksEndpoint?: string;
  readonly introspectionEndpoint?: string;
  readonly revocationEndpoint?: string;
  readonly deviceAuthorizationEndpoint?: string;
}

export interface AuthCodeClientConfig extends OidcClientConfigBase {
  readonly clientType: "oidc_auth_code";
  /** Redirect URI registered for headless (copy and paste) logins */
  readonly redirectUri: string;
  /** Loopback redirect URI the local listener serves */
  readonly localRedirectUri: string;
}

export interface DeviceCodeClientConfig extends OidcClientConfigBase {
  readonly clientType: "oidc_device_code";
}

export interface ClientCredentialsSecretConfig extends OidcClientConfigBase {
  readonly clientType: "oidc_client_credentials_secret";
  readonly clientSecret: string;
}

export interface ClientCredentialsPubKeyConfig extends OidcClientConfigBase {
  readonly clientType: "oidc_client_credentials_pubkey";
  /** PEM text of the private key */
  readonly clientPrivkey?: string;
  /** Path to a PEM private key, used when no inline key is given */
  readonly clientPrivkeyFile?: string;
  readonly clientPrivkeyPassword?: string;
}

export interface ClientCredentialsSharedKeyConfig extends OidcClientConfigBase {
  readonly clientType: "oidc_client_credentials_sharedkey";
  readonly sharedKey: string;
}

export interface LegacyClientConfig {
  readonly clientType: "legacy";
  readonly legacyAuthEndpoint: string;
}

export interface StaticApiKeyClientConfig {
  readonly clientType: "static_apikey";
}

export interface NoOpClientConfig {
  readonly clientType: "none";
}

export type OidcClientConfig =
  | AuthCodeClientConfig
  | DeviceCodeClientConfig
  | ClientCredentialsSecretConfig
  | ClientCredentialsPubKeyConfig
  | ClientCredentialsSharedKeyConfig;

export type AuthClientConfig =
  | OidcClientConfig
  | LegacyClientConfig
  | StaticApiKeyClientConfig
  | NoOpClientConfig;

/** Config for one client type */
export type AuthClientConfigOf<K extends ClientType> = Extract<AuthClientConfig, { clientType: K }>;

// ============================================================================
// Built-in configurations
// ============================================================================

export const DEFAULT_AUTH_SERVER = "https://login.imagery.example";
export const DEFAULT_CLIENT_ID = "imagery-sdk";
export const DEFAULT_API_AUDIENCE = "https://api.imagery.example/";
export const DEFAULT_LEGACY_AUTH_ENDPOINT = "https://api.imagery.example/v0/auth/login";

/** Built-in client used when no profile is selected: a device code public client */
export function defaultAuthClientConfig(): DeviceCodeClientConfig {
  return {
    clientType: "oidc_device_code",
    authServer: DEFAULT_AUTH_SERVER,
    clientId: DEFAULT_CLIENT_ID,
    defaultRequestScopes: ["imagery", "offline_access"],
    defaultRequestAudiences: [DEFAULT_API_AUDIENCE],
  };
}

export function legacyAuthClientConfig(): LegacyClientConfig {
  return { clientType: "legacy", legacyAuthEndpoint: DEFAULT_LEGACY_AUTH_ENDPOINT };
}

export function noopAuthClientConfig(): NoOpClientConfig {
  return { clientType: "none" };
}

// ============================================================================
// Config file format
// ============================================================================

const stringList = z.union([z.string(), z.array(z.string())]).transform((value) =>
  typeof value === "string" ? value.split(/\s+/).filter((entry) => entry.length > 0) : value
);

const oidcFileFields = {
  auth_server: z.string().url(),
  client_id: z.string().min(1),
  default_request_scopes: stringList.optional(),
  default_request_audiences: stringList.optional(),
  // Short aliases used by some config files
  scopes: stringList.optional(),
  audiences: stringList.optional(),
  issuer: z.string().optional(),
  authorization_endpoint: z.string().url().optional(),
  token_endpoint: z.string().url().optional(),
  jwks_endpoint: z.string().url().optional(),
  introspection_endpoint: z.string().url().optional(),
  revocation_endpoint: z.string().url().optional(),
  device_authorization_endpoint: z.string().url().optional(),
};

const configFileSchema = z.discriminatedUnion("client_type", [
  z.object({
    client_type: z.literal("oidc_auth_code"),
    ...oidcFileFields,
    redirect_uri: z.string().url().optional(),
    local_redirect_uri: z.string().url().optional(),
  }),
  z.object({ client_type: z.literal("oidc_device_code"), ...oidcFileFields }),
  z.object({
    client_type: z.literal("oidc_client_credentials_secret"),
    ...oidcFileFields,
    client_secret: z.string().min(1),
  }),
  z.object({
    client_type: z.literal("oidc_client_credentials_pubkey"),
    ...oidcFileFields,
    client_privkey: z.string().optional(),
    client_privkey_file: z.string().optional(),
    client_privkey_password: z.string().optional(),
  }),
  z.object({
    client_type: z.literal("oidc_client_credentials_sharedkey"),
    ...oidcFileFields,
    shared_key: z.string().min(1),
  }),
  z.object({
    client_type: z.literal("legacy"),
    legacy_auth_endpoint: z.string().url().optional(),
  }),
  z.object({ client_type: z.literal("static_apikey") }),
  z.object({ client_type: z.literal("none") }),
]);

type ConfigFile = z.infer<typeof configFileSchema>;
type OidcConfigFile = Extract<ConfigFile, { auth_server: string }>;

function oidcBase(file: OidcConfigFile): OidcClientConfigBase {
  return {
    authServer: file.auth_server,
    clientId: file.client_id,
    defaultRequestScopes: file.default_request_scopes ?? file.scopes ?? [],
    defaultRequestAudiences: file.default_request_audiences ?? file.audiences ?? [],
    issuer: file.issuer,
    authorizationEndpoint: file.authorization_endpoint,
    tokenEndpoint: file.token_endpoint,
    jwksEndpoint: file.jwks_endpoint,
    introspectionEndpoint: file.introspection_endpoint,
    revocationEndpoint: file.revocation_endpoint,
    deviceAuthorizationEndpoint: file.device_authorization_endpoint,
  };
}

function fromFileFormat(file: ConfigFile): AuthClientConfig {
  switch (file.client_type) {
    case "oidc_auth_code": {
      // Either redirect URI stands in for the other when only one is set
      const redirectUri = file.redirect_uri ?? file.local_redirect_uri;
      const localRedirectUri = file.local_redirect_uri ?? file.redirect_uri;
      if (!redirectUri || !localRedirectUri) {
        throw new ConfigurationError(
          "Auth code client config requires redirect_uri or local_redirect_uri"
        );
      }
      return { clientType: file.client_type, ...oidcBase(file), redirectUri, localRedirectUri };
    }
    case "oidc_device_code":
      return { clientType: file.client_type, ...oidcBase(file) };
    case "oidc_client_credentials_secret":
      return { clientType: file.client_type, ...oidcBase(file), clientSecret: file.client_secret };
    case "oidc_client_credentials_pubkey":
      if (!file.client_privkey && !file.client_privkey_file) {
        throw new ConfigurationError(
          "Public key client credentials config requires client_privkey or client_privkey_file"
        );
      }
      return {
        clientType: file.client_type,
        ...oidcBase(file),
        clientPrivkey: file.client_privkey,
        clientPrivkeyFile: file.client_privkey_file,
        clientPrivkeyPassword: file.client_privkey_password,
      };
    case "oidc_client_credentials_sharedkey":
      return { clientType: file.client_type, ...oidcBase(file), sharedKey: file.shared_key };
    case "legacy":
      return {
        clientType: file.client_type,
        legacyAuthEndpoint: file.legacy_auth_endpoint ?? DEFAULT_LEGACY_AUTH_ENDPOINT,
      };
    case "static_apikey":
      return { clientType: file.client_type };
    case "none":
      return { clientType: file.client_type };
  }
}

/**
 * Validate a config in file format (snake_case keys).
 *
 * @throws ConfigurationError
 */
export function parseAuthClientConfig(input: unknown): AuthClientConfig {
  const result = configFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid auth client config: ${issues.join("; ")}`, { issues });
  }
  return fromFileFormat(result.data);
}

/**
 * Read and validate an auth client config file.
 *
 * @throws ConfigurationError
 */
export function loadAuthClientConfig(filePath: string): AuthClientConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read auth client config file "${filePath}"`,
      { filePath },
      { cause: error }
    );
  }

  try {
    return parseAuthClientConfig(raw);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${error.message} (in ${filePath})`, { filePath }, { cause: error });
    }
    throw error;
  }
}

export function isOidcClientConfig(config: AuthClientConfig): config is OidcClientConfig {
  return config.clientType.startsWith("oidc_");
}
