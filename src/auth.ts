/**
 * Auth Container
 *
 * Groups the working set an application needs: an auth client, the request
 * authenticator over its stored credential, and where that credential lives.
 */

import { existsSync } from "node:fs";
import {
  defaultAuthClientConfig,
  legacyAuthClientConfig,
  loadAuthClientConfig,
  noopAuthClientConfig,
  type AuthClientConfig,
} from "./auth-clients/config.js";
import { createAuthClient } from "./auth-clients/factory.js";
import type { AuthClientDependencies } from "./auth-clients/oidc-client.js";
import type { AuthClient } from "./auth-clients/types.js";
import { getConfig } from "./config/index.js";
import type { RequestAuthenticator } from "./request-auth/request-authenticator.js";
import { AUTH_CLIENT_CONFIG_FILE, TOKEN_FILE } from "./shared/constants.js";
import { ConfigurationError } from "./shared/errors.js";
import { createLogger } from "./shared/logger.js";
import {
  BUILTIN_PROFILE_DEFAULT,
  BUILTIN_PROFILE_LEGACY,
  BUILTIN_PROFILE_NONE,
  isDefaultProfile,
  isLegacyProfile,
  isNoneProfile,
  profileFilePath,
} from "./profile.js";

const logger = createLogger("Auth");

export interface AuthInitializeOptions {
  /** Profile name (default: IMAGERY_AUTH_PROFILE, then the built-in default) */
  readonly profile?: string;
  /** Auth client config file, overriding the profile's */
  readonly authClientConfigFile?: string;
  /** Credential file, overriding the profile's */
  readonly tokenFile?: string;
  readonly dependencies?: AuthClientDependencies;
}

export class Auth {
  private readonly client: AuthClient;
  private readonly authenticator: RequestAuthenticator;
  private readonly tokenPath: string | undefined;

  constructor(client: AuthClient, authenticator: RequestAuthenticator, tokenPath?: string) {
    this.client = client;
    this.authenticator = authenticator;
    this.tokenPath = tokenPath;
  }

  authClient(): AuthClient {
    return this.client;
  }

  requestAuthenticator(): RequestAuthenticator {
    return this.authenticator;
  }

  tokenFilePath(): string | undefined {
    return this.tokenPath;
  }

  /**
   * Build an Auth for a profile. Explicit options win over the
   * IMAGERY_AUTH_* environment settings.
   *
   * @throws ConfigurationError when a custom profile has no client config
   */
  static initialize(options: AuthInitializeOptions = {}): Auth {
    const env = getConfig();
    const profile = options.profile ?? env.profile;
    const configOverride = options.authClientConfigFile ?? env.authClientConfigFile;

    const authClient = createAuthClient(resolveClientConfig(profile, configOverride), options.dependencies);
    const tokenPath = profileFilePath(TOKEN_FILE, profile, options.tokenFile ?? env.tokenFile);
    return new Auth(authClient, authClient.defaultRequestAuthenticator(tokenPath), tokenPath);
  }
}

function resolveClientConfig(profile: string | undefined, overridePath: string | undefined): AuthClientConfig {
  // An explicit config file beats the built-in profiles
  if (!overridePath) {
    if (isDefaultProfile(profile)) {
      logger.debug("Using built-in auth client configuration", { profile: BUILTIN_PROFILE_DEFAULT });
      return defaultAuthClientConfig();
    }
    if (isLegacyProfile(profile)) {
      logger.debug("Using built-in auth client configuration", { profile: BUILTIN_PROFILE_LEGACY });
      return legacyAuthClientConfig();
    }
    if (isNoneProfile(profile)) {
      logger.debug("Using built-in auth client configuration", { profile: BUILTIN_PROFILE_NONE });
      return noopAuthClientConfig();
    }
  }

  const configPath = profileFilePath(AUTH_CLIENT_CONFIG_FILE, profile, overridePath);
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Auth configuration file "${configPath}" not found.`, {
      filePath: configPath,
    });
  }
  logger.debug("Using auth client configuration from file", { filePath: configPath });
  return loadAuthClientConfig(configPath);
}
