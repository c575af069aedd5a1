/**
 * Device Code Auth Client (RFC 8628)
 *
 * The user approves the login on another device; this client polls the
 * token endpoint until they do, they refuse, or the code expires.
 */

import type { OidcCredential } from "../credentials/credential.js";
import type { ClientAuthEnricher } from "../oidc/api-client.js";
import { noAuthEnricher } from "../oidc/client-auth.js";
import { RefreshingOidcTokenRequestAuthenticator } from "../request-auth/oidc-authenticators.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import {
  DEFAULT_DEVICE_POLL_INTERVAL_MS,
  DEVICE_SLOW_DOWN_INCREMENT_MS,
} from "../shared/constants.js";
import { DeviceAuthorizationError, formatErrorMessage, OidcApiError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { sleep } from "../shared/timeout.js";
import type { DeviceCodeClientConfig } from "./config.js";
import { OidcAuthClient, type AuthClientDependencies } from "./oidc-client.js";
import type { DeviceLoginCompleteOptions, DeviceLoginInitiation, LoginOptions } from "./types.js";

const logger = createLogger("DeviceCodeClient");

export interface DeviceCodePollingOptions {
  /** Poll interval when the server does not send one */
  readonly defaultIntervalMs?: number;
  /** Added to the interval on every slow_down answer */
  readonly slowDownIncrementMs?: number;
}

export class DeviceCodeAuthClient extends OidcAuthClient<DeviceCodeClientConfig> {
  private readonly defaultIntervalMs: number;
  private readonly slowDownIncrementMs: number;

  constructor(
    config: DeviceCodeClientConfig,
    deps: AuthClientDependencies = {},
    polling: DeviceCodePollingOptions = {}
  ) {
    super(config, deps);
    this.defaultIntervalMs = polling.defaultIntervalMs ?? DEFAULT_DEVICE_POLL_INTERVAL_MS;
    this.slowDownIncrementMs = polling.slowDownIncrementMs ?? DEVICE_SLOW_DOWN_INCREMENT_MS;
  }

  protected clientAuthEnricher(): ClientAuthEnricher {
    return noAuthEnricher(this.config.clientId);
  }

  defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator {
    return new RefreshingOidcTokenRequestAuthenticator({
      credential: this.credentialAt(credentialPath),
      authClient: this,
    });
  }

  async login(options: LoginOptions = {}): Promise<OidcCredential> {
    const initiation = await this.deviceUserLoginInitiate(options);

    const link = initiation.verificationUriComplete ?? initiation.verificationUri;
    this.prompter.show(
      `To login, visit ${initiation.verificationUri} and enter the code ${initiation.userCode}` +
        (initiation.verificationUriComplete ? `\nor open ${link}` : "")
    );
    if (options.allowOpenBrowser !== false) {
      try {
        await this.browser.open(link);
      } catch (error) {
        logger.debug("Could not open a browser", { error: formatErrorMessage(error) });
      }
    }

    return this.deviceUserLoginComplete(initiation);
  }

  async deviceUserLoginInitiate(options: LoginOptions = {}): Promise<DeviceLoginInitiation> {
    const response = await (await this.deviceAuthorizationApi()).initiate(
      this.clientAuthEnricher(),
      options.requestedScopes ?? this.config.defaultRequestScopes,
      options.requestedAudiences ?? this.config.defaultRequestAudiences
    );

    return {
      deviceCode: response.device_code,
      userCode: response.user_code,
      verificationUri: response.verification_uri,
      verificationUriComplete: response.verification_uri_complete,
      expiresIn: response.expires_in,
      interval: response.interval ?? this.defaultIntervalMs / 1000,
    };
  }

  /**
   * Poll until the user finishes. Gives up when the device code expires or
   * `timeoutMs` passes, whichever is sooner.
   *
   * @throws DeviceAuthorizationError when the user refuses or time runs out
   */
  async deviceUserLoginComplete(
    initiation: DeviceLoginInitiation,
    options: DeviceLoginCompleteOptions = {}
  ): Promise<OidcCredential> {
    const tokenApi = await this.tokenApi();
    const lifetimeMs = Math.min(initiation.expiresIn * 1000, options.timeoutMs ?? Infinity);
    const deadline = Date.now() + lifetimeMs;
    let intervalMs = initiation.interval * 1000;

    const timedOut = (): DeviceAuthorizationError =>
      new DeviceAuthorizationError("timeout", "Timed out waiting for device authorization");

    for (;;) {
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        throw timedOut();
      }
      if (remainingMs <= intervalMs) {
        // The next poll would fall past the deadline
        await sleep(remainingMs);
        throw timedOut();
      }
      await sleep(intervalMs);

      try {
        const tokens = await tokenApi.getTokenFromDeviceCode(
          initiation.deviceCode,
          this.clientAuthEnricher()
        );
        logger.info("Device login complete");
        return this.credentialFrom(tokens);
      } catch (error) {
        if (!(error instanceof OidcApiError)) {
          throw error;
        }
        switch (error.oauthError) {
          case "authorization_pending":
            break;
          case "slow_down":
            intervalMs += this.slowDownIncrementMs;
            logger.debug("Server asked to slow down", { intervalMs });
            break;
          case "access_denied":
            throw new DeviceAuthorizationError("access_denied", "The user denied the login request");
          case "expired_token":
            throw new DeviceAuthorizationError("expired_token", "The device code expired before login completed");
          default:
            throw error;
        }
      }
    }
  }
}
