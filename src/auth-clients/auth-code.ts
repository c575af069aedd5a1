/**
 * Authorization Code Auth Client (public client, PKCE)
 *
 * Two ways to receive the authorization code: a loopback listener that the
 * browser is redirected to, or a headless flow where the user opens the
 * URL anywhere and pastes the result back.
 */

import type { OidcCredential } from "../credentials/credential.js";
import type { ClientAuthEnricher } from "../oidc/api-client.js";
import { buildAuthorizationRequest, parseAuthorizationCallback } from "../oidc/authorization-api.js";
import { awaitAuthorizationCallback, type LoopbackAddress } from "../oidc/callback-listener.js";
import { noAuthEnricher } from "../oidc/client-auth.js";
import { createPkcePair } from "../oidc/pkce.js";
import type { TokenResponse } from "../oidc/types.js";
import { RefreshingOidcTokenRequestAuthenticator } from "../request-auth/oidc-authenticators.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import { formatErrorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { AuthCodeClientConfig } from "./config.js";
import { OidcAuthClient } from "./oidc-client.js";
import type { LoginOptions } from "./types.js";

const logger = createLogger("AuthCodeClient");

/** An authorization request waiting for the user to come back with a code */
export interface PendingAuthCodeLogin {
  readonly authorizationUrl: string;
  readonly redirectUri: string;
  readonly state: string;
  readonly nonce: string;
  readonly codeVerifier: string;
}

export class AuthCodeAuthClient extends OidcAuthClient<AuthCodeClientConfig> {
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
    if (options.allowOpenBrowser === false) {
      return this.headlessLogin(options);
    }
    return this.browserLogin(options);
  }

  /**
   * Start a login that completes out of band. Show `authorizationUrl` to
   * the user, then pass what they paste back to completeManualLogin().
   */
  async beginManualLogin(options: LoginOptions = {}): Promise<PendingAuthCodeLogin> {
    return this.startAuthorization(this.config.redirectUri, options);
  }

  /**
   * Finish a manual login.
   *
   * @param input - The full redirect URL, its query string, or the bare code
   */
  async completeManualLogin(pending: PendingAuthCodeLogin, input: string): Promise<OidcCredential> {
    const trimmed = input.trim();
    const code = looksLikeCallback(trimmed)
      ? parseAuthorizationCallback(trimmed, pending.state)
      : trimmed;
    return this.exchangeCode(pending, code);
  }

  private async headlessLogin(options: LoginOptions): Promise<OidcCredential> {
    const pending = await this.beginManualLogin(options);
    this.prompter.show(
      `Please open the following URL in your browser to login:\n\n${pending.authorizationUrl}\n`
    );
    const input = await this.prompter.askSecret("Enter the authorization code: ");
    return this.completeManualLogin(pending, input);
  }

  private async browserLogin(options: LoginOptions): Promise<OidcCredential> {
    const session: { pending?: PendingAuthCodeLogin } = {};

    const callbackPath = await awaitAuthorizationCallback({
      redirectUri: this.config.localRedirectUri,
      onListening: async (address) => {
        const pending = await this.startAuthorization(
          boundRedirectUri(this.config.localRedirectUri, address),
          options
        );
        session.pending = pending;
        await this.openBrowser(pending.authorizationUrl);
      },
    });

    const { pending } = session;
    if (!pending) {
      // The listener only resolves after onListening has run
      throw new Error("Authorization callback arrived before the request was sent");
    }
    return this.exchangeCode(pending, parseAuthorizationCallback(callbackPath, pending.state));
  }

  private async openBrowser(url: string): Promise<void> {
    try {
      await this.browser.open(url);
      this.prompter.show(`Opened a browser to complete login. If it did not open, visit:\n\n${url}\n`);
    } catch (error) {
      logger.warn("Could not open a browser", { error: formatErrorMessage(error) });
      this.prompter.show(`Please open the following URL in your browser to login:\n\n${url}\n`);
    }
  }

  private async startAuthorization(
    redirectUri: string,
    options: LoginOptions
  ): Promise<PendingAuthCodeLogin> {
    const authorizationEndpoint =
      this.config.authorizationEndpoint ?? (await this.discovery()).authorization_endpoint;
    const pkce = createPkcePair();
    const request = buildAuthorizationRequest({
      authorizationEndpoint,
      clientId: this.config.clientId,
      redirectUri,
      codeChallenge: pkce.challenge,
      requestedScopes: options.requestedScopes ?? this.config.defaultRequestScopes,
      requestedAudiences: options.requestedAudiences ?? this.config.defaultRequestAudiences,
    });

    return {
      authorizationUrl: request.url,
      redirectUri,
      state: request.state,
      nonce: request.nonce,
      codeVerifier: pkce.verifier,
    };
  }

  private async exchangeCode(pending: PendingAuthCodeLogin, code: string): Promise<OidcCredential> {
    const tokens: TokenResponse = await (await this.tokenApi()).getTokenFromCode(
      pending.redirectUri,
      code,
      pending.codeVerifier,
      this.clientAuthEnricher()
    );

    if (tokens.id_token) {
      await this.validateIdTokenLocal(tokens.id_token, pending.nonce);
    }

    logger.info("Login complete", { clientType: this.clientType });
    return this.credentialFrom(tokens);
  }
}

function looksLikeCallback(input: string): boolean {
  return /^https?:\/\//i.test(input) || input.startsWith("/") || input.startsWith("?") || input.includes("code=");
}

/** The redirect URI with the port actually bound, for listeners on port 0 */
function boundRedirectUri(redirectUri: string, address: LoopbackAddress): string {
  const url = new URL(redirectUri);
  if (url.port === "0") {
    url.port = String(address.port);
  }
  return url.toString();
}
