/**
 * Refreshing OIDC Request Authenticators
 *
 * Present an OIDC access token as a bearer token, refreshing it once
 * three quarters of its lifetime has passed. Before going to the network,
 * the credential file is re-read in case another process sharing it has
 * already refreshed (or rotated a single-use refresh token).
 *
 * If reloading or refreshing fails, the old token is presented anyway and
 * the API being called decides whether it is still good enough.
 */

import type { OidcCredential } from "../credentials/credential.js";
import type { OidcTokenSource } from "../auth-clients/types.js";
import { REFRESH_AT_LIFETIME_FRACTION } from "../shared/constants.js";
import { formatErrorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { addBreadcrumb } from "../shared/tracing.js";
import { decodeJwtClaims } from "../oidc/jwt.js";
import { RequestAuthenticator } from "./request-authenticator.js";

const logger = createLogger("OidcRequestAuth");

export interface RefreshingOidcTokenRequestAuthenticatorOptions {
  readonly credential: OidcCredential;
  /** Without one, tokens are reloaded from disk but never refreshed */
  readonly authClient?: OidcTokenSource;
}

/**
 * Refresh point of an access token, in epoch seconds.
 *
 * JWT access tokens (RFC 9068) carry `iat` and `exp`. They are read without
 * verification: this is a client inspecting its own token, not a server
 * deciding whether to trust one. Opaque tokens are timed from when the
 * credential data was written (the file's mtime once saved), plus
 * `expires_in`.
 */
export function computeRefreshAt(credential: OidcCredential): number {
  const accessToken = credential.accessToken();
  if (!accessToken) {
    return 0;
  }

  const writtenAtSec = Math.floor(credential.dataTime() / 1000);
  let iat: number | undefined;
  let exp: number | undefined;
  try {
    const claims = decodeJwtClaims(accessToken);
    iat = claims.iat;
    exp = claims.exp;
  } catch {
    logger.debug("Access token is not a JWT; timing refresh from expires_in");
  }

  const issuedAt = iat ?? writtenAtSec;
  const expiresAt = exp ?? issuedAt + (credential.expiresIn() ?? 0);
  return issuedAt + Math.floor(REFRESH_AT_LIFETIME_FRACTION * (expiresAt - issuedAt));
}

function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

export class RefreshingOidcTokenRequestAuthenticator extends RequestAuthenticator {
  protected oidcCredential: OidcCredential;
  protected readonly authClient: OidcTokenSource | undefined;
  private refreshAtSec = 0;

  constructor(options: RefreshingOidcTokenRequestAuthenticatorOptions) {
    super({ tokenPrefix: "Bearer" });
    this.oidcCredential = options.credential;
    this.authClient = options.authClient;
  }

  credential(): OidcCredential {
    return this.oidcCredential;
  }

  /** Epoch seconds after which the next request triggers a refresh */
  refreshAt(): number {
    return this.refreshAtSec;
  }

  async preRequestHook(): Promise<void> {
    if (nowSec() > this.refreshAtSec) {
      try {
        this.oidcCredential.lazyReload();
        this.updateToken();
      } catch (error) {
        logger.warn("Error loading auth token. Continuing with old auth token.", {
          error: formatErrorMessage(error),
        });
      }
    }

    if (nowSec() > this.refreshAtSec) {
      try {
        await this.refresh();
      } catch (error) {
        logger.warn("Error refreshing auth token. Continuing with old auth token.", {
          error: formatErrorMessage(error),
        });
      }
    }
  }

  /** Get a replacement credential from the auth client */
  protected obtainNewCredential(client: OidcTokenSource): Promise<OidcCredential> {
    const refreshToken = this.oidcCredential.refreshToken();
    if (!refreshToken) {
      return Promise.reject(new Error("No refresh token is available"));
    }
    return client.refresh(refreshToken);
  }

  private async refresh(): Promise<void> {
    if (!this.authClient) {
      return;
    }

    const replacement = await this.obtainNewCredential(this.authClient);
    const filePath = this.oidcCredential.path();
    replacement.setPath(filePath);
    if (filePath) {
      replacement.save();
    }

    this.oidcCredential = replacement;
    this.updateToken();
    logger.info("Auth token refreshed", { refreshAt: this.refreshAtSec });
    addBreadcrumb("Auth token refreshed", "auth", "info", { refreshAt: this.refreshAtSec });
  }

  private updateToken(): void {
    this.tokenBody = this.oidcCredential.accessToken();
    this.refreshAtSec = computeRefreshAt(this.oidcCredential);
  }
}

/**
 * Like RefreshingOidcTokenRequestAuthenticator, but logs in again when there
 * is no refresh token. For mechanisms such as client credentials, where
 * login is non-interactive and refresh tokens are not issued.
 */
export class RefreshOrReloginOidcTokenRequestAuthenticator extends RefreshingOidcTokenRequestAuthenticator {
  protected override obtainNewCredential(client: OidcTokenSource): Promise<OidcCredential> {
    const refreshToken = this.credentialRefreshToken();
    return refreshToken ? client.refresh(refreshToken) : client.login();
  }

  private credentialRefreshToken(): string | undefined {
    // Never loaded (missing file) counts as no refresh token
    return this.oidcCredential.data() === undefined ? undefined : this.oidcCredential.refreshToken();
  }
}
