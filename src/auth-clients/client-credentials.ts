/**
 * Client Credentials Auth Clients (confidential clients)
 *
 * Login is non-interactive, and servers usually issue no refresh token for
 * this grant, so the default authenticator logs in again when the access
 * token is due.
 */

import type { KeyObject } from "node:crypto";
import type { OidcCredential } from "../credentials/credential.js";
import type { ClientAuthEnricher } from "../oidc/api-client.js";
import {
  clientSecretBasicEnricher,
  loadPrivateKey,
  privateKeyJwtEnricher,
} from "../oidc/client-auth.js";
import { RefreshOrReloginOidcTokenRequestAuthenticator } from "../request-auth/oidc-authenticators.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import { NotImplementedForMechanismError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type {
  ClientCredentialsPubKeyConfig,
  ClientCredentialsSecretConfig,
  ClientCredentialsSharedKeyConfig,
} from "./config.js";
import { OidcAuthClient } from "./oidc-client.js";
import type { LoginOptions } from "./types.js";

const logger = createLogger("ClientCredentials");

type ClientCredentialsConfig =
  | ClientCredentialsSecretConfig
  | ClientCredentialsPubKeyConfig
  | ClientCredentialsSharedKeyConfig;

abstract class ClientCredentialsAuthClientBase<
  C extends ClientCredentialsConfig,
> extends OidcAuthClient<C> {
  defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator {
    return new RefreshOrReloginOidcTokenRequestAuthenticator({
      credential: this.credentialAt(credentialPath),
      authClient: this,
    });
  }

  async login(options: LoginOptions = {}): Promise<OidcCredential> {
    const tokens = await (await this.tokenApi()).getTokenFromClientCredentials(
      this.clientAuthEnricher(),
      options.requestedScopes ?? this.config.defaultRequestScopes,
      options.requestedAudiences ?? this.config.defaultRequestAudiences
    );
    logger.info("Obtained client credentials token", { clientType: this.clientType });
    return this.credentialFrom(tokens);
  }
}

/** Authenticates with a client secret, `client_secret_basic` */
export class ClientCredentialsSecretAuthClient extends ClientCredentialsAuthClientBase<ClientCredentialsSecretConfig> {
  protected clientAuthEnricher(): ClientAuthEnricher {
    return clientSecretBasicEnricher(this.config.clientId, this.config.clientSecret);
  }
}

/** Authenticates with a signed assertion, `private_key_jwt` */
export class ClientCredentialsPubKeyAuthClient extends ClientCredentialsAuthClientBase<ClientCredentialsPubKeyConfig> {
  private privateKey: KeyObject | undefined;

  protected clientAuthEnricher(): ClientAuthEnricher {
    return privateKeyJwtEnricher(this.config.clientId, () => this.signingKey());
  }

  private signingKey(): KeyObject {
    this.privateKey ??= loadPrivateKey({
      pem: this.config.clientPrivkey,
      pemFile: this.config.clientPrivkeyFile,
      password: this.config.clientPrivkeyPassword,
    });
    return this.privateKey;
  }
}

/**
 * Shared key (`client_secret_jwt`) clients can be configured, but no
 * operation that authenticates the client is supported yet.
 */
export class ClientCredentialsSharedKeyAuthClient extends ClientCredentialsAuthClientBase<ClientCredentialsSharedKeyConfig> {
  protected clientAuthEnricher(): ClientAuthEnricher {
    throw new NotImplementedForMechanismError(this.clientType, "clientAuthentication");
  }
}
