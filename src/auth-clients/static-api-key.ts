/**
 * Static API Key Auth Client
 *
 * The key is provisioned out of band and written to the credential file by
 * hand or by an installer; there is nothing to log in to.
 */

import { StaticApiKeyCredential } from "../credentials/credential.js";
import type { JsonObjectStorage } from "../credentials/storage.js";
import { StaticApiKeyRequestAuthenticator } from "../request-auth/api-key-authenticators.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import type { StaticApiKeyClientConfig } from "./config.js";
import type { AuthClientDependencies } from "./oidc-client.js";
import type { AuthClientImplementation } from "./types.js";

export class StaticApiKeyAuthClient implements AuthClientImplementation {
  readonly clientType = "static_apikey";
  private readonly storage: JsonObjectStorage | undefined;

  constructor(_config: StaticApiKeyClientConfig, deps: AuthClientDependencies = {}) {
    this.storage = deps.storage;
  }

  defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator {
    return new StaticApiKeyRequestAuthenticator(
      new StaticApiKeyCredential({ filePath: credentialPath, storage: this.storage })
    );
  }
}
