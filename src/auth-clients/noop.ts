/**
 * No-op Auth Client, for APIs that need no authentication
 */

import { NoOpCredential } from "../credentials/credential.js";
import type { IntrospectionResponse } from "../oidc/types.js";
import {
  SimpleInMemoryRequestAuthenticator,
  type RequestAuthenticator,
} from "../request-auth/request-authenticator.js";
import type { AuthClientImplementation } from "./types.js";

export class NoOpAuthClient implements AuthClientImplementation {
  readonly clientType = "none";

  login(): Promise<NoOpCredential> {
    return Promise.resolve(new NoOpCredential());
  }

  refresh(): Promise<NoOpCredential> {
    return Promise.resolve(new NoOpCredential());
  }

  defaultRequestAuthenticator(): RequestAuthenticator {
    return new SimpleInMemoryRequestAuthenticator({ credential: new NoOpCredential() });
  }

  validateAccessToken(): Promise<IntrospectionResponse> {
    return Promise.resolve({ active: true });
  }

  validateIdToken(): Promise<IntrospectionResponse> {
    return Promise.resolve({ active: true });
  }

  validateRefreshToken(): Promise<IntrospectionResponse> {
    return Promise.resolve({ active: true });
  }

  revokeAccessToken(): Promise<void> {
    return Promise.resolve();
  }

  revokeRefreshToken(): Promise<void> {
    return Promise.resolve();
  }

  getScopes(): Promise<readonly string[]> {
    return Promise.resolve([]);
  }
}
