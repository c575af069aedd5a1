/**
 * API Key Request Authenticators
 */

import type {
  LegacyApiKeyCredential,
  StaticApiKeyCredential,
} from "../credentials/credential.js";
import { formatErrorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { RequestAuthenticator } from "./request-authenticator.js";

const logger = createLogger("ApiKeyRequestAuth");

export const LEGACY_API_KEY_PREFIX = "api-key";

/**
 * Presents a legacy API key, loaded from its file on first use.
 */
export class LegacyApiKeyRequestAuthenticator extends RequestAuthenticator {
  private readonly apiKeyCredential: LegacyApiKeyCredential;

  constructor(credential: LegacyApiKeyCredential) {
    super({ tokenPrefix: LEGACY_API_KEY_PREFIX });
    this.apiKeyCredential = credential;
  }

  credential(): LegacyApiKeyCredential {
    return this.apiKeyCredential;
  }

  preRequestHook(): Promise<void> {
    if (this.tokenBody === undefined) {
      try {
        this.tokenBody = this.apiKeyCredential.apiKey();
      } catch (error) {
        logger.warn("Error loading API key. Continuing without one.", {
          error: formatErrorMessage(error),
        });
      }
    }
    return Promise.resolve();
  }
}

/**
 * Presents a static API key with the prefix stored beside it. The key file
 * is re-checked before every request so that an updated key is picked up.
 */
export class StaticApiKeyRequestAuthenticator extends RequestAuthenticator {
  private readonly apiKeyCredential: StaticApiKeyCredential;

  constructor(credential: StaticApiKeyCredential) {
    super();
    this.apiKeyCredential = credential;
  }

  credential(): StaticApiKeyCredential {
    return this.apiKeyCredential;
  }

  preRequestHook(): Promise<void> {
    try {
      this.apiKeyCredential.lazyReload();
      this.tokenBody = this.apiKeyCredential.apiKey();
      this.tokenPrefix = this.apiKeyCredential.bearerTokenPrefix();
    } catch (error) {
      logger.warn("Error loading API key. Continuing with old API key.", {
        error: formatErrorMessage(error),
      });
    }
    return Promise.resolve();
  }
}
