/**
 * Legacy Auth Client
 *
 * Username/password login against the pre-OIDC endpoint. The response is a
 * JWT signed with a key only the server holds; the client just unpacks the
 * API key from it.
 */

import { getConfig } from "../config/index.js";
import { LegacyApiKeyCredential } from "../credentials/credential.js";
import type { JsonObjectStorage } from "../credentials/storage.js";
import { parseMediaType } from "../oidc/api-client.js";
import { ConsolePrompter, type UserPrompter } from "../oidc/browser.js";
import { decodeJwtClaims } from "../oidc/jwt.js";
import { LegacyApiKeyRequestAuthenticator } from "../request-auth/api-key-authenticators.js";
import type { RequestAuthenticator } from "../request-auth/request-authenticator.js";
import { LegacyAuthApiError, type RawResponse } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { withTimeout } from "../shared/timeout.js";
import { SPAN_OPERATIONS, tracedFetch, withSpan } from "../shared/tracing.js";
import type { LegacyClientConfig } from "./config.js";
import type { AuthClientDependencies } from "./oidc-client.js";
import type { AuthClientImplementation, LoginOptions } from "./types.js";

const logger = createLogger("LegacyAuthClient");

export class LegacyAuthClient implements AuthClientImplementation {
  readonly clientType = "legacy";
  private readonly config: LegacyClientConfig;
  private readonly prompter: UserPrompter;
  private readonly storage: JsonObjectStorage | undefined;
  private readonly timeoutMs: number;

  constructor(config: LegacyClientConfig, deps: AuthClientDependencies = {}) {
    this.config = config;
    this.prompter = deps.prompter ?? new ConsolePrompter();
    this.storage = deps.storage;
    this.timeoutMs = deps.http?.timeoutMs ?? getConfig().httpTimeoutMs;
  }

  defaultRequestAuthenticator(credentialPath?: string): RequestAuthenticator {
    return new LegacyApiKeyRequestAuthenticator(
      new LegacyApiKeyCredential({ filePath: credentialPath, storage: this.storage })
    );
  }

  async login(options: LoginOptions = {}): Promise<LegacyApiKeyCredential> {
    const email = options.username || (await this.prompter.ask("Email: "));
    const password = options.password || (await this.prompter.askSecret("Password: "));

    const response = await this.post({ email, password });
    const apiKey = this.parseResponse(response);
    logger.info("Legacy login complete");
    return new LegacyApiKeyCredential({ data: { key: apiKey }, storage: this.storage });
  }

  private async post(body: Record<string, string>): Promise<RawResponse> {
    const endpoint = this.config.legacyAuthEndpoint;
    let response: RawResponse;
    try {
      response = await withSpan("legacy.login", SPAN_OPERATIONS.AUTH_LOGIN, () =>
        withTimeout(
          `POST ${endpoint}`,
          async (signal) => {
            const res = await tracedFetch(endpoint, {
              method: "POST",
              headers: { "Content-Type": "application/json", Accept: "application/json" },
              body: JSON.stringify(body),
              signal,
            });
            return {
              status: res.status,
              statusText: res.statusText,
              contentType: res.headers.get("content-type"),
              body: await res.text(),
            };
          },
          this.timeoutMs
        )
      );
    } catch (error) {
      throw new LegacyAuthApiError(
        `Request to authentication endpoint ${endpoint} failed`,
        undefined,
        { cause: error }
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new LegacyAuthApiError(
        `HTTP error from endpoint at ${endpoint}: ${response.status}: ${response.statusText}`,
        response
      );
    }
    return response;
  }

  private parseResponse(response: RawResponse): string {
    const endpoint = this.config.legacyAuthEndpoint;
    if (response.body.length > 0 && parseMediaType(response.contentType) !== "application/json") {
      throw new LegacyAuthApiError(
        `Expected json content-type, but got ${response.contentType ?? "(none)"}`,
        response
      );
    }

    let payload: unknown;
    try {
      payload = response.body.length > 0 ? JSON.parse(response.body) : undefined;
    } catch (error) {
      throw new LegacyAuthApiError(`Malformed JSON from authentication endpoint ${endpoint}`, response, {
        cause: error,
      });
    }
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      throw new LegacyAuthApiError(
        `Response from authentication endpoint ${endpoint} was not understood. Expected JSON response payload, but none was found.`,
        response
      );
    }

    const token: unknown = Reflect.get(payload, "token");
    if (typeof token !== "string" || token.length === 0) {
      throw new LegacyAuthApiError('Authorization response did not include expected field "token"', response);
    }

    let apiKey: unknown;
    try {
      apiKey = decodeJwtClaims(token)["api_key"];
    } catch (error) {
      throw new LegacyAuthApiError("Authorization response token could not be decoded", response, {
        cause: error,
      });
    }
    if (typeof apiKey !== "string" || apiKey.length === 0) {
      throw new LegacyAuthApiError(
        'Authorization response did not include expected field "api_key" in the returned token',
        response
      );
    }
    return apiKey;
  }
}
