/**
 * Token API Client
 *
 * Grant requests against the token endpoint. Grants are never retried:
 * a replayed code or refresh token may be rejected, or rotate twice.
 */

import { SPAN_ATTRIBUTES, SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient, type ClientAuthEnricher, type FormPayload } from "./api-client.js";
import { tokenResponseSchema, type TokenResponse } from "./types.js";

export const DEVICE_CODE_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:device_code";

export class TokenApiClient extends OidcApiClient {
  async getTokenFromRefresh(
    refreshToken: string,
    requestedScopes?: readonly string[],
    enricher?: ClientAuthEnricher
  ): Promise<TokenResponse> {
    const payload: Record<string, string> = {
      grant_type: "refresh_token",
      refresh_token: refreshToken,
    };
    // Down-scoping is allowed on refresh; the refresh token keeps its scopes
    if (requestedScopes && requestedScopes.length > 0) {
      payload["scope"] = requestedScopes.join(" ");
    }
    return this.checkedCall(payload, enricher, SPAN_OPERATIONS.AUTH_REFRESH);
  }

  async getTokenFromClientCredentials(
    enricher: ClientAuthEnricher,
    requestedScopes?: readonly string[],
    requestedAudiences?: readonly string[]
  ): Promise<TokenResponse> {
    const payload: Record<string, string> = { grant_type: "client_credentials" };
    if (requestedScopes && requestedScopes.length > 0) {
      payload["scope"] = requestedScopes.join(" ");
    }
    if (requestedAudiences && requestedAudiences.length > 0) {
      payload["audience"] = requestedAudiences.join(" ");
    }
    return this.checkedCall(payload, enricher, SPAN_OPERATIONS.AUTH_LOGIN);
  }

  async getTokenFromCode(
    redirectUri: string,
    code: string,
    codeVerifier: string,
    enricher?: ClientAuthEnricher
  ): Promise<TokenResponse> {
    return this.checkedCall(
      {
        grant_type: "authorization_code",
        redirect_uri: redirectUri,
        code,
        code_verifier: codeVerifier,
      },
      enricher,
      SPAN_OPERATIONS.AUTH_LOGIN
    );
  }

  /**
   * One poll of the device code grant. Pending and slow-down answers arrive
   * as OidcApiError with the OAuth error code in `oauthError`.
   */
  async getTokenFromDeviceCode(
    deviceCode: string,
    enricher?: ClientAuthEnricher
  ): Promise<TokenResponse> {
    return this.checkedCall(
      { grant_type: DEVICE_CODE_GRANT_TYPE, device_code: deviceCode },
      enricher,
      SPAN_OPERATIONS.AUTH_LOGIN
    );
  }

  private async checkedCall(
    payload: FormPayload,
    enricher: ClientAuthEnricher | undefined,
    op: string
  ): Promise<TokenResponse> {
    const grantType = payload["grant_type"] ?? "unknown";
    return withSpan(
      `oidc.token ${grantType}`,
      op,
      async () => {
        const json = await this.checkedPostJson(this.authenticate(payload, enricher));
        return this.requireShape(tokenResponseSchema.safeParse(json), "token response");
      },
      { [SPAN_ATTRIBUTES.OAUTH_GRANT_TYPE]: grantType, [SPAN_ATTRIBUTES.OAUTH_ENDPOINT]: this.endpointUri }
    );
  }
}
