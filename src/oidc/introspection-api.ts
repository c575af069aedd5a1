/**
 * Introspection API Client (RFC 7662)
 */

import { TokenValidationError } from "../shared/errors.js";
import { SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient, type ClientAuthEnricher } from "./api-client.js";
import {
  introspectionResponseSchema,
  type IntrospectionResponse,
  type TokenTypeHint,
} from "./types.js";

export class IntrospectionApiClient extends OidcApiClient {
  validateAccessToken(token: string, enricher?: ClientAuthEnricher): Promise<IntrospectionResponse> {
    return this.validateToken(token, "access_token", enricher);
  }

  validateIdToken(token: string, enricher?: ClientAuthEnricher): Promise<IntrospectionResponse> {
    return this.validateToken(token, "id_token", enricher);
  }

  validateRefreshToken(token: string, enricher?: ClientAuthEnricher): Promise<IntrospectionResponse> {
    return this.validateToken(token, "refresh_token", enricher);
  }

  /**
   * @throws TokenValidationError when the server reports the token inactive
   * @throws OidcApiError when the call itself fails
   */
  private async validateToken(
    token: string,
    hint: TokenTypeHint,
    enricher?: ClientAuthEnricher
  ): Promise<IntrospectionResponse> {
    return withSpan(`oidc.introspect ${hint}`, SPAN_OPERATIONS.AUTH_VALIDATE, async () => {
      const json = await this.checkedPostJson(
        this.authenticate({ token, token_type_hint: hint }, enricher)
      );
      const result = this.requireShape(
        introspectionResponseSchema.safeParse(json),
        "introspection response"
      );
      if (!result.active) {
        throw new TokenValidationError("Token is not active");
      }
      return result;
    });
  }
}
