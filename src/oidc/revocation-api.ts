/**
 * Revocation API Client (RFC 7009)
 */

import { SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient, type ClientAuthEnricher } from "./api-client.js";
import type { TokenTypeHint } from "./types.js";

export class RevocationApiClient extends OidcApiClient {
  revokeAccessToken(token: string, enricher?: ClientAuthEnricher): Promise<void> {
    return this.revokeToken(token, "access_token", enricher);
  }

  revokeRefreshToken(token: string, enricher?: ClientAuthEnricher): Promise<void> {
    return this.revokeToken(token, "refresh_token", enricher);
  }

  private async revokeToken(
    token: string,
    hint: TokenTypeHint,
    enricher?: ClientAuthEnricher
  ): Promise<void> {
    await withSpan(`oidc.revoke ${hint}`, SPAN_OPERATIONS.AUTH_REVOKE, async () => {
      // No payload on success; error payloads are checked by the base client
      await this.checkedPost(this.authenticate({ token, token_type_hint: hint }, enricher));
    });
  }
}
