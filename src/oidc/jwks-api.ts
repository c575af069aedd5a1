/**
 * JWKS API Client
 *
 * Fetches the authorization server's published verification keys.
 * Caching and fetch throttling belong to TokenValidator.
 */

import { createLogger } from "../shared/logger.js";
import { SPAN_ATTRIBUTES, SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient } from "./api-client.js";
import { jwksResponseSchema, type JsonWebKey } from "./types.js";

const logger = createLogger("JwksApiClient");

export class JwksApiClient extends OidcApiClient {
  async jwksKeys(): Promise<readonly JsonWebKey[]> {
    return withSpan("oidc.jwks", SPAN_OPERATIONS.JWKS_FETCH, async (span) => {
      const payload = await this.checkedGetJson();
      const { keys } = this.requireShape(jwksResponseSchema.safeParse(payload), "JWKS response");

      span?.setAttribute(SPAN_ATTRIBUTES.JWKS_KEY_COUNT, keys.length);
      logger.debug("Fetched JWKS", { endpoint: this.endpointUri, keyCount: keys.length });
      return keys;
    });
  }
}
