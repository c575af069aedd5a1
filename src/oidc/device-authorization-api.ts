/**
 * Device Authorization API Client (RFC 8628 section 3.1)
 */

import { SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient, type ClientAuthEnricher } from "./api-client.js";
import {
  deviceAuthorizationResponseSchema,
  type DeviceAuthorizationResponse,
} from "./types.js";

export class DeviceAuthorizationApiClient extends OidcApiClient {
  async initiate(
    enricher: ClientAuthEnricher,
    requestedScopes?: readonly string[],
    requestedAudiences?: readonly string[]
  ): Promise<DeviceAuthorizationResponse> {
    const payload: Record<string, string> = {};
    if (requestedScopes && requestedScopes.length > 0) {
      payload["scope"] = requestedScopes.join(" ");
    }
    if (requestedAudiences && requestedAudiences.length > 0) {
      payload["audience"] = requestedAudiences.join(" ");
    }

    return withSpan("oidc.device_authorization", SPAN_OPERATIONS.AUTH_LOGIN, async () => {
      const json = await this.checkedPostJson(this.authenticate(payload, enricher));
      return this.requireShape(
        deviceAuthorizationResponseSchema.safeParse(json),
        "device authorization response"
      );
    });
  }
}
