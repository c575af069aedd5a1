/**
 * Discovery API Client
 *
 * Fetches the OpenID Provider metadata document. The document is fetched
 * at most once per instance; a failed fetch is retried on the next call.
 */

import { DISCOVERY_PATH } from "../shared/constants.js";
import { Lazy } from "../shared/lazy.js";
import { SPAN_OPERATIONS, withSpan } from "../shared/tracing.js";
import { OidcApiClient, type OidcApiClientOptions } from "./api-client.js";
import { discoveryDocumentSchema, type DiscoveryDocument } from "./types.js";

/** Well-known discovery URL for an authorization server base URL */
export function discoveryUrl(authServer: string): string {
  return `${authServer.replace(/\/+$/, "")}${DISCOVERY_PATH}`;
}

export class DiscoveryApiClient extends OidcApiClient {
  private readonly document: Lazy<DiscoveryDocument>;

  constructor(discoveryUri: string, options: OidcApiClientOptions = {}) {
    super(discoveryUri, options);
    this.document = new Lazy(() => this.fetchDocument());
  }

  static forAuthServer(authServer: string, options: OidcApiClientOptions = {}): DiscoveryApiClient {
    return new DiscoveryApiClient(discoveryUrl(authServer), options);
  }

  discovery(): Promise<DiscoveryDocument> {
    return this.document.get();
  }

  private async fetchDocument(): Promise<DiscoveryDocument> {
    return withSpan("oidc.discovery", SPAN_OPERATIONS.DISCOVERY, async () => {
      const payload = await this.checkedGetJson();
      return this.requireShape(discoveryDocumentSchema.safeParse(payload), "discovery document");
    });
  }
}
