/**
 * OIDC API Client Base
 *
 * Checked GET/POST against a single authorization server endpoint. Every
 * failure talking to the endpoint surfaces as OidcApiError carrying the raw
 * response: transport failures, HTTP errors, OAuth error payloads and
 * unparseable bodies alike.
 */

import { getConfig } from "../config/index.js";
import { OidcApiError, type RawResponse } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { withRetry, type RetryOptions } from "../shared/retry.js";
import { withTimeout } from "../shared/timeout.js";
import { tracedFetch } from "../shared/tracing.js";

const logger = createLogger("OidcApiClient");

/** Form fields of a request body or query string */
export type FormPayload = Readonly<Record<string, string>>;

/**
 * A request after client authentication has been applied to it.
 */
export interface AuthenticatedRequest {
  readonly payload: FormPayload;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Applies client authentication to a request bound for `audience` (the
 * endpoint URL). Depending on the method this edits the payload, adds
 * headers, or both.
 */
export type ClientAuthEnricher = (payload: FormPayload, audience: string) => AuthenticatedRequest;

export interface OidcApiClientOptions {
  /** Per-request timeout (default: configured HTTP timeout) */
  readonly timeoutMs?: number;
  /** Retry policy for idempotent GETs */
  readonly retry?: Partial<RetryOptions>;
}

type JsonObject = Record<string, unknown>;

export abstract class OidcApiClient {
  protected readonly endpointUri: string;
  protected readonly timeoutMs: number;
  protected readonly retryOptions: Partial<RetryOptions>;

  constructor(endpointUri: string, options: OidcApiClientOptions = {}) {
    this.endpointUri = endpointUri;
    this.timeoutMs = options.timeoutMs ?? getConfig().httpTimeoutMs;
    this.retryOptions = options.retry ?? {};
  }

  endpoint(): string {
    return this.endpointUri;
  }

  /** Apply client authentication, or pass the payload through unchanged */
  protected authenticate(payload: FormPayload, enricher?: ClientAuthEnricher): AuthenticatedRequest {
    return enricher ? enricher(payload, this.endpointUri) : { payload, headers: {} };
  }

  protected async checkedGet(params?: FormPayload): Promise<RawResponse> {
    const url = new URL(this.endpointUri);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }

    return withRetry(
      () => this.send(url.toString(), { method: "GET", headers: { Accept: "application/json" } }),
      this.retryOptions
    );
  }

  protected async checkedPost(request: AuthenticatedRequest): Promise<RawResponse> {
    return this.send(this.endpointUri, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/x-www-form-urlencoded",
        ...request.headers,
      },
      body: new URLSearchParams(request.payload).toString(),
    });
  }

  protected async checkedGetJson(params?: FormPayload): Promise<JsonObject> {
    return this.checkedJson(await this.checkedGet(params));
  }

  protected async checkedPostJson(request: AuthenticatedRequest): Promise<JsonObject> {
    return this.checkedJson(await this.checkedPost(request));
  }

  /** Raise a protocol error unless `result` is a successful parse */
  protected requireShape<T>(
    result: { success: true; data: T } | { success: false; error: { message: string } },
    what: string,
    response?: RawResponse
  ): T {
    if (!result.success) {
      throw new OidcApiError(
        `Invalid ${what} from OIDC endpoint at ${this.endpointUri}: ${result.error.message}`,
        this.endpointUri,
        response
      );
    }
    return result.data;
  }

  private async send(url: string, init: RequestInit): Promise<RawResponse> {
    logger.debug("OIDC request", { method: init.method, endpoint: this.endpointUri });

    let response: RawResponse;
    try {
      response = await withTimeout(
        `${init.method ?? "GET"} ${this.endpointUri}`,
        async (signal) => {
          const res = await tracedFetch(url, { ...init, signal });
          return {
            status: res.status,
            statusText: res.statusText,
            contentType: res.headers.get("content-type"),
            body: await res.text(),
          };
        },
        this.timeoutMs
      );
    } catch (error) {
      throw new OidcApiError(
        `Request to OIDC endpoint at ${this.endpointUri} failed: ${error instanceof Error ? error.message : String(error)}`,
        this.endpointUri,
        undefined,
        undefined,
        { cause: error }
      );
    }

    // A recognized error payload is more specific than the status code
    this.checkPayloadError(response);
    this.checkHttpError(response);
    return response;
  }

  private checkHttpError(response: RawResponse): void {
    if (response.status < 200 || response.status >= 300) {
      throw new OidcApiError(
        `HTTP error from OIDC endpoint at ${this.endpointUri}: ${response.status}`,
        this.endpointUri,
        response
      );
    }
  }

  private checkPayloadError(response: RawResponse): void {
    if (response.body.length === 0 || !isJsonContentType(response.contentType)) {
      return;
    }

    const payload = this.parseJson(response);
    if (!isJsonObject(payload)) {
      return;
    }

    // Two error schemas are seen in the wild
    const error = payload["error"];
    if (typeof error === "string" && error.length > 0) {
      throw new OidcApiError(
        `Error from OIDC endpoint at ${this.endpointUri}: ${error}: ${String(payload["error_description"] ?? "no error description")}`,
        this.endpointUri,
        response,
        error
      );
    }

    const errorCode = payload["errorCode"];
    if (typeof errorCode === "string" && errorCode.length > 0) {
      throw new OidcApiError(
        `Error from OIDC endpoint at ${this.endpointUri}: ${errorCode}: ${String(payload["errorSummary"] ?? "no error summary")}`,
        this.endpointUri,
        response,
        errorCode
      );
    }
  }

  private checkedJson(response: RawResponse): JsonObject {
    if (response.body.length === 0) {
      throw new OidcApiError(
        `Response from OIDC endpoint at ${this.endpointUri} was not understood. Expected JSON response payload, but none was found.`,
        this.endpointUri,
        response
      );
    }

    if (!isJsonContentType(response.contentType)) {
      throw new OidcApiError(
        `Expected json content-type, but got ${response.contentType ?? "(none)"}`,
        this.endpointUri,
        response
      );
    }

    const payload = this.parseJson(response);
    if (!isJsonObject(payload) || Object.keys(payload).length === 0) {
      throw new OidcApiError(
        `Response from OIDC endpoint at ${this.endpointUri} was not understood. Expected a JSON object.`,
        this.endpointUri,
        response
      );
    }
    return payload;
  }

  private parseJson(response: RawResponse): unknown {
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new OidcApiError(
        `Malformed JSON from OIDC endpoint at ${this.endpointUri}`,
        this.endpointUri,
        response,
        undefined,
        { cause: error }
      );
    }
  }
}

/**
 * Media type of a Content-Type header, without parameters.
 */
export function parseMediaType(contentType: string | null): string | undefined {
  const mediaType = contentType?.split(";")[0]?.trim().toLowerCase();
  return mediaType ? mediaType : undefined;
}

function isJsonContentType(contentType: string | null): boolean {
  return parseMediaType(contentType) === "application/json";
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
