/**
 * Tracing Utilities
 *
 * Provides helper functions for creating spans around calls to the
 * authorization server. Uses Sentry's OpenTelemetry integration under the hood;
 * when the host application never initializes Sentry, spans are no-ops.
 */

import * as Sentry from "@sentry/node";

/** The span handed to callbacks by Sentry.startSpan */
export type Span = Parameters<Parameters<typeof Sentry.startSpan>[1]>[0];

/** OpenTelemetry status code for a failed span */
const SPAN_STATUS_ERROR = 2;

// Semantic conventions for span attributes
export const SPAN_ATTRIBUTES = {
  // HTTP operations
  HTTP_METHOD: "http.method",
  HTTP_URL: "http.url",
  HTTP_STATUS_CODE: "http.status_code",
  HTTP_HOST: "http.host",

  // OAuth / OIDC attributes
  OAUTH_GRANT_TYPE: "oauth.grant_type",
  OAUTH_ENDPOINT: "oauth.endpoint",
  JWKS_KEY_COUNT: "jwks.key_count",
} as const;

// Span operation names following OpenTelemetry semantic conventions
export const SPAN_OPERATIONS = {
  HTTP_CLIENT: "http.client",

  AUTH_LOGIN: "auth.login",
  AUTH_REFRESH: "auth.refresh",
  AUTH_VALIDATE: "auth.validate",
  AUTH_REVOKE: "auth.revoke",
  JWKS_FETCH: "auth.jwks.fetch",
  DISCOVERY: "auth.discovery",
} as const;

/**
 * Wrap an async operation with a span.
 *
 * @param name - Human-readable span name
 * @param op - Operation type (e.g., "auth.login", "http.client")
 * @param fn - The async function to execute
 * @param attributes - Optional span attributes
 * @returns The result of the function
 */
export async function withSpan<T>(
  name: string,
  op: string,
  fn: (span: Span | undefined) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  return Sentry.startSpan(
    {
      name,
      op,
      attributes,
    },
    async (span) => {
      try {
        return await fn(span);
      } catch (error) {
        span?.setStatus({ code: SPAN_STATUS_ERROR, message: String(error) });
        throw error;
      }
    }
  );
}

/**
 * Wrap a fetch call with tracing.
 * Adds HTTP-specific attributes to the span. The query string is left
 * out of the recorded URL since it may carry codes or tokens.
 */
export async function tracedFetch(
  url: string,
  options?: RequestInit,
  spanName?: string
): Promise<Response> {
  const parsedUrl = new URL(url);
  const method = options?.method ?? "GET";

  return withSpan(
    spanName ?? `HTTP ${method} ${parsedUrl.hostname}${parsedUrl.pathname}`,
    SPAN_OPERATIONS.HTTP_CLIENT,
    async (span) => {
      span?.setAttributes({
        [SPAN_ATTRIBUTES.HTTP_METHOD]: method,
        [SPAN_ATTRIBUTES.HTTP_URL]: `${parsedUrl.origin}${parsedUrl.pathname}`,
        [SPAN_ATTRIBUTES.HTTP_HOST]: parsedUrl.hostname,
      });

      const response = await fetch(url, options);

      span?.setAttribute(SPAN_ATTRIBUTES.HTTP_STATUS_CODE, response.status);

      if (!response.ok) {
        span?.setStatus({
          code: SPAN_STATUS_ERROR,
          message: `HTTP ${response.status}`,
        });
      }

      return response;
    }
  );
}

/**
 * Add a breadcrumb for debugging.
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = "info",
  data?: Record<string, unknown>
): void {
  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
  });
}
