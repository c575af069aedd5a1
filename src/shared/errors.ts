/**
 * Custom Error Classes
 *
 * Structured errors for consistent handling across the library.
 * Callers catch by class; CLI-style callers render one line with
 * formatErrorMessage().
 */

/** Base error for the auth library */
export class AuthError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "AuthError";
    this.code = code;
    this.details = details;
  }
}

/** Missing or malformed configuration (key material, endpoints, config files) */
export class ConfigurationError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, "CONFIGURATION_ERROR", details, options);
    this.name = "ConfigurationError";
  }
}

/** A file-backed object was asked to load or save without a path */
export class NotConfiguredError extends AuthError {
  constructor(message: string) {
    super(message, "NOT_CONFIGURED");
    this.name = "NotConfiguredError";
  }
}

/** Credential data failed the schema of its credential type */
export class CredentialValidationError extends AuthError {
  readonly filePath: string | undefined;
  readonly issues: readonly string[];

  constructor(message: string, filePath: string | undefined, issues: readonly string[] = []) {
    super(message, "CREDENTIAL_INVALID", { filePath, issues });
    this.name = "CredentialValidationError";
    this.filePath = filePath;
    this.issues = issues;
  }
}

/** Snapshot of an authorization server response, kept for diagnostics */
export interface RawResponse {
  readonly status: number;
  readonly statusText: string;
  readonly contentType: string | null;
  readonly body: string;
}

/** HTTP or protocol error from an authorization server endpoint */
export class OidcApiError extends AuthError {
  readonly endpoint: string;
  readonly rawResponse?: RawResponse;
  /** OAuth error code from the response payload, if the server sent one */
  readonly oauthError?: string;

  constructor(
    message: string,
    endpoint: string,
    rawResponse?: RawResponse,
    oauthError?: string,
    options?: ErrorOptions
  ) {
    super(message, "OIDC_API_ERROR", { endpoint, status: rawResponse?.status, oauthError }, options);
    this.name = "OidcApiError";
    this.endpoint = endpoint;
    this.rawResponse = rawResponse;
    this.oauthError = oauthError;
  }
}

/** Failed login against the legacy username/password endpoint */
export class LegacyAuthApiError extends AuthError {
  readonly rawResponse?: RawResponse;

  constructor(message: string, rawResponse?: RawResponse, options?: ErrorOptions) {
    super(message, "LEGACY_AUTH_ERROR", { status: rawResponse?.status }, options);
    this.name = "LegacyAuthApiError";
    this.rawResponse = rawResponse;
  }
}

/** Failure of the interactive part of an authorization flow */
export class AuthorizationError extends AuthError {
  constructor(message: string, code = "AUTHORIZATION_ERROR", details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = "AuthorizationError";
  }
}

/** The callback's state parameter did not match the authorization request */
export class CallbackStateMismatchError extends AuthorizationError {
  constructor(expected: string, received: string | undefined) {
    super(
      `Callback state did not match expected value. Expected: ${expected}, Received: ${received ?? "(none)"}`,
      "CALLBACK_STATE_MISMATCH",
      { expected, received }
    );
    this.name = "CallbackStateMismatchError";
  }
}

/** A loopback listener was configured with a redirect URI that is not loopback */
export class UnsupportedRedirectHostError extends AuthorizationError {
  readonly redirectUri: string;

  constructor(redirectUri: string) {
    super(
      `Unexpected hostname in auth redirect URI. Expected localhost URI, but received "${redirectUri}"`,
      "UNSUPPORTED_REDIRECT_HOST",
      { redirectUri }
    );
    this.name = "UnsupportedRedirectHostError";
    this.redirectUri = redirectUri;
  }
}

/** No authorization callback arrived within the listener window */
export class AuthorizationTimeoutError extends AuthorizationError {
  constructor(timeoutMs: number) {
    super(
      `No authorization callback was received within ${timeoutMs}ms`,
      "AUTHORIZATION_TIMEOUT",
      { timeoutMs }
    );
    this.name = "AuthorizationTimeoutError";
  }
}

export type DeviceAuthorizationFailure = "access_denied" | "expired_token" | "timeout";

/** The device authorization grant ended without tokens */
export class DeviceAuthorizationError extends AuthorizationError {
  readonly reason: DeviceAuthorizationFailure;

  constructor(reason: DeviceAuthorizationFailure, message: string) {
    super(message, "DEVICE_AUTHORIZATION_FAILED", { reason });
    this.name = "DeviceAuthorizationError";
    this.reason = reason;
  }
}

/**
 * Any failure validating a signed token. The underlying reason is
 * available as `cause`.
 */
export class TokenValidationError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "TOKEN_INVALID", undefined, options);
    this.name = "TokenValidationError";
  }
}

/** No verification key with the token's key id could be found */
export class UnknownSigningKeyError extends AuthError {
  readonly keyId: string | undefined;

  constructor(keyId: string | undefined) {
    super(`Could not find signing key for key ID ${keyId ?? "(none)"}`, "UNKNOWN_SIGNING_KEY", {
      keyId,
    });
    this.name = "UnknownSigningKeyError";
    this.keyId = keyId;
  }
}

/** The token's nonce claim did not match the nonce sent with the request */
export class NonceMismatchError extends AuthError {
  constructor() {
    super("Token nonce did not match expected value", "NONCE_MISMATCH");
    this.name = "NonceMismatchError";
  }
}

/** The user dismissed an interactive prompt */
export class PromptCancelledError extends AuthError {
  constructor() {
    super("Prompt cancelled by user", "PROMPT_CANCELLED");
    this.name = "PromptCancelledError";
  }
}

/** The selected auth mechanism has no implementation of a capability */
export class NotImplementedForMechanismError extends AuthError {
  readonly mechanism: string;
  readonly capability: string;

  constructor(mechanism: string, capability: string) {
    super(
      `Operation "${capability}" is not implemented for the "${mechanism}" auth mechanism`,
      "NOT_IMPLEMENTED_FOR_MECHANISM",
      { mechanism, capability }
    );
    this.name = "NotImplementedForMechanismError";
    this.mechanism = mechanism;
    this.capability = capability;
  }
}

/**
 * Render an error as a single line, following `cause` one level down.
 */
export function formatErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const code = error instanceof AuthError ? ` [${error.code}]` : "";
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
  return `${error.name}${code}: ${error.message}${cause}`.replace(/\s*\n\s*/g, " ");
}
