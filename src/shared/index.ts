/**
 * Shared utilities exports
 */

export { createLogger, Logger, type LogContext } from "./logger.js";
export {
  AuthError,
  ConfigurationError,
  NotConfiguredError,
  CredentialValidationError,
  OidcApiError,
  LegacyAuthApiError,
  AuthorizationError,
  CallbackStateMismatchError,
  UnsupportedRedirectHostError,
  AuthorizationTimeoutError,
  DeviceAuthorizationError,
  TokenValidationError,
  UnknownSigningKeyError,
  NonceMismatchError,
  NotImplementedForMechanismError,
  PromptCancelledError,
  formatErrorMessage,
  type DeviceAuthorizationFailure,
  type RawResponse,
} from "./errors.js";
export { withRetry, isRetryable, type RetryOptions } from "./retry.js";
export { withTimeout, sleep, TimeoutError } from "./timeout.js";
export { Lazy } from "./lazy.js";
export {
  withSpan,
  tracedFetch,
  addBreadcrumb,
  SPAN_ATTRIBUTES,
  SPAN_OPERATIONS,
  type Span,
} from "./tracing.js";
