/**
 * Library Constants
 *
 * Centralized configuration for magic numbers used throughout the codebase.
 * All numeric values that control behavior should be defined here.
 */

// --- Time Constants (Milliseconds) ---

/** Default timeout for calls to the authorization server (10 seconds) */
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/** Default wait for the browser redirect on the loopback listener (60 seconds) */
export const DEFAULT_CALLBACK_TIMEOUT_MS = 60_000;

/** Minimum interval between JWKS fetches on unknown key ids (5 minutes) */
export const DEFAULT_JWKS_MIN_FETCH_INTERVAL_MS = 300_000;

/** Device flow poll interval when the server does not send one (5 seconds) */
export const DEFAULT_DEVICE_POLL_INTERVAL_MS = 5_000;

/** Added to the device flow poll interval on a slow_down response (5 seconds) */
export const DEVICE_SLOW_DOWN_INCREMENT_MS = 5_000;

// --- Token Lifetimes (Seconds) ---

/** Lifetime of a private-key JWT client assertion */
export const CLIENT_ASSERTION_TTL_SEC = 300;

/** Fraction of an access token's lifetime after which it is refreshed */
export const REFRESH_AT_LIFETIME_FRACTION = 0.75;

// --- Retry Configuration ---

/** Maximum number of retry attempts for discovery and JWKS fetches */
export const MAX_RETRY_ATTEMPTS = 2;

/** Base delay for exponential backoff (500 milliseconds) */
export const RETRY_BASE_DELAY_MS = 500;

/** Maximum delay cap for exponential backoff (5 seconds) */
export const RETRY_MAX_DELAY_MS = 5_000;

// --- Loopback Redirect ---

/** Port used when a loopback redirect URI names none */
export const DEFAULT_REDIRECT_LISTEN_PORT = 80;

/** Host names the loopback listener will bind to */
export const LOOPBACK_HOSTS: readonly string[] = ["localhost", "127.0.0.1"];

// --- PKCE / Nonces ---

/** Random bytes behind a PKCE code verifier (encodes to 128 characters) */
export const PKCE_VERIFIER_BYTES = 96;

/** Digits in the authorization request state parameter */
export const STATE_LENGTH = 8;

/** Digits in the authorization request nonce */
export const NONCE_LENGTH = 32;

// --- Well-known Paths and File Names ---

export const DISCOVERY_PATH = "/.well-known/openid-configuration";

export const AUTH_CLIENT_CONFIG_FILE = "auth_client.json";

export const TOKEN_FILE = "token.json";
