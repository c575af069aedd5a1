/**
 * Configuration
 *
 * Environment-based configuration with validation.
 * All environment variables are prefixed with IMAGERY_AUTH_.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { parseDurationMs } from "./validation.js";
import {
  DEFAULT_CALLBACK_TIMEOUT_MS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JWKS_MIN_FETCH_INTERVAL_MS,
} from "../shared/constants.js";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface Config {
  readonly nodeEnv: "development" | "production" | "test";
  readonly logLevel: LogLevel;
  /** Optional file sink for log lines, in addition to stderr */
  readonly logFile: string | undefined;
  /** Timeout applied to every call to the authorization server */
  readonly httpTimeoutMs: number;
  /** How long the loopback listener waits for the browser redirect */
  readonly callbackTimeoutMs: number;
  /** Minimum interval between JWKS fetches triggered by unknown key ids */
  readonly jwksMinFetchIntervalMs: number;
  /** Root directory holding one sub-directory per auth profile */
  readonly profileRoot: string;
  /** Profile selected when the caller names none */
  readonly profile: string | undefined;
  /** Explicit auth client config file, overriding the profile lookup */
  readonly authClientConfigFile: string | undefined;
  /** Explicit credential file, overriding the profile lookup */
  readonly tokenFile: string | undefined;
}

let cachedConfig: Config | null = null;

/**
 * Get library configuration.
 * Configuration is cached after first load.
 */
export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);

  cachedConfig = {
    nodeEnv,
    logLevel: parseLogLevel(process.env.IMAGERY_AUTH_LOG_LEVEL, nodeEnv),
    logFile: process.env.IMAGERY_AUTH_LOG_FILE,
    httpTimeoutMs: parseDurationMs(
      "IMAGERY_AUTH_HTTP_TIMEOUT",
      process.env.IMAGERY_AUTH_HTTP_TIMEOUT,
      DEFAULT_HTTP_TIMEOUT_MS
    ),
    callbackTimeoutMs: parseDurationMs(
      "IMAGERY_AUTH_CALLBACK_TIMEOUT",
      process.env.IMAGERY_AUTH_CALLBACK_TIMEOUT,
      DEFAULT_CALLBACK_TIMEOUT_MS
    ),
    jwksMinFetchIntervalMs: parseDurationMs(
      "IMAGERY_AUTH_JWKS_MIN_FETCH_INTERVAL",
      process.env.IMAGERY_AUTH_JWKS_MIN_FETCH_INTERVAL,
      DEFAULT_JWKS_MIN_FETCH_INTERVAL_MS
    ),
    profileRoot: process.env.IMAGERY_AUTH_HOME ?? join(homedir(), ".imagery-auth"),
    profile: process.env.IMAGERY_AUTH_PROFILE,
    authClientConfigFile: process.env.IMAGERY_AUTH_CLIENT_CONFIG_FILE,
    tokenFile: process.env.IMAGERY_AUTH_TOKEN_FILE,
  };

  return cachedConfig;
}

function parseNodeEnv(value: string | undefined): Config["nodeEnv"] {
  if (value === "production" || value === "test") {
    return value;
  }
  return "development";
}

/**
 * Parse log level from environment, with sensible defaults.
 */
function parseLogLevel(value: string | undefined, nodeEnv: Config["nodeEnv"]): LogLevel {
  if (value) {
    const upper = value.toUpperCase();
    if (isLogLevel(upper)) {
      return upper;
    }
  }

  // Default: DEBUG in development, INFO in production, quiet under test runners
  if (nodeEnv === "production") {
    return "INFO";
  }
  return nodeEnv === "test" ? "WARN" : "DEBUG";
}

function isLogLevel(value: string): value is LogLevel {
  return ["DEBUG", "INFO", "WARN", "ERROR"].includes(value);
}

/**
 * Reset config cache (useful for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
