/**
 * Configuration Validation Utilities
 *
 * Provides validation and masking for sensitive configuration values.
 * No logging here: the logger reads config. Errors are thrown to the caller.
 */

/**
 * Parse a duration given in seconds (integer or decimal) into milliseconds.
 *
 * @param name - Environment variable name, for the error message
 * @param value - Raw value, or undefined when unset
 * @param defaultMs - Value used when unset
 * @throws Error if the value is set but not a non-negative number
 */
export function parseDurationMs(name: string, value: string | undefined, defaultMs: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultMs;
  }

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative number of seconds (got: ${value})`);
  }

  return Math.round(seconds * 1000);
}

/**
 * Mask a secret for safe logging.
 *
 * Shows first 3 and last 4 characters, masks the rest.
 * Example: eyJ...x9Qk
 *
 * @param secret - The token, key or password to mask
 * @returns Masked string
 */
export function maskSecret(secret: string | undefined | null): string {
  if (!secret || secret.length < 12) {
    return "***";
  }

  const prefix = secret.slice(0, 3);
  const suffix = secret.slice(-4);
  return `${prefix}...${suffix}`;
}
