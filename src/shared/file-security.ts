/**
 * File Security Utilities
 *
 * Credential files hold bearer secrets, so only the owner may read them.
 *
 * Permissions:
 * - Directories: 0700 (owner: rwx, group: ---, others: ---)
 * - Files: 0600 (owner: rw-, group: ---, others: ---)
 *
 * IMPORTANT: chmod is a no-op on Windows, so we check platform first.
 */

import { chmodSync } from "node:fs";
import { createLogger } from "./logger.js";

const logger = createLogger("FileSecurity");

/** Mode for credential files */
export const SECURE_FILE_MODE = 0o600;

/** Mode for directories created to hold credential files */
export const SECURE_DIRECTORY_MODE = 0o700;

function isUnixPlatform(): boolean {
  return process.platform !== "win32";
}

/**
 * Set secure permissions on a file (sync).
 * File permissions: 0600 (owner read/write only)
 *
 * @param filePath - Path to the file
 * @returns true if permissions were set, false if skipped or failed
 */
export function setSecureFilePermissionsSync(filePath: string): boolean {
  if (!isUnixPlatform()) {
    logger.debug("Skipping file permissions on Windows", { path: filePath });
    return false;
  }

  try {
    chmodSync(filePath, SECURE_FILE_MODE);
    logger.debug("Set secure file permissions (0600)", { path: filePath });
    return true;
  } catch (error) {
    logger.warn("Failed to set file permissions", { path: filePath, error: String(error) });
    return false;
  }
}

/**
 * Set secure permissions on a directory (sync).
 * Directory permissions: 0700 (owner read/write/execute only)
 *
 * @param dirPath - Path to the directory
 * @returns true if permissions were set, false if skipped or failed
 */
export function setSecureDirectoryPermissionsSync(dirPath: string): boolean {
  if (!isUnixPlatform()) {
    logger.debug("Skipping directory permissions on Windows", { path: dirPath });
    return false;
  }

  try {
    chmodSync(dirPath, SECURE_DIRECTORY_MODE);
    logger.debug("Set secure directory permissions (0700)", { path: dirPath });
    return true;
  } catch (error) {
    logger.warn("Failed to set directory permissions", { path: dirPath, error: String(error) });
    return false;
  }
}
