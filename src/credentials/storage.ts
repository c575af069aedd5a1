/**
 * JSON Object Storage
 *
 * The persistence seam behind file-backed credentials. The default
 * implementation reads and writes local files; applications with their own
 * secret store provide another implementation.
 */

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  SECURE_DIRECTORY_MODE,
  SECURE_FILE_MODE,
  setSecureDirectoryPermissionsSync,
  setSecureFilePermissionsSync,
} from "../shared/file-security.js";

export interface JsonObjectStorage {
  /** Read and parse the object at `filePath`. Missing files throw. */
  read(filePath: string): unknown;
  /** Replace the object at `filePath`. Readers never see a partial write. */
  write(filePath: string, data: unknown): void;
  /** Last modification time of `filePath`, in epoch milliseconds */
  modifiedTimeMs(filePath: string): number;
}

/**
 * Local filesystem storage.
 *
 * Writes go to a temp file in the target directory, which is then renamed
 * over the target. Files are indented UTF-8 JSON, mode 0600.
 */
export class FileSystemJsonStorage implements JsonObjectStorage {
  read(filePath: string): unknown {
    const content = readFileSync(filePath, "utf8");
    return JSON.parse(content);
  }

  write(filePath: string, data: unknown): void {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: SECURE_DIRECTORY_MODE });
      // mkdir's mode is masked by the umask
      setSecureDirectoryPermissionsSync(dir);
    }

    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, {
        encoding: "utf8",
        mode: SECURE_FILE_MODE,
      });
      setSecureFilePermissionsSync(tempPath);
      renameSync(tempPath, filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }

  modifiedTimeMs(filePath: string): number {
    return statSync(filePath).mtimeMs;
  }
}

/** Shared default instance; it holds no state */
export const defaultJsonStorage: JsonObjectStorage = new FileSystemJsonStorage();
