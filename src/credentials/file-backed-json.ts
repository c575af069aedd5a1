/**
 * File-backed JSON Object
 *
 * Lazy-load / lazy-reload persistence primitive. Data may start out unset
 * so that it can be loaded just in time, but it is never set or loaded to
 * an invalid value: every write path runs the subtype's schema first.
 *
 * Out-of-band updates (another process refreshing the same credential file)
 * are picked up by lazyReload(), which compares the file's modification time
 * against the time this object last loaded or saved. That comparison is the
 * only coordination between processes sharing one file.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { CredentialValidationError, NotConfiguredError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { defaultJsonStorage, type JsonObjectStorage } from "./storage.js";

const logger = createLogger("FileBackedJson");

export type JsonObject = Record<string, unknown>;

export type JsonObjectSchema<T extends JsonObject> = ZodType<T, ZodTypeDef, unknown>;

export interface FileBackedJsonObjectOptions<T extends JsonObject> {
  /** Initial data. Validated immediately. */
  readonly data?: T;
  /** Backing file. Without one the object is purely in-memory. */
  readonly filePath?: string;
  /** Persistence implementation (default: local files) */
  readonly storage?: JsonObjectStorage;
}

export class FileBackedJsonObject<T extends JsonObject> {
  private readonly schema: JsonObjectSchema<T>;
  private readonly storage: JsonObjectStorage;
  private filePath: string | undefined;
  private currentData: T | undefined;
  private lastLoadTimeMs = 0;
  private dataTimeMs = 0;

  constructor(schema: JsonObjectSchema<T>, options: FileBackedJsonObjectOptions<T> = {}) {
    this.schema = schema;
    this.storage = options.storage ?? defaultJsonStorage;
    this.filePath = options.filePath;
    if (options.data !== undefined) {
      this.currentData = this.checkData(options.data);
      this.lastLoadTimeMs = Date.now();
      this.dataTimeMs = this.lastLoadTimeMs;
    }
  }

  path(): string | undefined {
    return this.filePath;
  }

  setPath(filePath: string | undefined): void {
    this.filePath = filePath;
  }

  /** Current in-memory data, without touching the backing file */
  data(): T | undefined {
    return this.currentData;
  }

  /** Epoch milliseconds of the last successful load, save or setData */
  loadTime(): number {
    return this.lastLoadTimeMs;
  }

  /**
   * Epoch milliseconds at which the held data was written: the backing
   * file's modification time for loaded data, else when it was set or saved.
   * Unlike loadTime(), this survives a process restart.
   */
  dataTime(): number {
    return this.dataTimeMs;
  }

  setData(data: T): void {
    this.currentData = this.checkData(data);
    this.lastLoadTimeMs = Date.now();
    this.dataTimeMs = this.lastLoadTimeMs;
  }

  /**
   * Validate data against the subtype's schema. Returns the parsed value.
   *
   * @throws CredentialValidationError
   */
  checkData(data: unknown): T {
    const result = this.schema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      );
      throw new CredentialValidationError(
        `Invalid data${this.filePath ? ` in file ${this.filePath}` : ""}: ${issues.join("; ")}`,
        this.filePath,
        issues
      );
    }
    return result.data;
  }

  /**
   * Force a load from the backing file. All-or-nothing: when reading or
   * validation fails, the in-memory data is left as it was.
   *
   * @throws NotConfiguredError when no file path is set
   * @throws CredentialValidationError when the file content is invalid
   */
  load(): void {
    const filePath = this.requirePath("load");

    let raw: unknown;
    try {
      raw = this.storage.read(filePath);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new CredentialValidationError(
          `File ${filePath} does not contain valid JSON: ${error.message}`,
          filePath
        );
      }
      throw error;
    }

    const modifiedTimeMs = this.storage.modifiedTimeMs(filePath);
    this.currentData = this.checkData(raw);
    this.lastLoadTimeMs = Date.now();
    this.dataTimeMs = Math.floor(modifiedTimeMs);
    logger.debug("Loaded file-backed object", { path: filePath });
  }

  /**
   * Write the current data to the backing file.
   *
   * @throws NotConfiguredError when no file path is set
   * @throws CredentialValidationError when there is no valid data to save
   */
  save(): void {
    const filePath = this.requirePath("save");
    const data = this.checkData(this.currentData);

    this.storage.write(filePath, data);
    this.lastLoadTimeMs = Date.now();
    this.dataTimeMs = this.lastLoadTimeMs;
    logger.debug("Saved file-backed object", { path: filePath });
  }

  /**
   * Load from the backing file only if no data is held in memory yet.
   */
  lazyLoad(): void {
    if (this.currentData === undefined) {
      this.load();
    }
  }

  /**
   * Load when unset; otherwise reload only if the backing file changed after
   * the last load or save. In-memory objects without a path are left alone.
   */
  lazyReload(): void {
    if (this.currentData === undefined) {
      this.load();
      return;
    }

    if (!this.filePath) {
      return;
    }

    if (Math.floor(this.storage.modifiedTimeMs(this.filePath)) > this.lastLoadTimeMs) {
      logger.debug("Backing file changed out of band, reloading", { path: this.filePath });
      this.load();
    }
  }

  /** Lazy-load, then read one field */
  lazyGet<K extends keyof T>(field: K): T[K] {
    this.lazyLoad();
    const data = this.checkData(this.currentData);
    return data[field];
  }

  private requirePath(operation: "load" | "save"): string {
    if (!this.filePath) {
      throw new NotConfiguredError(`Cannot ${operation} data. File path is not set.`);
    }
    return this.filePath;
  }
}
