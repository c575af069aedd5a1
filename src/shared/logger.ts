/**
 * Structured Logger
 *
 * Plain-text lines on stderr, plus an optional append-only file sink
 * (IMAGERY_AUTH_LOG_FILE).
 *
 * Log data passes through redaction before it is written: values under
 * secret-bearing keys (tokens, secrets, passwords, API keys, assertions,
 * PKCE verifiers, authorization codes) are masked, and credential paths
 * under the home directory are shortened to `~`.
 *
 * Lines carry the active OpenTelemetry trace id when there is one.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, sep } from "node:path";
import { trace } from "@opentelemetry/api";
import { getConfig, type LogLevel } from "../config/index.js";
import { maskSecret } from "../config/validation.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export type LogContext = Record<string, unknown>;

/** Keys whose string values are never logged in full */
const SECRET_KEY_PATTERN = /(token|secret|password|api_?key|assertion|verifier)$|^(code|authorization)$/i;

/** Keys holding filesystem paths */
const PATH_KEY_PATTERN = /^(path|filePath|tokenFile|configPath|logFile)$/;

/**
 * Mask secrets and shorten paths in log data. Nested plain objects and
 * arrays are walked; other values pass through.
 */
export function redactLogContext(data: LogContext): LogContext {
  const redacted: LogContext = {};
  for (const [key, value] of Object.entries(data)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === "string") {
    if (SECRET_KEY_PATTERN.test(key)) {
      return maskSecret(value);
    }
    return PATH_KEY_PATTERN.test(key) ? shortenHomePath(value) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(key, item));
  }
  if (isPlainObject(value)) {
    return redactLogContext(value);
  }
  return value;
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function shortenHomePath(path: string): string {
  const home = homedir();
  return path === home || path.startsWith(home + sep) ? `~${path.slice(home.length)}` : path;
}

function traceIdPrefix(): string {
  const traceId = trace.getActiveSpan()?.spanContext().traceId;
  return traceId ? ` [${traceId.slice(0, 8)}]` : "";
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    const code: unknown = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(typeof code === "string" ? { errorCode: code } : {}),
      stack: error.stack,
    };
  }
  if (typeof error === "object") {
    return JSON.stringify(error);
  }
  return String(error);
}

/**
 * Append-only log file, created owner-only on first write. Failures go to
 * stderr once per process and never interrupt the caller.
 */
class FileSink {
  private failed = false;

  constructor(private readonly logPath: string) {}

  write(line: string): void {
    if (this.failed) {
      return;
    }
    try {
      mkdirSync(dirname(this.logPath), { recursive: true });
      appendFileSync(this.logPath, `${line}\n`, { mode: 0o600 });
    } catch (error) {
      this.failed = true;
      process.stderr.write(`[logger] could not write ${this.logPath}: ${String(error)}\n`);
    }
  }
}

const fileSinks = new Map<string, FileSink>();

function fileSinkFor(logPath: string): FileSink {
  let sink = fileSinks.get(logPath);
  if (!sink) {
    sink = new FileSink(logPath);
    fileSinks.set(logPath, sink);
  }
  return sink;
}

export class Logger {
  private readonly context: string;
  private readonly minLevel: number;
  private readonly fileSink: FileSink | undefined;

  constructor(context: string) {
    const config = getConfig();
    this.context = context;
    this.minLevel = LOG_LEVELS[config.logLevel];
    this.fileSink = config.logFile ? fileSinkFor(config.logFile) : undefined;
  }

  debug(message: string, data?: LogContext): void {
    this.log("DEBUG", message, data);
  }

  info(message: string, data?: LogContext): void {
    this.log("INFO", message, data);
  }

  warn(message: string, data?: LogContext): void {
    this.log("WARN", message, data);
  }

  error(message: string, error?: unknown, data?: LogContext): void {
    const errorData: LogContext = { ...data };
    if (error !== undefined && error !== null) {
      errorData.error = describeError(error);
    }
    this.log("ERROR", message, errorData);
  }

  private log(level: LogLevel, message: string, data?: LogContext): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }

    const fields = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(redactLogContext(data))}` : "";
    const line = `[${new Date().toISOString()}] ${level.padEnd(5)} [${this.context}${traceIdPrefix()}] ${message}${fields}`;

    process.stderr.write(`${line}\n`);
    this.fileSink?.write(line);
  }
}

/**
 * Create a logger for a specific context.
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
