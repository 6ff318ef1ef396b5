/**
 * Logging for chat adapters.
 *
 * Each adapter owns a logger for its lifetime. Nothing is configured at
 * import time: transports (and the optional log directory) are created only
 * when `createLogger` is called.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import winston from "winston";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Structured fields attached to a log line. */
export type LogMeta = Record<string, unknown>;

/**
 * The logging collaborator consumed by the retry executor and the adapters.
 * A winston logger satisfies it; tests pass plain `vi.fn()` objects.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  /** Shown on every line and used as the log file prefix. */
  name: string;
  /** Minimum level. Defaults to `CHAT_LOG_LEVEL` or "info". */
  level?: string;
  /** When set, also write to `<logDir>/<name>-<YYYYMMDDHHmmss>.log`. */
  logDir?: string;
  /** Drop every line (useful in scripts that print their own output). */
  silent?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Compact local timestamp for log file names, e.g. "20260102030405". */
export function fileStamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `timestamp - name - LEVEL - message {meta}` */
export function formatLine(info: Record<string, unknown>): string {
  const { timestamp, label, level, message, ...meta } = info;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} - ${String(label)} - ${String(level).toUpperCase()} - ${String(message)}${extra}`;
}

function createFileTransport(logDir: string, name: string) {
  fs.mkdirSync(logDir, { recursive: true });
  return new winston.transports.File({
    filename: path.join(logDir, `${name}-${fileStamp()}.log`),
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Build a winston logger for one adapter instance. */
export function createLogger(options: LoggerOptions): Logger {
  const stdout = new winston.transports.Console();
  const transports = options.logDir
    ? [stdout, createFileTransport(options.logDir, options.name)]
    : [stdout];

  return winston.createLogger({
    level: options.level ?? process.env.CHAT_LOG_LEVEL ?? "info",
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.label({ label: options.name }),
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.printf((info) => formatLine(info)),
    ),
    transports,
  });
}
