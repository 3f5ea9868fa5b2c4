/**
 * Logger
 *
 * Leveled logging with bound context. Extraction code binds the PDF path
 * once per document and the page number per page, so every line can be
 * traced back to where it came from.
 *
 * Console lines are `timestamp [LEVEL] message key=value ...` (or JSON
 * with LOG_FORMAT=json). The file under LOG_DIR is always JSON lines.
 */

import * as fs from "fs";
import * as path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_DIR = process.env.LOG_DIR || "./logs";
const LOG_FILE = path.join(LOG_DIR, "paperslides.log");

let fileStream: fs.WriteStream | null = null;

function getFileStream(): fs.WriteStream | null {
  if (fileStream) return fileStream;

  try {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    fileStream = fs.createWriteStream(LOG_FILE, { flags: "a" });
    fileStream.on("error", (err) => {
      console.error("Log file write error:", err);
      fileStream = null;
    });
    return fileStream;
  } catch (err) {
    console.error("Failed to open log file:", err);
    return null;
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

/**
 * Errors carry no enumerable fields, so they are reduced to name, message
 * and Node error code before serialization.
 */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const code = "code" in value && typeof value.code === "string" ? value.code : undefined;
    return code ? { name: value.name, message: value.message, code } : { name: value.name, message: value.message };
  }
  return value;
}

function serializeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) out[key] = serializeValue(value);
  }
  return out;
}

function formatPair(key: string, value: unknown): string {
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return `${key}=${String(value)}`;
  }
  if (typeof value === "string" && /^[^\s"=]+$/.test(value)) {
    return `${key}=${value}`;
  }
  return `${key}=${JSON.stringify(value)}`;
}

export class Logger {
  private minLevel: LogLevel;
  private json: boolean;
  private context: LogContext = {};

  constructor() {
    this.minLevel = parseLogLevel(process.env.LOG_LEVEL);
    this.json = process.env.LOG_FORMAT === "json";
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const child = new Logger();
    child.minLevel = this.minLevel;
    child.json = this.json;
    child.context = { ...this.context, ...context };
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatText(entry: LogEntry): string {
    const pairs = Object.entries(entry.context).map(([key, value]) => formatPair(key, value));
    const suffix = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase().padEnd(5)}] ${entry.message}${suffix}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: serializeContext({ ...this.context, ...context }),
    };

    const line = this.json ? JSON.stringify(entry) : this.formatText(entry);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    getFileStream()?.write(JSON.stringify(entry) + "\n");
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }
}

export const logger = new Logger();

export function createLogger(context: LogContext): Logger {
  return logger.child(context);
}

export function closeLogger(): void {
  if (fileStream) {
    fileStream.end();
    fileStream = null;
  }
}
