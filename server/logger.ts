/**
 * Structured logger
 *
 * Leveled logging over the console. Production emits one JSON object per line
 * (aggregation friendly: level, levelName, hostname, pid, timestamp); every other
 * environment prints `[timestamp] [LEVEL] message {context}`.
 *
 * Sensitive keys are masked before anything is written.
 */

import os from "node:os";
import { LOG_LEVELS } from "./config/constants";

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = ["password", "token", "secret", "email", "authorization", "cookie", "privatekey"];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((needle) => lower.includes(needle));
}

function serializeError(error: Error): LogContext {
  const out: LogContext = { name: error.name, message: error.message };
  if (error.stack) out.stack = error.stack;
  if (error.cause !== undefined) {
    out.cause = error.cause instanceof Error ? serializeError(error.cause) : error.cause;
  }
  return out;
}

function isRecord(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_VALUES, value);
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || value === null) continue;

    if (isSensitiveKey(key)) {
      result[key] = Array.isArray(value) ? value.map(() => "***") : "***";
      continue;
    }

    if (value instanceof Error) {
      result[key] = serializeError(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? redact(item) : item));
    } else if (value instanceof Date) {
      result[key] = value.toISOString();
    } else if (isRecord(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

class Logger {
  constructor(
    private readonly bindings: LogContext,
    private readonly minLevel: LogLevel,
    private readonly json: boolean
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.write("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new Logger({ ...this.bindings, ...bindings }, this.minLevel, this.json);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.minLevel]) return;

    const payload = redact({ ...this.bindings, ...context });
    const timestamp = new Date().toISOString();

    let line: string;
    if (this.json) {
      line = JSON.stringify({
        timestamp,
        level: LEVEL_VALUES[level],
        levelName: level,
        hostname: os.hostname(),
        pid: process.pid,
        message,
        ...payload,
      });
    } else {
      const serialized = Object.keys(payload).length > 0 ? ` ${JSON.stringify(payload)}` : "";
      line = `[${timestamp}] [${level.toUpperCase()}] ${message}${serialized}`;
    }

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }
}

export type { Logger };

const logger = new Logger(
  { service: "clipvault", env: process.env.NODE_ENV ?? "development" },
  resolveMinLevel(),
  process.env.NODE_ENV === "production"
);

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
