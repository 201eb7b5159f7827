/**
 * Structured logger
 * Human-readable lines in development, one JSON object per line otherwise.
 * `LOG_LEVEL` raises or lowers the threshold; debug is on only in development
 * unless it is set.
 */

import { AuthError } from "~/utils/errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  component?: string;
  projectId?: string;
  uid?: string;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  code?: string;
  category?: string;
  cause?: string;
  stack?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

function thresholdFromEnv(isDevelopment: boolean): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return SEVERITY[configured];
  }
  return isDevelopment ? SEVERITY.debug : SEVERITY.info;
}

function serializeError(error: unknown, withStack: boolean): unknown {
  if (!(error instanceof Error)) {
    return error;
  }
  const out: SerializedError = { message: error.message, name: error.name };
  if (error instanceof AuthError) {
    out.code = error.code;
    out.category = error.category;
  }
  if (error.cause instanceof Error) {
    out.cause = error.cause.message;
  }
  if (withStack) {
    out.stack = error.stack;
  }
  return out;
}

export class Logger {
  private readonly isDevelopment: boolean;
  private readonly threshold: number;

  constructor(private readonly bound: LogContext = {}) {
    this.isDevelopment = process.env.NODE_ENV === "development";
    this.threshold = thresholdFromEnv(this.isDevelopment);
  }

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (SEVERITY[level] < this.threshold) {
      return;
    }
    const merged = { ...this.bound, ...context };

    if (this.isDevelopment) {
      const hasContext = Object.keys(merged).length > 0;
      console.log(`[${level.toUpperCase()}]`, message, hasContext ? merged : "");
      return;
    }
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...merged,
      }),
    );
  }

  debug(message: string, context?: LogContext) {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext) {
    this.write("error", message, {
      ...context,
      error: serializeError(error, this.isDevelopment),
    });
  }

  /**
   * Child logger that adds `context` to every entry. Per-call fields win
   * over bound ones.
   */
  withContext(context: LogContext): Logger {
    return new Logger({ ...this.bound, ...context });
  }
}

export const logger = new Logger();
