/**
 * Structured logging utilities for the storage demo
 */

import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Map the command-line level names onto logger levels.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toUpperCase()) {
    case "DEBUG":
      return "debug";
    case "INFO":
      return "info";
    case "WARNING":
    case "WARN":
      return "warn";
    case "ERROR":
    case "CRITICAL":
      return "error";
    case "TRACE":
      return "trace";
    default:
      return undefined;
  }
}

/**
 * Returns true when `level` is at or above `minLevel`.
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!isLevelEnabled(level, this.minLevel)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;

    switch (level) {
      case "error":
        console.error(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
      case "debug":
      case "trace":
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Transport decorator tracing each round trip at debug level.
 */
export class LoggingTransport implements HttpTransport {
  constructor(
    private readonly inner: HttpTransport,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const started = this.now();
    this.logger.debug("HTTP request", { method: request.method, url: request.url });

    try {
      const response = await this.inner.send(request);
      this.logger.debug("HTTP response", {
        method: request.method,
        url: request.url,
        status: response.status,
        durationMs: this.now() - started,
      });
      return response;
    } catch (error) {
      this.logger.debug("HTTP request failed", {
        method: request.method,
        url: request.url,
        error: error instanceof Error ? error.message : String(error),
        durationMs: this.now() - started,
      });
      throw error;
    }
  }
}
