// packages/logging/src/index.ts

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { redact } from "./redact";

export { redact, describeToken, isSensitiveKey, REDACTED } from "./redact";
export type { TokenShape } from "./redact";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    value === "debug" || value === "info" || value === "warn" || value === "error"
  );
}

/**
 * One structured log line.
 */
export interface LogEvent {
  ts: string;
  level: LogLevel;
  msg: string;

  serviceName?: string;
  environment?: string;

  [key: string]: unknown;
}

/**
 * Where events go. The default sink prints one JSON line to the console.
 */
export type LogSink = (event: LogEvent) => void;

export interface LoggerConfig {
  serviceName?: string;
  environment?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  /** Logger that adds `bindings` to every event. */
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Console sink: single-line JSON for easy ingestion, warn/error on stderr.
 */
export function createConsoleSink(): LogSink {
  return (event: LogEvent) => {
    const line = JSON.stringify(event);
    // eslint-disable-next-line no-console
    if (event.level === "error") console.error("[tokenrelay]", line);
    // eslint-disable-next-line no-console
    else if (event.level === "warn") console.warn("[tokenrelay]", line);
    // eslint-disable-next-line no-console
    else console.log("[tokenrelay]", line);
  };
}

/**
 * Leveled logger. Every meta object passes through `redact` before it
 * reaches the sink, so tokens and secrets under well-known keys never print.
 */
export function createLogger(
  config: LoggerConfig = {},
  bindings: Record<string, unknown> = {}
): Logger {
  const serviceName = config.serviceName ?? "tokenrelay";
  const environment = config.environment ?? process.env.NODE_ENV ?? "dev";
  const threshold = LEVEL_ORDER[config.level ?? "info"];
  const sink = config.sink ?? createConsoleSink();

  const emit = (
    level: LogLevel,
    msg: string,
    meta: Record<string, unknown> = {}
  ) => {
    if (LEVEL_ORDER[level] < threshold) return;

    const fields = redact({ ...bindings, ...meta });
    const event: LogEvent = {
      ...(fields && typeof fields === "object" ? fields : {}),
      ts: new Date().toISOString(),
      level,
      msg,
      serviceName,
      environment,
    };

    try {
      sink(event);
    } catch (err) {
      // Never break user traffic because logging failed
      // eslint-disable-next-line no-console
      console.error("[logging:sink_error]", err);
    }
  };

  return {
    debug: (msg, meta) => emit("debug", msg, meta),
    info: (msg, meta) => emit("info", msg, meta),
    warn: (msg, meta) => emit("warn", msg, meta),
    error: (msg, meta) => emit("error", msg, meta),
    child: (extra) => createLogger(config, { ...bindings, ...extra }),
  };
}

/**
 * Logger that drops everything. Handy default for library code.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Express middleware that emits one "http.request" event when a response
 * finishes. Picks up `requestId` and `subject` from res.locals when an
 * earlier middleware stashed them there.
 */
export function requestLoggingMiddleware(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();

    res.on("finish", () => {
      const latencyMs = Date.now() - startedAt;

      const locals: Record<string, unknown> = res.locals;
      const headerId = req.headers["x-request-id"];
      const requestId =
        typeof locals.requestId === "string"
          ? locals.requestId
          : typeof headerId === "string"
          ? headerId
          : undefined;
      const subject =
        typeof locals.subject === "string" ? locals.subject : undefined;

      const level: LogLevel = res.statusCode >= 500 ? "error" : "info";
      logger[level]("http.request", {
        requestId,
        subject,
        http: {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          latencyMs,
        },
      });
    });

    next();
  };
}
