// packages/observability/src/logger.ts

import { getGatewayContext } from "@tapline/request-context";

import { redactForLog } from "./redaction";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

type EmittableLevel = Exclude<LogLevel, "silent">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 90,
};

/**
 * One structured log line.
 */
export interface LogEntry {
  ts: string;
  level: EmittableLevel;
  component: string;
  event: string;
  service: string;
  environment: string;
  correlationId?: string;
  tenantId?: string;
  subject?: string;
  [field: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerConfig {
  serviceName?: string;
  environment?: string;
  level?: LogLevel;
  component?: string;
  sink?: LogSink;
}

export interface Logger {
  debug(event: string, fields?: Record<string, unknown>): void;
  info(event: string, fields?: Record<string, unknown>): void;
  warn(event: string, fields?: Record<string, unknown>): void;
  error(event: string, fields?: Record<string, unknown>): void;
  /** Same sink and settings, different component tag. */
  child(component: string): Logger;
}

/**
 * Default sink: one JSON line per entry, errors and warnings on stderr.
 */
export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "error" || entry.level === "warn") {
    // eslint-disable-next-line no-console
    console.error(`[${entry.component}]`, line);
  } else {
    // eslint-disable-next-line no-console
    console.log(`[${entry.component}]`, line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured logger. Correlation id, tenant and subject are read from the
 * current GatewayContext, so callers never pass them by hand.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const service = config.serviceName ?? "gateway-server";
  const environment = config.environment ?? process.env.NODE_ENV ?? "dev";
  const threshold = LEVEL_ORDER[config.level ?? "info"];
  const component = config.component ?? "gateway";
  const sink = config.sink ?? consoleSink;

  const emit = (level: EmittableLevel, event: string, fields: Record<string, unknown> = {}) => {
    if (LEVEL_ORDER[level] < threshold) return;

    const ctx = getGatewayContext();
    const entry: LogEntry = {
      ...redactForLog(fields),
      ts: new Date().toISOString(),
      level,
      component,
      event,
      service,
      environment,
      correlationId: ctx?.request.correlationId,
      tenantId: ctx?.identity?.tenantId,
      subject: ctx?.identity?.subject,
    };

    try {
      sink(entry);
    } catch (err) {
      // Never break user traffic because logging failed
      // eslint-disable-next-line no-console
      console.error("[logger_error]", err instanceof Error ? err.message : String(err));
    }
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields),
    child: (childComponent) => createLogger({ ...config, component: childComponent }),
  };
}

export function createNoopLogger(): Logger {
  const noop = () => undefined;
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
