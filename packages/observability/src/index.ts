// packages/observability/src/index.ts

export {
  consoleSink,
  createLogger,
  createNoopLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogSink,
} from "./logger";
export { redactForLog } from "./redaction";
export { CORRELATION_HEADER, correlationMiddleware, type CorrelationOptions } from "./correlation";
export { requestLoggingMiddleware } from "./requestLogging";
export { healthRoutes } from "./health";
export { corsMiddleware, type CorsConfig } from "./cors";
