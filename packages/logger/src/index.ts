export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export {
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
