export {
  createLogger,
  formatEntry,
  isLogLevel,
  jsonLineSink,
  silentLogger,
  stderrLineSink,
} from "./logger.js";
export type {
  LogContext,
  LogEntry,
  LogLevel,
  LogSink,
  Logger,
  LoggerOptions,
} from "./logger.js";
