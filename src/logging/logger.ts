export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Readonly<Record<string, unknown>>;

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context: LogContext;
  readonly timestamp: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly context?: LogContext;
  readonly now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS = new Set<string>(Object.keys(LEVEL_ORDER));

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function formatEntry(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
}

/** One JSON object per line; warnings and errors go to stderr. */
export const jsonLineSink: LogSink = (entry) => {
  const line = formatEntry(entry);
  if (entry.level === "warn" || entry.level === "error") {
    process.stderr.write(line + "\n");
    return;
  }
  process.stdout.write(line + "\n");
};

/** Everything on stderr, leaving stdout to command output. */
export const stderrLineSink: LogSink = (entry) => {
  process.stderr.write(formatEntry(entry) + "\n");
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? jsonLineSink;
  const now = options.now ?? (() => new Date());
  const base = options.context ?? {};

  const write = (
    level: LogLevel,
    message: string,
    context: LogContext = {},
  ): void => {
    if (LEVEL_ORDER[level] < minLevel) {
      return;
    }
    sink({
      level,
      message,
      context: { ...base, ...context },
      timestamp: now().toISOString(),
    });
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (context) =>
      createLogger({ ...options, context: { ...base, ...context } }),
  };
}

export function silentLogger(): Logger {
  return createLogger({ sink: () => undefined });
}
