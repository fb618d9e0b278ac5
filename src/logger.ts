/**
 * Leveled console logger. Every line carries a context tag:
 *
 *   logger.debug("search", "A -> C")
 *   // → [net-paths:search] A -> C
 *
 * A message may be a thunk; it is only called when the level is enabled.
 */

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export type LogMessage = string | (() => string);

export interface Logger {
  readonly level: LogLevel;
  error(ctx: string, msg: LogMessage): void;
  warn(ctx: string, msg: LogMessage): void;
  info(ctx: string, msg: LogMessage): void;
  debug(ctx: string, msg: LogMessage): void;
}

const PREFIX = "net-paths";

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

const enabled = (current: LogLevel, wanted: LogLevel): boolean =>
  LOG_LEVELS.indexOf(wanted) <= LOG_LEVELS.indexOf(current);

export const createLogger = (level: LogLevel, sink: LogSink = consoleSink): Logger => {
  const write = (wanted: Exclude<LogLevel, "silent">) => (ctx: string, msg: LogMessage): void => {
    if (enabled(level, wanted)) {
      const text = typeof msg === "string" ? msg : msg();
      sink(wanted, `[${PREFIX}:${ctx}] ${text}`);
    }
  };

  return {
    level,
    error: write("error"),
    warn: write("warn"),
    info: write("info"),
    debug: write("debug"),
  };
};

export const silentLogger: Logger = createLogger("silent");
