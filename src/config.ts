import { createLogger, isLogLevel, Logger, LogLevel } from "./logger";

export interface NetConfig {
  readonly logger: Logger;
}

export const LOG_LEVEL_ENV = "NET_PATHS_LOG_LEVEL";

const DEFAULT_LOG_LEVEL: LogLevel = "silent";

export const logLevelFrom = (env: NodeJS.ProcessEnv): LogLevel => {
  const value = env[LOG_LEVEL_ENV];
  return typeof value !== "undefined" && isLogLevel(value)
    ? value
    : DEFAULT_LOG_LEVEL;
};

export const defaultConfig = (env: NodeJS.ProcessEnv = process.env): NetConfig => ({
  logger: createLogger(logLevelFrom(env)),
});

export const resolveConfig = (overrides: Partial<NetConfig> = {}): NetConfig => ({
  ...defaultConfig(),
  ...overrides,
});
