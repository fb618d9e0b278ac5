import { createLogger, defaultConfig, isLogLevel, logLevelFrom, LogSink, resolveConfig, silentLogger } from ".";

const recorder = () => {
  const lines: string[] = [];
  const sink: LogSink = (level, line) => {
    lines.push(`${level} ${line}`);
  };
  return { lines, sink };
};

describe("createLogger(level, sink)", () => {
  it("prefixes every line with the context", () => {
    const { lines, sink } = recorder();
    const logger = createLogger("debug", sink);

    logger.debug("search", "A -> C");

    expect(lines).toEqual(["debug [net-paths:search] A -> C"]);
  });

  it("drops lines below the configured level", () => {
    const { lines, sink } = recorder();
    const logger = createLogger("warn", sink);

    logger.debug("find", "one");
    logger.info("find", "two");
    logger.warn("find", "three");
    logger.error("find", "four");

    expect(lines).toEqual([
      "warn [net-paths:find] three",
      "error [net-paths:find] four",
    ]);
  });

  it("builds a lazy message only when its level is enabled", () => {
    const { lines, sink } = recorder();
    const logger = createLogger("info", sink);
    const message = jest.fn(() => "A-B-C");

    logger.debug("search", message);
    expect(message).not.toHaveBeenCalled();

    logger.info("search", message);
    expect(message).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(["info [net-paths:search] A-B-C"]);
  });

  it("writes nothing when silent", () => {
    const { lines, sink } = recorder();
    const logger = createLogger("silent", sink);

    logger.error("find", "boom");

    expect(lines).toEqual([]);
  });
});

describe("isLogLevel(value)", () => {
  it("accepts the known levels only", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("configuration", () => {
  it("reads the log level from the environment", () => {
    expect(logLevelFrom({ NET_PATHS_LOG_LEVEL: "debug" })).toBe("debug");
  });

  it("falls back to silent for a missing or unknown level", () => {
    expect(logLevelFrom({})).toBe("silent");
    expect(logLevelFrom({ NET_PATHS_LOG_LEVEL: "loud" })).toBe("silent");
  });

  it("builds the default logger from the environment", () => {
    expect(defaultConfig({ NET_PATHS_LOG_LEVEL: "info" }).logger.level).toBe("info");
  });

  it("lets overrides replace the defaults", () => {
    expect(resolveConfig({ logger: silentLogger }).logger).toBe(silentLogger);
  });
});
