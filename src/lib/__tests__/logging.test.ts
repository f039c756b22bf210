import { afterEach, describe, expect, it, vi } from "vitest";
import {
  configureLogging,
  createLogger,
  formatLogMessage,
  LogCategory,
  LogLevel,
  parseLogLevel,
  resetLogging,
} from "../logging";

const createSink = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

afterEach(() => {
  resetLogging();
});

describe("logging", () => {
  it("prefixes the level and category", () => {
    expect(formatLogMessage(LogLevel.ERROR, LogCategory.CONSOLE, "boom")).toBe(
      "ERROR [console] boom"
    );
  });

  it("drops messages below the global level", () => {
    const sink = createSink();
    configureLogging({ sink, globalLevel: LogLevel.WARN });
    const logger = createLogger(LogCategory.ENGINE);

    logger.info("hidden");
    logger.warn("shown", 3);

    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("WARN  [engine] shown", 3);
  });

  it("lets a category override the global level", () => {
    const sink = createSink();
    configureLogging({
      sink,
      globalLevel: LogLevel.NONE,
      categoryLevels: { [LogCategory.INPUT]: LogLevel.DEBUG },
    });

    createLogger(LogCategory.INPUT).debug("key");
    createLogger(LogCategory.SESSION).error("silenced");

    expect(sink.debug).toHaveBeenCalledWith("DEBUG [input] key");
    expect(sink.error).not.toHaveBeenCalled();
  });

  it("parses level names", () => {
    expect(parseLogLevel("Warn")).toBe(LogLevel.WARN);
    expect(parseLogLevel("none")).toBe(LogLevel.NONE);
    expect(() => parseLogLevel("loud")).toThrow("Unknown log level: loud");
  });
});
