import { describe, expect, it } from "vitest";

import {
  isBaseLogger,
  loggerFactory,
  resolveLoggerConfig,
  silentLogger,
} from "./index.mjs";

const capture = () => {
  const lines: unknown[] = [];
  const destination = {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  };
  return { lines, destination };
};

describe("loggerFactory", () => {
  it("should create a logger", () => {
    const { logger } = loggerFactory({ level: "silent" });
    expect(logger).toBeDefined();
  });

  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory({ level: "silent" });
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should write messages with their metadata", () => {
    const { lines, destination } = capture();
    const { logger } = loggerFactory({ level: "info", destination });

    logger.info("test message", { key: "value" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "test message",
      key: "value",
    });
  });

  it("should log errors under err with their message", () => {
    const { lines, destination } = capture();
    const { logger } = loggerFactory({ level: "info", destination });

    logger.error(new Error("boom"), { origin: "block(item)" });

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "boom",
      origin: "block(item)",
      err: { message: "boom" },
    });
  });

  it("should drop lines below the configured level", () => {
    const { lines, destination } = capture();
    const { logger } = loggerFactory({ level: "warn", destination });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: "shown" });
  });
});

describe("silentLogger", () => {
  it("should accept calls without output", () => {
    expect(() => silentLogger.fatal("ignored")).not.toThrow();
    expect(isBaseLogger(silentLogger)).toBe(true);
  });
});

describe("isBaseLogger", () => {
  it("should reject values missing a level method", () => {
    expect(isBaseLogger({ info: () => undefined })).toBe(false);
    expect(isBaseLogger(null)).toBe(false);
  });
});

describe("resolveLoggerConfig", () => {
  it("should apply defaults", () => {
    expect(resolveLoggerConfig({})).toEqual({ level: "info", name: "blockwise" });
  });

  it("should read level and name", () => {
    expect(
      resolveLoggerConfig({
        BLOCKWISE_LOG_LEVEL: "silent",
        BLOCKWISE_LOG_NAME: "worker",
      }),
    ).toEqual({ level: "silent", name: "worker" });
  });

  it("should reject unknown levels", () => {
    expect(() => resolveLoggerConfig({ BLOCKWISE_LOG_LEVEL: "loud" })).toThrow(
      TypeError,
    );
    expect(() => resolveLoggerConfig({ BLOCKWISE_LOG_LEVEL: "loud" })).toThrow(
      /BLOCKWISE_LOG_LEVEL/,
    );
  });

  it("should reject a blank name", () => {
    expect(() => resolveLoggerConfig({ BLOCKWISE_LOG_NAME: "  " })).toThrow(
      /BLOCKWISE_LOG_NAME/,
    );
  });
});
