/**
 * Tests for the logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { LoggingConfigSchema } from "../config/types.js";
import { createLogger, resolveLogDir } from "./logger.js";

function spyConsole() {
  return {
    logSpy: vi.spyOn(console, "log").mockImplementation(() => undefined),
    errorSpy: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes info to stdout and warnings to stderr", () => {
    const { logSpy, errorSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({ timestamps: false }));

    logger.info("hello", { a: 1 });
    logger.warn("careful");

    expect(logSpy).toHaveBeenCalledWith('[INFO ] hello {"a":1}');
    expect(errorSpy).toHaveBeenCalledWith("[WARN ] careful");
  });

  it("filters below the configured level", () => {
    const { logSpy, errorSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({ level: "warn", timestamps: false }));

    logger.info("skipped");
    logger.debug("skipped");
    logger.error("kept");

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("enables debug output in verbose mode", () => {
    const { logSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({ timestamps: false }), {
      verbose: true,
    });

    logger.debug("details");

    expect(logSpy).toHaveBeenCalledWith("[DEBUG] details");
  });

  it("prints nothing when quiet", () => {
    const { errorSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({}), { quiet: true });

    logger.error("hidden");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("formats steps", () => {
    const { logSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({ timestamps: false }));

    logger.step(2, 8, "Load news");

    expect(logSpy).toHaveBeenCalledWith("[INFO ] Executing step 2/8: Load news");
  });

  it("emits JSON lines", () => {
    const { logSpy } = spyConsole();
    const logger = createLogger("s1", LoggingConfigSchema.parse({ jsonLogs: true }));

    logger.info("hello", { ticker: "ACME" });

    const line = logSpy.mock.calls[0][0];
    expect(typeof line === "string" && JSON.parse(line)).toMatchObject({
      level: "info",
      sessionId: "s1",
      message: "hello",
      ticker: "ACME",
    });
  });

  describe("flush", () => {
    let logDir: string;

    beforeEach(async () => {
      logDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), "brief-logs-")), "logs");
    });

    afterEach(async () => {
      await fs.rm(path.dirname(logDir), { recursive: true, force: true });
    });

    it("appends buffered lines to the session log", async () => {
      const logger = createLogger("session-1", LoggingConfigSchema.parse({ logDir, timestamps: false }), {
        quiet: true,
      });

      logger.info("first");
      logger.warn("second");
      await logger.flush();
      logger.info("third");
      await logger.flush();

      await expect(fs.readFile(path.join(logDir, "session-1.log"), "utf-8")).resolves.toBe(
        "[INFO ] first\n[WARN ] second\n[INFO ] third\n",
      );
    });

    it("writes nothing without a log directory", async () => {
      const logger = createLogger("session-2", LoggingConfigSchema.parse({}), { quiet: true });
      logger.info("first");
      await logger.flush();

      await expect(fs.access(logDir)).rejects.toThrow();
    });
  });
});

describe("resolveLogDir", () => {
  it("expands the home directory", () => {
    expect(resolveLogDir("~/logs")).toBe(path.join(os.homedir(), "logs"));
    expect(resolveLogDir("/var/log/brief")).toBe("/var/log/brief");
  });
});
