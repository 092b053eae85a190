import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { Logger, isLogLevel, parseLogLevel } from "../src/utils/logger.js";

describe("Logger", () => {
  let tempDir: string;
  let logFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "termsearch-log-"));
    logFile = path.join(tempDir, "logs", "termsearch.log");
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2026, 2, 1, 9, 5, 7));
    Logger.resetInstance();
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
    Logger.resetInstance();
  });

  function readLines(): string[] {
    return fs.readFileSync(logFile, "utf-8").split("\n").filter(Boolean);
  }

  it("should stay silent until configured", () => {
    const logger = Logger.getInstance();

    logger.error("nobody hears this");

    expect(logger.isEnabled("error")).toBe(false);
    expect(fs.existsSync(logFile)).toBe(false);
  });

  it("should write timestamped lines at or above the configured level", () => {
    const logger = Logger.getInstance();
    logger.configure({ filePath: logFile, level: "info" });

    logger.debug("hidden");
    logger.info("Start search");
    logger.error("Something broke");

    expect(readLines()).toEqual([
      "2026-03-01 09:05:07 [INFO] Start search",
      "2026-03-01 09:05:07 [ERROR] Something broke",
    ]);
  });

  it("should include every level at trace", () => {
    const logger = Logger.getInstance();
    logger.configure({ filePath: logFile, level: "trace" });

    logger.trace("t");
    logger.debug("d");
    logger.warn("w");

    expect(readLines().map((line) => line.slice(20))).toEqual(["[TRACE] t", "[DEBUG] d", "[WARN] w"]);
  });

  it("should disable itself after a failed write", () => {
    const logger = Logger.getInstance();
    // A directory cannot be appended to
    logger.configure({ filePath: tempDir, level: "info" });

    expect(() => logger.info("lost")).not.toThrow();
    expect(logger.isEnabled("error")).toBe(false);
  });

  describe("parseLogLevel", () => {
    it("should accept level names in any case", () => {
      expect(parseLogLevel("DEBUG")).toBe("debug");
      expect(parseLogLevel(" warn ")).toBe("warn");
    });

    it("should fall back to info", () => {
      expect(parseLogLevel("verbose")).toBe("info");
      expect(parseLogLevel(undefined)).toBe("info");
    });

    it("should recognise level names", () => {
      expect(isLogLevel("trace")).toBe(true);
      expect(isLogLevel("fatal")).toBe(false);
    });
  });
});
