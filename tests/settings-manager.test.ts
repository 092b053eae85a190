import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";

let mockHomeDir: string = os.tmpdir();

vi.mock("os", async (importOriginal) => {
  const actual = await importOriginal<typeof import("os")>();
  return {
    ...actual,
    homedir: () => mockHomeDir,
  };
});

// Imported after the mock so the settings path uses the test home directory
import { SettingsManager, isSettingKey } from "../src/utils/settings-manager.js";
import { SettingsError } from "../src/types/errors.js";

describe("Settings Manager", () => {
  let testHomeDir: string;
  let settingsPath: string;

  function writeSettings(content: string): void {
    fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
    fs.writeFileSync(settingsPath, content);
  }

  beforeEach(() => {
    testHomeDir = fs.mkdtempSync(path.join(os.tmpdir(), "termsearch-home-"));
    mockHomeDir = testHomeDir;
    settingsPath = path.join(testHomeDir, ".termsearch", "settings.json");
    SettingsManager.resetInstance();
  });

  afterEach(() => {
    fs.rmSync(testHomeDir, { recursive: true, force: true });
    SettingsManager.resetInstance();
  });

  it("should store settings under the home directory", () => {
    expect(SettingsManager.getInstance().getSettingsPath()).toBe(settingsPath);
  });

  describe("loadUserSettings", () => {
    it("should return no settings when the file does not exist", () => {
      expect(SettingsManager.getInstance().loadUserSettings()).toEqual({});
    });

    it("should load a valid settings file", () => {
      writeSettings(JSON.stringify({ maxResults: 5, logLevel: "debug" }));

      expect(SettingsManager.getInstance().loadUserSettings()).toEqual({ maxResults: 5, logLevel: "debug" });
    });

    it("should reject malformed JSON", () => {
      writeSettings("{ not json");

      expect(() => SettingsManager.getInstance().loadUserSettings()).toThrow(SettingsError);
      expect(() => SettingsManager.getInstance().loadUserSettings()).toThrow(
        `Failed to read settings from ${settingsPath}`
      );
    });

    it("should reject unknown keys", () => {
      writeSettings(JSON.stringify({ unknown: 1 }));

      expect(() => SettingsManager.getInstance().loadUserSettings()).toThrow(
        "Unrecognized key(s) in object: 'unknown'"
      );
    });

    it("should reject out of range values", () => {
      writeSettings(JSON.stringify({ maxHistory: 0 }));

      expect(() => SettingsManager.getInstance().loadUserSettings()).toThrow(
        `Invalid settings in ${settingsPath}: maxHistory:`
      );
    });
  });

  describe("updateUserSetting", () => {
    it("should persist a value parsed from its string form", () => {
      const manager = SettingsManager.getInstance();

      expect(manager.updateUserSetting("maxResults", "25")).toEqual({ maxResults: 25 });
      expect(JSON.parse(fs.readFileSync(settingsPath, "utf-8"))).toEqual({ maxResults: 25 });
    });

    it("should keep the other settings", () => {
      writeSettings(JSON.stringify({ maxHistory: 500 }));
      const manager = SettingsManager.getInstance();

      manager.updateUserSetting("logLevel", "trace");

      expect(manager.loadUserSettings()).toEqual({ maxHistory: 500, logLevel: "trace" });
    });

    it("should refuse an invalid value and leave the file untouched", () => {
      writeSettings(JSON.stringify({ maxResults: 5 }));
      const manager = SettingsManager.getInstance();

      expect(() => manager.updateUserSetting("maxResults", "many")).toThrow("Invalid value for maxResults");
      expect(() => manager.updateUserSetting("logLevel", "loud")).toThrow(SettingsError);
      expect(manager.loadUserSettings()).toEqual({ maxResults: 5 });
    });
  });

  describe("removeUserSetting", () => {
    it("should drop a single key", () => {
      writeSettings(JSON.stringify({ maxHistory: 500, maxResults: 5 }));
      const manager = SettingsManager.getInstance();

      expect(manager.removeUserSetting("maxHistory")).toEqual({ maxResults: 5 });
      expect(manager.getUserSetting("maxHistory")).toBeUndefined();
      expect(manager.getUserSetting("maxResults")).toBe(5);
    });
  });

  describe("resolve", () => {
    it("should apply defaults", () => {
      expect(SettingsManager.getInstance().resolve({})).toEqual({
        maxHistory: 10000,
        maxResults: 10,
        historyFile: undefined,
        logLevel: "info",
        logFile: path.join(testHomeDir, "termsearch.log"),
      });
    });

    it("should prefer stored settings over defaults", () => {
      writeSettings(
        JSON.stringify({ maxHistory: 200, historyFile: "/tmp/hist", logLevel: "warn", logFile: "/tmp/ts.log" })
      );

      expect(SettingsManager.getInstance().resolve({})).toEqual({
        maxHistory: 200,
        maxResults: 10,
        historyFile: "/tmp/hist",
        logLevel: "warn",
        logFile: "/tmp/ts.log",
      });
    });

    it("should let TERMSEARCH_LOG override the stored level", () => {
      writeSettings(JSON.stringify({ logLevel: "warn" }));
      const manager = SettingsManager.getInstance();

      expect(manager.resolve({ TERMSEARCH_LOG: "DEBUG" }).logLevel).toBe("debug");
      expect(manager.resolve({ TERMSEARCH_LOG: "verbose" }).logLevel).toBe("info");
    });
  });

  it("should recognise setting keys", () => {
    expect(isSettingKey("maxHistory")).toBe(true);
    expect(isSettingKey("theme")).toBe(false);
  });
});
