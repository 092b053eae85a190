import fs from "fs-extra";
import * as path from "path";
import * as os from "os";
import { z } from "zod";
import { SettingsError, errorMessage } from "../types/errors.js";
import { LOG_LEVELS, LogLevel, defaultLogFilePath, parseLogLevel } from "./logger.js";
import { DEFAULT_MAX_HISTORY } from "../history/history-store.js";

export const DEFAULT_MAX_RESULTS = 10;

const positiveInt = z.coerce.number().int().positive();

const userSettingsSchema = z
  .object({
    maxHistory: positiveInt.optional(),
    maxResults: positiveInt.optional(),
    historyFile: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

/**
 * User-level settings stored in ~/.termsearch/settings.json
 */
export type UserSettings = z.infer<typeof userSettingsSchema>;

export type SettingKey = keyof UserSettings;

export const SETTING_KEYS = userSettingsSchema.keyof().options;

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((settingKey) => settingKey === key);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Settings after defaults and environment overrides are applied
 */
export interface ResolvedSettings {
  maxHistory: number;
  maxResults: number;
  historyFile?: string;
  logLevel: LogLevel;
  logFile: string;
}

export class SettingsManager {
  private static instance: SettingsManager;
  private userSettingsPath: string;

  private constructor() {
    this.userSettingsPath = path.join(os.homedir(), ".termsearch", "settings.json");
  }

  /**
   * Get singleton instance
   */
  static getInstance(): SettingsManager {
    if (!SettingsManager.instance) {
      SettingsManager.instance = new SettingsManager();
    }
    return SettingsManager.instance;
  }

  /**
   * Reset the singleton instance (for testing purposes only)
   * This allows tests to create a fresh instance with mocked paths
   */
  static resetInstance(): void {
    SettingsManager.instance = new SettingsManager();
  }

  /**
   * Raw JSON object stored in ~/.termsearch/settings.json, not yet validated
   */
  private readStoredSettings(): Record<string, unknown> {
    if (!fs.pathExistsSync(this.userSettingsPath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.userSettingsPath);
    } catch (error) {
      throw new SettingsError(
        `Failed to read settings from ${this.userSettingsPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new SettingsError(`Invalid settings in ${this.userSettingsPath}: expected a JSON object`);
    }
    return { ...raw };
  }

  /**
   * Load user settings from ~/.termsearch/settings.json
   */
  loadUserSettings(): UserSettings {
    const parsed = userSettingsSchema.safeParse(this.readStoredSettings());
    if (!parsed.success) {
      throw new SettingsError(`Invalid settings in ${this.userSettingsPath}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Save user settings to ~/.termsearch/settings.json
   */
  saveUserSettings(settings: UserSettings): void {
    fs.outputJsonSync(this.userSettingsPath, settings, { spaces: 2 });
  }

  /**
   * Update a specific user setting from its string form, as given on the
   * command line. Only the merged result is validated, so a bad stored
   * value can be overwritten.
   */
  updateUserSetting(key: SettingKey, value: string): UserSettings {
    return this.storeValidated({ ...this.readStoredSettings(), [key]: value }, `Invalid value for ${key}`);
  }

  /**
   * Drop a user setting so its default applies again
   */
  removeUserSetting(key: SettingKey): UserSettings {
    const settings = this.readStoredSettings();
    delete settings[key];
    return this.storeValidated(settings, `Invalid settings in ${this.userSettingsPath}`);
  }

  // Unknown keys are dropped on rewrite rather than rejected
  private storeValidated(settings: Record<string, unknown>, context: string): UserSettings {
    const parsed = userSettingsSchema.strip().safeParse(settings);
    if (!parsed.success) {
      throw new SettingsError(`${context}: ${formatIssues(parsed.error)}`);
    }
    this.saveUserSettings(parsed.data);
    return parsed.data;
  }

  /**
   * Get a specific user setting
   */
  getUserSetting<K extends SettingKey>(key: K): UserSettings[K] {
    return this.loadUserSettings()[key];
  }

  /**
   * Merge defaults, the settings file and environment overrides:
   * TERMSEARCH_LOG wins over the stored log level. Pass `{}` as settings
   * to resolve without reading the file.
   */
  resolve(env: NodeJS.ProcessEnv = process.env, settings: UserSettings = this.loadUserSettings()): ResolvedSettings {
    return {
      maxHistory: settings.maxHistory ?? DEFAULT_MAX_HISTORY,
      maxResults: settings.maxResults ?? DEFAULT_MAX_RESULTS,
      historyFile: settings.historyFile,
      logLevel: env.TERMSEARCH_LOG ? parseLogLevel(env.TERMSEARCH_LOG) : settings.logLevel ?? "info",
      logFile: settings.logFile ?? defaultLogFilePath(),
    };
  }

  /**
   * Get the path to user settings file
   */
  getSettingsPath(): string {
    return this.userSettingsPath;
  }
}

/**
 * Convenience function to get the singleton instance
 */
export function getSettingsManager(): SettingsManager {
  return SettingsManager.getInstance();
}
