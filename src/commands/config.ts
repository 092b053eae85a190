import chalk from "chalk";
import {
  SETTING_KEYS,
  SettingKey,
  SettingsManager,
  UserSettings,
  getSettingsManager,
  isSettingKey,
} from "../utils/settings-manager.js";
import { SettingsError } from "../types/errors.js";

function formatSettings(settings: UserSettings, settingsPath: string): string {
  const lines = [chalk.bold(`Settings (${settingsPath})`)];
  for (const key of SETTING_KEYS) {
    const value = settings[key];
    lines.push(`  ${key}: ${value === undefined ? chalk.gray("(default)") : String(value)}`);
  }
  return lines.join("\n");
}

function requireKey(key: string): asserts key is SettingKey {
  if (!isSettingKey(key)) {
    throw new SettingsError(`Unknown setting "${key}". Valid settings: ${SETTING_KEYS.join(", ")}`);
  }
}

export function showConfig(manager: SettingsManager = getSettingsManager()): string {
  return formatSettings(manager.loadUserSettings(), manager.getSettingsPath());
}

export function setConfig(key: string, value: string, manager: SettingsManager = getSettingsManager()): string {
  requireKey(key);
  const settings = manager.updateUserSetting(key, value);
  return `${key} = ${String(settings[key])}`;
}

export function unsetConfig(key: string, manager: SettingsManager = getSettingsManager()): string {
  requireKey(key);
  manager.removeUserSetting(key);
  return `${key} reset to default`;
}
