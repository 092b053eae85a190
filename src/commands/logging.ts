import { Command } from "commander";
import { SettingsManager, getSettingsManager } from "../utils/settings-manager.js";
import { getLogger } from "../utils/logger.js";

export function isConfigCommand(command: Command): boolean {
  for (let current: Command | null = command; current; current = current.parent) {
    if (current.name() === "config") {
      return true;
    }
  }
  return false;
}

/**
 * Configure the logger for the command about to run. `config` commands
 * skip the settings file so they can still repair it when it is invalid.
 */
export function configureLogging(
  actionCommand: Command,
  env: NodeJS.ProcessEnv = process.env,
  manager: SettingsManager = getSettingsManager()
): void {
  const settings = isConfigCommand(actionCommand) ? manager.resolve(env, {}) : manager.resolve(env);
  getLogger().configure({ filePath: settings.logFile, level: settings.logLevel });
}
