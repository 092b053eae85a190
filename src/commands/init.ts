import fs from "fs-extra";
import * as path from "path";
import { fileURLToPath } from "url";
import { getLogger } from "../utils/logger.js";
import { errorMessage } from "../types/errors.js";

export const WIDGET_FILE_NAME = "termsearch.zsh";

// Resolves from both src/commands and dist/commands
const BUNDLED_WIDGET = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "shell",
  WIDGET_FILE_NAME
);

export interface InitOptions {
  env?: NodeJS.ProcessEnv;
  widgetSource?: string;
}

export interface InitResult {
  widgetPath: string;
  zshrcPath: string;
  sourceLineAdded: boolean;
}

/**
 * ZDOTDIR when set, otherwise HOME.
 */
export function getZshConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const configDir = env.ZDOTDIR || env.HOME;
  if (!configDir) {
    throw new Error("HOME environment variable not set");
  }
  return configDir;
}

/**
 * Append `line` to `filePath` unless the file already contains it.
 */
export async function appendLineOnce(filePath: string, line: string): Promise<boolean> {
  const logger = getLogger();
  logger.debug(`Append content to file: ${filePath}`);

  let existing = "";
  if (await fs.pathExists(filePath)) {
    existing = await fs.readFile(filePath, "utf-8");
    if (existing.includes(line)) {
      logger.debug("Content already present in file");
      return false;
    }
  }

  const separator = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
  await fs.appendFile(filePath, `${separator}${line}\n`, "utf-8");
  logger.debug("Content appended successfully");
  return true;
}

/**
 * Install the Ctrl+R widget and source it from .zshrc.
 */
export async function initZsh(options: InitOptions = {}): Promise<InitResult> {
  const logger = getLogger();
  const configDir = getZshConfigDir(options.env);
  logger.debug(`ZSH configuration directory: ${configDir}`);

  const widgetPath = path.join(configDir, WIDGET_FILE_NAME);
  try {
    await fs.copy(options.widgetSource ?? BUNDLED_WIDGET, widgetPath);
  } catch (error) {
    throw new Error(`Failed to write to ${widgetPath}: ${errorMessage(error)}`, { cause: error });
  }
  logger.debug(`Successfully written ${WIDGET_FILE_NAME} script`);

  const zshrcPath = path.join(configDir, ".zshrc");
  const sourceLineAdded = await appendLineOnce(zshrcPath, `source ${widgetPath}`);

  return { widgetPath, zshrcPath, sourceLineAdded };
}
