import fs from "fs-extra";
import * as path from "path";
import { HistoryStore } from "./history-store.js";
import { HistoryFileNotFoundError } from "../types/errors.js";
import { getLogger } from "../utils/logger.js";

// zsh EXTENDED_HISTORY: ": <start>:<elapsed>;<command>"
const EXTENDED_LINE = /^: (\d+):\d+;(.*)$/;

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the zsh history file:
 * 1. HISTFILE, when it names an existing file
 * 2. $HOME/.zsh_history
 */
export function resolveHistoryFile(env: NodeJS.ProcessEnv = process.env): string {
  const logger = getLogger();

  const histfile = env.HISTFILE;
  if (histfile && isFile(histfile)) {
    logger.debug(`Use HISTFILE environment variable: ${histfile}`);
    return histfile;
  }

  const home = env.HOME;
  if (!home) {
    throw new HistoryFileNotFoundError("HOME environment variable not set");
  }

  const defaultPath = path.join(home, ".zsh_history");
  if (!isFile(defaultPath)) {
    throw new HistoryFileNotFoundError(
      `ZSH history file not found at default location: ${defaultPath}`,
      defaultPath
    );
  }

  logger.debug(`Use default ZSH history file path: ${defaultPath}`);
  return defaultPath;
}

/**
 * Decode history text, keeping the last `maxEntries` commands.
 */
export function parseZshHistory(content: string, maxEntries: number): HistoryStore {
  const logger = getLogger();
  const store = new HistoryStore(maxEntries);
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (line.length === 0) {
      return;
    }

    const match = EXTENDED_LINE.exec(line);
    if (!match) {
      logger.debug(`Line ${lineNumber} does not match expected format`);
      return;
    }

    const seconds = Number.parseInt(match[1], 10);
    const timestamp = new Date(seconds * 1000);
    if (!Number.isSafeInteger(seconds) || Number.isNaN(timestamp.getTime())) {
      logger.debug(`Invalid timestamp on line ${lineNumber}`);
      return;
    }

    const command = match[2].trimEnd();
    if (command.length > 0) {
      store.append({ command, timestamp });
    }
  });

  logger.debug(`Read ${store.size} history entries`);
  return store;
}

export async function readZshHistory(filePath: string, maxEntries: number): Promise<HistoryStore> {
  try {
    const content = await fs.readFile(filePath, "utf-8");
    return parseZshHistory(content, maxEntries);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new HistoryFileNotFoundError(`History file not found: ${filePath}`, filePath);
    }
    throw error;
  }
}
