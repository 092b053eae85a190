import fs from "fs-extra";
import { readZshHistory, resolveHistoryFile } from "../history/zsh-history.js";
import { TerminalUi } from "../ui/terminal-ui.js";
import { Terminal } from "../ui/terminal.js";
import { getLogger } from "../utils/logger.js";

export interface SearchOptions {
  term?: string;
  outputFile?: string;
  maxHistory: number;
  maxResults: number;
  historyFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Injected in tests; defaults to the process terminal. */
  terminal?: Terminal;
  /** Where the selection goes when no output file is given. */
  stdout?: NodeJS.WritableStream;
}

/**
 * Line format read back by the zsh widget.
 */
export function formatResult(command: string): string {
  return `commandline\t${command}\n`;
}

/**
 * Read history, run the interactive search and report the selection.
 * Resolves to the selected command, or null when nothing was chosen.
 */
export async function runSearch(options: SearchOptions): Promise<string | null> {
  const logger = getLogger();

  const historyPath = options.historyFile ?? resolveHistoryFile(options.env);
  const history = await readZshHistory(historyPath, options.maxHistory);

  const ui = TerminalUi.open(options.maxResults, history.entries(), options.terminal);
  const selected = await ui.run(options.term || undefined);

  if (selected === null) {
    logger.debug("No command selected");
    return null;
  }

  if (options.outputFile) {
    await fs.outputFile(options.outputFile, formatResult(selected), "utf-8");
    logger.debug(`Wrote selection to ${options.outputFile}`);
  } else {
    (options.stdout ?? process.stdout).write(`${selected}\n`);
  }

  return selected;
}
