#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { initZsh } from "./commands/init.js";
import { runSearch } from "./commands/search.js";
import { setConfig, showConfig, unsetConfig } from "./commands/config.js";
import { configureLogging } from "./commands/logging.js";
import { getSettingsManager } from "./utils/settings-manager.js";
import { getLogger } from "./utils/logger.js";
import { errorMessage } from "./types/errors.js";

const VERSION = "0.1.0";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

interface SearchCommandOptions {
  output?: string;
  maxHistory?: number;
  maxResults?: number;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name("termsearch")
    .description("A minimalist and super fast terminal history search tool.")
    .version(VERSION);

  program
    .command("init")
    .description("Initialize for the current shell.")
    .action(async () => {
      const result = await initZsh();
      console.log(
        chalk.green("Successfully initialized termsearch. Restart your terminal to enable it.")
      );
      if (!result.sourceLineAdded) {
        console.log(chalk.gray(`${result.zshrcPath} already sources ${result.widgetPath}`));
      }
    });

  program
    .command("search")
    .description("Search through the shell history.")
    .argument("[term]", "The search term")
    .option("-o, --output <file>", "The output file")
    .option("-m, --max-history <n>", "Maximum number of history lines to read", parsePositiveInt)
    .option("-r, --max-results <n>", "Maximum number of results to display", parsePositiveInt)
    .action(async (term: string | undefined, options: SearchCommandOptions) => {
      const settings = getSettingsManager().resolve();
      await runSearch({
        term,
        outputFile: options.output,
        maxHistory: options.maxHistory ?? settings.maxHistory,
        maxResults: options.maxResults ?? settings.maxResults,
        historyFile: settings.historyFile,
      });
    });

  const config = program
    .command("config")
    .description("Show or change persisted settings.")
    .action(() => {
      console.log(showConfig());
    });

  config
    .command("set")
    .description("Set a setting.")
    .argument("<key>", "Setting name")
    .argument("<value>", "New value")
    .action((key: string, value: string) => {
      console.log(setConfig(key, value));
    });

  config
    .command("unset")
    .description("Reset a setting to its default.")
    .argument("<key>", "Setting name")
    .action((key: string) => {
      console.log(unsetConfig(key));
    });

  return program;
}

async function main(): Promise<void> {
  await createProgram()
    .hook("preAction", (_program, actionCommand) => {
      configureLogging(actionCommand);
      getLogger().debug(`Start termsearch v${VERSION}`);
    })
    .parseAsync(process.argv);
}

main().catch((error: unknown) => {
  getLogger().error(errorMessage(error));
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
