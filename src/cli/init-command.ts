import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { InvalidConfigurationError } from "../core/errors.js";
import { getUserTemplatesDir } from "../core/template-store.js";
import { getConfigPath } from "./config.js";
import { COMMANDS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * Starter configuration. Every setting is commented out so the file is valid
 * as written.
 */
export function createStarterConfig(templatesDir?: string): string {
  const lines = [
    "# promptloom configuration",
    "",
    "[global]",
    '# log-level = "warn"',
    '# log-file = "~/.promptloom/promptloom.log"',
    "# log-reset = false",
    '# api-key = "..."            # defaults to $OPENAI_API_KEY',
    '# api-base = "https://api.openai.com/v1"',
    templatesDir ? `templates-dir = ${JSON.stringify(templatesDir)}` : '# templates-dir = "~/.promptloom/templates"',
    "",
    "[complete]",
    '# model = "gpt-4o-mini"',
    "# temperature = 0.7",
    "# max-tokens = 256",
    "# chunk-size = 4000",
    "# retries = 3",
    '# format = "clean"',
    "",
    "[prompts]",
    '# haiku = "Write a haiku about <%= it.prompt %>"',
    "",
    "# Every other section becomes a command:",
    "# [brief]",
    '# description = "Summarize a document in chunks"',
    '# template = "summarize"',
    "# chunk-size = 6000",
    '# arg = ["style=terse"]',
    "",
  ];
  return lines.join("\n");
}

interface InitCommandOptions {
  force?: boolean;
}

async function handleInitCommand(options: InitCommandOptions, env: CLIEnvironment): Promise<void> {
  const configPath = getConfigPath(env.env);
  if (existsSync(configPath) && !options.force) {
    throw new InvalidConfigurationError(`Config file already exists at ${configPath}. Use --force to overwrite it.`);
  }

  // Templates live next to the config file; only a non-default location needs a setting
  const templatesDir = join(dirname(configPath), "templates");
  const needsTemplatesSetting = templatesDir !== getUserTemplatesDir();

  mkdirSync(templatesDir, { recursive: true });
  writeFileSync(configPath, createStarterConfig(needsTemplatesSetting ? templatesDir : undefined), "utf-8");

  env.stdout.write(`${chalk.green("Created")} ${configPath}\n`);
  env.stdout.write(`${chalk.green("Templates directory")} ${templatesDir}\n`);
}

/**
 * Registers the init command, which writes a starter config file and creates
 * the user templates directory.
 *
 * @param program - Commander program to register the command with
 * @param env - CLI environment for dependencies and I/O
 */
export function registerInitCommand(program: Command, env: CLIEnvironment): void {
  program
    .command(COMMANDS.init)
    .description("Create a starter config file and the user templates directory.")
    .option(OPTION_FLAGS.force, "Overwrite an existing config file.")
    .action((options: InitCommandOptions) => executeAction(() => handleInitCommand(options, env), env));
}
