import type { Command } from "commander";
import { executeComplete } from "./complete-command.js";
import type { CLIConfig, CustomCommandConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { addCompleteOptions, type CompleteCommandOptions } from "./option-helpers.js";
import { executeAction } from "./utils.js";

/**
 * Registers a custom command from config file.
 *
 * Custom commands are sections like `[brief]` in ~/.promptloom/cli.toml. They
 * run the complete command with the section's values as option defaults;
 * options given on the command line still win.
 *
 * @param program - Commander program to register the command with
 * @param name - Command name (e.g., "brief")
 * @param commandConfig - Resolved section (inheritance applied)
 * @param env - CLI environment for I/O operations
 * @param config - Full configuration, for API settings and templates
 */
export function registerCustomCommand(
  program: Command,
  name: string,
  commandConfig: CustomCommandConfig,
  env: CLIEnvironment,
  config: CLIConfig,
): void {
  const description =
    commandConfig.description ??
    (commandConfig.template ? `Complete with the '${commandConfig.template}' template` : "Custom complete command");

  const cmd = program
    .command(name)
    .description(description)
    .argument("[prompt]", "Prompt for the command. Falls back to --file or stdin.");

  addCompleteOptions(cmd, commandConfig).action((prompt: string | undefined, options: CompleteCommandOptions) =>
    executeAction(() => executeComplete(prompt, options, env, config), env),
  );
}
