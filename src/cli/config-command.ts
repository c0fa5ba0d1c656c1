import chalk from "chalk";
import type { Command } from "commander";
import { type CLIConfig, ConfigError, type CustomCommandConfig, getConfigPath, getCustomCommandNames } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

const REDACTED = "********";

/**
 * Resolved settings of a profile: `global`, `complete` or a custom command.
 * The API key is redacted.
 *
 * @throws ConfigError for unknown profiles
 */
export function describeProfile(config: CLIConfig, profile: string): CustomCommandConfig | CLIConfig["global"] {
  if (profile === "global") {
    const { "api-key": apiKey, ...rest } = config.global;
    return apiKey === undefined ? rest : { ...rest, "api-key": REDACTED };
  }
  if (profile === "complete") {
    return config.complete;
  }
  const command = Object.hasOwn(config.commands, profile) ? config.commands[profile] : undefined;
  if (!command) {
    const known = ["global", "complete", ...getCustomCommandNames(config)].join(", ");
    throw new ConfigError(`Unknown profile '${profile}'. Known profiles: ${known}`);
  }
  return command;
}

async function handleConfigCommand(profile: string | undefined, config: CLIConfig, env: CLIEnvironment): Promise<void> {
  if (profile) {
    env.stdout.write(`${JSON.stringify(describeProfile(config, profile), null, 2)}\n`);
    return;
  }

  env.stderr.write(chalk.dim(`Config file: ${getConfigPath(env.env)}\n`));

  const rows: Array<[string, string]> = [
    ["global", "Logging and API settings"],
    ["complete", "Defaults of the complete command"],
    ...getCustomCommandNames(config).map((name): [string, string] => [
      name,
      config.commands[name]?.description ?? "Custom command",
    ]),
  ];
  const width = Math.max(...rows.map(([name]) => name.length));
  env.stdout.write(`${rows.map(([name, description]) => `${name.padEnd(width)}  ${description}`).join("\n")}\n`);
}

/**
 * Registers the config command: lists profiles, or prints one as JSON.
 *
 * @param program - Commander program to register the command with
 * @param env - CLI environment for dependencies and I/O
 * @param config - Loaded configuration
 */
export function registerConfigCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  program
    .command(COMMANDS.config)
    .description("List configuration profiles, or print the resolved settings of one.")
    .argument("[profile]", "Profile to print: global, complete or a custom command.")
    .action((profile: string | undefined) => executeAction(() => handleConfigCommand(profile, config, env), env));
}
