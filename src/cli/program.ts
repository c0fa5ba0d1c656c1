import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { isLogLevelName, LOG_LEVEL_NAMES, type LogLevelName } from "../logging/logger.js";
import { registerChunkCommand } from "./chunk-command.js";
import { registerCompleteCommand } from "./complete-command.js";
import { type CLIConfig, getConfigPath, getCustomCommandNames, loadConfig } from "./config.js";
import { registerConfigCommand } from "./config-command.js";
import { CLI_DESCRIPTION, CLI_NAME, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import { registerCustomCommand } from "./custom-command.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerInitCommand } from "./init-command.js";
import { registerTemplatesCommand } from "./templates-command.js";

/**
 * Parses and validates the log level option value.
 */
function parseLogLevelOption(value: string): LogLevelName {
  const normalized = value.toLowerCase();
  if (!isLogLevelName(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVEL_NAMES.join(", ")}`);
  }
  return normalized;
}

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: string;
  logFile?: string;
  logReset?: boolean;
}

function addGlobalOptions(command: Command): Command {
  return command
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .option(OPTION_FLAGS.logFile, OPTION_DESCRIPTIONS.logFile)
    .option(OPTION_FLAGS.logReset, OPTION_DESCRIPTIONS.logReset);
}

/**
 * Creates and configures the CLI program with the built-in commands and the
 * custom commands defined in the config file.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Configuration loaded from the config file
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment, config: CLIConfig): Command {
  const program = new Command();

  addGlobalOptions(program.name(CLI_NAME).description(CLI_DESCRIPTION).version(readPackageVersion())).configureOutput({
    writeOut: (str) => env.stdout.write(str),
    writeErr: (str) => env.stderr.write(str),
  });

  registerCompleteCommand(program, env, config);
  registerChunkCommand(program, env, config);
  registerTemplatesCommand(program, env, config);
  registerInitCommand(program, env);
  registerConfigCommand(program, env, config);

  for (const name of getCustomCommandNames(config)) {
    const commandConfig = config.commands[name];
    if (commandConfig) {
      registerCustomCommand(program, name, commandConfig, env, config);
    }
  }

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override. When provided, no config file is read. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  const envOverrides = opts.env ?? {};

  // Config errors fail before any command runs
  const config = opts.config ?? loadConfig(getConfigPath(envOverrides.env ?? process.env));

  // First pass: global options only, so the logger is configured before commands run.
  // Invalid values are left for the main parser to report.
  const preParser = new Command()
    .option(OPTION_FLAGS.logLevel)
    .option(OPTION_FLAGS.logFile)
    .option(OPTION_FLAGS.logReset)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);
  preParser.parse(envOverrides.argv ?? process.argv);
  const globalOpts = preParser.opts<GlobalOptions>();
  const flagLevel = globalOpts.logLevel?.toLowerCase();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: (flagLevel && isLogLevelName(flagLevel) ? flagLevel : undefined) ?? config.global["log-level"],
    logFile: globalOpts.logFile ?? config.global["log-file"],
    logReset: globalOpts.logReset ?? config.global["log-reset"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
