import type { ILogObj, Logger } from "tslog";
import type { LoggerOptions } from "../logging/logger.js";
import { createLogger, parseLogLevel } from "../logging/logger.js";
import { type ClientSettings, createCompletionClient } from "../providers/discovery.js";
import type { CompletionClient, Tokenizer } from "../providers/provider.js";
import { createTiktokenTokenizer } from "../providers/tokenizer.js";

/**
 * Stream type that may have TTY capabilities.
 */
export type TTYStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
  logFile?: string;
  logReset?: boolean;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdin: TTYStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Process environment, for templates and API settings */
  env: NodeJS.ProcessEnv;
  createClient: (model: string, settings: ClientSettings) => CompletionClient;
  createTokenizer: (model: string) => Tokenizer;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Whether stdin is a TTY (interactive terminal) */
  isTTY: boolean;
  /** Whether stdout supports colour */
  stdoutIsTTY: boolean;
  /**
   * Registers a handler for Ctrl+C. Returns a function that removes it.
   */
  onInterrupt: (handler: () => void) => () => void;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };

    // CLI --log-level takes priority over PROMPTLOOM_LOG_LEVEL
    const minLevel = parseLogLevel(config?.logLevel);
    if (minLevel !== undefined) {
      options.minLevel = minLevel;
    }
    if (config?.logFile) {
      options.logFile = config.logFile;
    }
    if (config?.logReset !== undefined) {
      options.logReset = config.logReset;
    }

    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 *
 * @param loggerConfig - Optional logger configuration from CLI options
 * @returns Default CLI environment
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    createClient: (model, settings) => createCompletionClient(model, settings),
    createTokenizer: createTiktokenTokenizer,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    isTTY: Boolean(process.stdin.isTTY),
    stdoutIsTTY: Boolean(process.stdout.isTTY),
    onInterrupt: (handler) => {
      process.on("SIGINT", handler);
      return () => {
        process.off("SIGINT", handler);
      };
    },
  };
}
