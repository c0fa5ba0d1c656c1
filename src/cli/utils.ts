import { readFile } from "node:fs/promises";
import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { InvalidConfigurationError } from "../core/errors.js";
import type { CLIEnvironment, TTYStream } from "./environment.js";

/**
 * Options for creating a numeric value parser.
 */
export interface NumericParserOptions {
  label: string;
  integer?: boolean;
  min?: number;
  max?: number;
}

/**
 * Creates a parser function for numeric command-line options with validation.
 * Validates that values are numbers, optionally integers, and within min/max bounds.
 *
 * @param options - Parser configuration (label, integer, min, max)
 * @returns Parser function that validates and returns the numeric value
 * @throws InvalidArgumentError if validation fails
 */
export function createNumericParser({
  label,
  integer = false,
  min,
  max,
}: NumericParserOptions): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (value.trim() === "" || Number.isNaN(parsed)) {
      throw new InvalidArgumentError(`${label} must be a number.`);
    }

    if (integer && !Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }

    if (min !== undefined && parsed < min) {
      throw new InvalidArgumentError(`${label} must be greater than or equal to ${min}.`);
    }

    if (max !== undefined && parsed > max) {
      throw new InvalidArgumentError(`${label} must be less than or equal to ${max}.`);
    }

    return parsed;
  };
}

/**
 * Accumulator for repeatable options (`--stop a --stop b`).
 */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// Split on commas that start a new `key=` pair, so values may contain commas
const PAIR_SEPARATOR = /,(?=\s*[A-Za-z_][\w.-]*=)/;

/**
 * Parses `key=value` template arguments. Each entry may hold several
 * comma-separated pairs; later pairs override earlier ones.
 *
 * @example
 * ```typescript
 * parseKeyValuePairs(["style=brief,lang=fr", "audience=kids"]);
 * // { style: "brief", lang: "fr", audience: "kids" }
 * ```
 *
 * @throws InvalidConfigurationError for an entry without `=` or with an empty key
 */
export function parseKeyValuePairs(entries: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const entry of entries) {
    for (const pair of entry.split(PAIR_SEPARATOR)) {
      const separator = pair.indexOf("=");
      const key = separator === -1 ? "" : pair.slice(0, separator).trim();
      if (!key) {
        throw new InvalidConfigurationError(`Invalid template argument '${pair}'. Expected key=value.`);
      }
      result[key] = pair.slice(separator + 1);
    }
  }

  return result;
}

/**
 * Checks if a stream is a TTY (terminal) for interactive input.
 *
 * @param stream - Stream to check
 * @returns True if stream is a TTY
 */
export function isInteractive(stream: TTYStream): boolean {
  return Boolean(stream.isTTY);
}

/**
 * Reads all data from a readable stream into a string.
 *
 * @param stream - Stream to read from
 * @returns Complete stream contents as string
 */
async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    if (typeof chunk === "string") {
      chunks.push(chunk);
    } else {
      chunks.push(chunk.toString("utf8"));
    }
  }
  return chunks.join("");
}

/**
 * Drops the single newline editors and `echo` leave at the end of a file.
 */
function stripFinalNewline(value: string): string {
  if (value.endsWith("\r\n")) return value.slice(0, -2);
  if (value.endsWith("\n")) return value.slice(0, -1);
  return value;
}

/**
 * Resolves the prompt text.
 * Priority: 1) --file, 2) promptArg, 3) stdin if piped, 4) error.
 *
 * File and stdin content keep their whitespace apart from one trailing
 * newline. An empty prompt is valid: a template may not need one.
 *
 * @throws Error if no prompt source is available
 */
export async function resolvePrompt(
  promptArg: string | undefined,
  options: { file?: string },
  env: CLIEnvironment,
): Promise<string> {
  if (options.file) {
    try {
      return stripFinalNewline(await readFile(options.file, "utf-8"));
    } catch (error) {
      throw new InvalidConfigurationError(
        `Cannot read prompt file ${options.file}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  if (promptArg !== undefined) {
    return promptArg;
  }

  if (isInteractive(env.stdin)) {
    throw new Error("Prompt is required. Provide an argument, --file, or pipe content via stdin.");
  }

  return stripFinalNewline(await readStream(env.stdin));
}

/**
 * Aborts `controller` on Ctrl+C while an operation runs. Further presses
 * before cleanup only print a notice.
 *
 * @returns Cleanup function removing the listener
 */
export function createSigintListener(controller: AbortController, env: CLIEnvironment): () => void {
  return env.onInterrupt(() => {
    if (controller.signal.aborted) {
      env.stderr.write(chalk.dim("\n[Cancelling...]\n"));
      return;
    }
    env.stderr.write(chalk.yellow("\n[Interrupted]\n"));
    controller.abort();
  });
}

/**
 * Executes a CLI action with error handling.
 * Catches errors, writes to stderr, and sets exit code 1 on failure.
 *
 * @param action - Async action to execute
 * @param env - CLI environment for error output and exit code
 */
export async function executeAction(action: () => Promise<void>, env: CLIEnvironment): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
