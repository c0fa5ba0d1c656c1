import { type Command, Option } from "commander";
import { DEFAULT_COMPLETION_PARAMS } from "../core/options.js";
import type { CompleteConfig } from "./config.js";
import { OPTION_DESCRIPTIONS, OPTION_FLAGS, OUTPUT_FORMATS, type OutputFormat } from "./constants.js";
import { collectValues, createNumericParser } from "./utils.js";

/**
 * Options for the complete command (camelCase, matching Commander output).
 */
export interface CompleteCommandOptions {
  file?: string;
  template?: string;
  arg: string[];
  chunkSize?: number;
  forceChunk?: boolean;
  hardCut?: boolean;
  inPrefix?: string;
  outPrefix?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  count?: number;
  stop: string[];
  presencePenalty?: number;
  frequencyPenalty?: number;
  topP?: number;
  logprobs?: number;
  logitBias: string[];
  format: OutputFormat;
  echo?: boolean;
  encode?: string;
  retries?: number;
  timeout?: number;
  partial?: boolean;
  /** Append the completion to the --file prompt file */
  append?: boolean;
  /** False with --no-color */
  color: boolean;
}

/**
 * Adds complete command options to a Commander command.
 *
 * Repeatable options start from the config values; values given on the
 * command line are appended to them.
 *
 * @param cmd - Command to add options to
 * @param defaults - Optional defaults from config file
 * @returns The command with options added
 */
export function addCompleteOptions(cmd: Command, defaults?: CompleteConfig): Command {
  return cmd
    .option(OPTION_FLAGS.file, OPTION_DESCRIPTIONS.file)
    .option(OPTION_FLAGS.template, OPTION_DESCRIPTIONS.template, defaults?.template)
    .option(OPTION_FLAGS.arg, OPTION_DESCRIPTIONS.arg, collectValues, [...(defaults?.arg ?? [])])
    .option(
      OPTION_FLAGS.chunkSize,
      OPTION_DESCRIPTIONS.chunkSize,
      createNumericParser({ label: "Chunk size", integer: true, min: 1 }),
      defaults?.["chunk-size"],
    )
    .option(OPTION_FLAGS.forceChunk, OPTION_DESCRIPTIONS.forceChunk, defaults?.["force-chunk"])
    .option(OPTION_FLAGS.hardCut, OPTION_DESCRIPTIONS.hardCut, defaults?.["hard-cut"])
    .option(OPTION_FLAGS.inPrefix, OPTION_DESCRIPTIONS.inPrefix, defaults?.["in-prefix"])
    .option(OPTION_FLAGS.outPrefix, OPTION_DESCRIPTIONS.outPrefix, defaults?.["out-prefix"])
    .option(OPTION_FLAGS.model, OPTION_DESCRIPTIONS.model, defaults?.model ?? DEFAULT_COMPLETION_PARAMS.model)
    .option(
      OPTION_FLAGS.temperature,
      OPTION_DESCRIPTIONS.temperature,
      createNumericParser({ label: "Temperature", min: 0, max: 2 }),
      defaults?.temperature,
    )
    .option(
      OPTION_FLAGS.maxTokens,
      OPTION_DESCRIPTIONS.maxTokens,
      createNumericParser({ label: "Max tokens", integer: true, min: 1 }),
      defaults?.["max-tokens"],
    )
    .option(
      OPTION_FLAGS.count,
      OPTION_DESCRIPTIONS.count,
      createNumericParser({ label: "Count", integer: true, min: 1 }),
      defaults?.count,
    )
    .option(OPTION_FLAGS.stop, OPTION_DESCRIPTIONS.stop, collectValues, [...(defaults?.stop ?? [])])
    .option(
      OPTION_FLAGS.presencePenalty,
      OPTION_DESCRIPTIONS.presencePenalty,
      createNumericParser({ label: "Presence penalty", min: -2, max: 2 }),
      defaults?.["presence-penalty"],
    )
    .option(
      OPTION_FLAGS.frequencyPenalty,
      OPTION_DESCRIPTIONS.frequencyPenalty,
      createNumericParser({ label: "Frequency penalty", min: -2, max: 2 }),
      defaults?.["frequency-penalty"],
    )
    .option(
      OPTION_FLAGS.topP,
      OPTION_DESCRIPTIONS.topP,
      createNumericParser({ label: "Top-p", min: 0, max: 1 }),
      defaults?.["top-p"],
    )
    .option(
      OPTION_FLAGS.logprobs,
      OPTION_DESCRIPTIONS.logprobs,
      createNumericParser({ label: "Logprobs", integer: true, min: 0, max: 20 }),
      defaults?.logprobs,
    )
    .option(OPTION_FLAGS.logitBias, OPTION_DESCRIPTIONS.logitBias, collectValues, [
      ...(defaults?.["logit-bias"] ?? []),
    ])
    .addOption(
      new Option(OPTION_FLAGS.format, OPTION_DESCRIPTIONS.format)
        .choices(OUTPUT_FORMATS)
        .default(defaults?.format ?? "clean"),
    )
    .option(OPTION_FLAGS.echo, OPTION_DESCRIPTIONS.echo, defaults?.echo)
    .option(OPTION_FLAGS.encode, OPTION_DESCRIPTIONS.encode, defaults?.encode)
    .option(
      OPTION_FLAGS.retries,
      OPTION_DESCRIPTIONS.retries,
      createNumericParser({ label: "Retries", integer: true, min: 0 }),
      defaults?.retries,
    )
    .option(
      OPTION_FLAGS.timeout,
      OPTION_DESCRIPTIONS.timeout,
      createNumericParser({ label: "Timeout", integer: true, min: 1 }),
      defaults?.timeout,
    )
    .option(OPTION_FLAGS.partial, OPTION_DESCRIPTIONS.partial, defaults?.partial)
    .option(OPTION_FLAGS.append, OPTION_DESCRIPTIONS.append, defaults?.append)
    .option(OPTION_FLAGS.noColor, OPTION_DESCRIPTIONS.noColor);
}
