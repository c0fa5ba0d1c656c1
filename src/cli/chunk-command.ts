import type { Command } from "commander";
import { type Chunk, chunkText, largestChunkSize } from "../core/chunker.js";
import { InvalidConfigurationError } from "../core/errors.js";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { createNumericParser, executeAction, resolvePrompt } from "./utils.js";

interface ChunkCommandOptions {
  file?: string;
  chunkSize?: number;
  forceChunk?: boolean;
  hardCut?: boolean;
  json?: boolean;
}

/**
 * One header line per chunk followed by its text.
 *
 * @example
 * ```text
 * --- chunk 0 [0, 3) 3 chars ---
 * a.
 * ```
 */
export function formatChunks(chunks: readonly Chunk[]): string {
  return chunks
    .map(
      (chunk) =>
        `--- chunk ${chunk.index} [${chunk.start}, ${chunk.end}) ${chunk.text.length} chars ---\n${chunk.text}`,
    )
    .join("\n");
}

export function formatChunksJson(chunks: readonly Chunk[]): string {
  return JSON.stringify(
    chunks.map((chunk) => ({ ...chunk, length: chunk.text.length })),
    null,
    2,
  );
}

async function handleChunkCommand(
  promptArg: string | undefined,
  options: ChunkCommandOptions,
  env: CLIEnvironment,
): Promise<void> {
  if (options.chunkSize === undefined) {
    throw new InvalidConfigurationError("A chunk size is required. Pass --chunk-size or set chunk-size in [complete].");
  }

  const input = await resolvePrompt(promptArg, { file: options.file }, env);
  const chunks = chunkText(input, {
    maxSize: options.chunkSize,
    force: options.forceChunk,
    hardCut: options.hardCut,
  });

  env.createLogger("promptloom:chunk").debug("Chunked input", {
    length: input.length,
    chunks: chunks.length,
    largest: largestChunkSize(chunks),
  });

  if (options.json) {
    env.stdout.write(`${formatChunksJson(chunks)}\n`);
  } else if (chunks.length > 0) {
    env.stdout.write(`${formatChunks(chunks)}\n`);
  }
}

/**
 * Registers the chunk command, which shows how input would be split without
 * sending anything.
 *
 * @param program - Commander program to register the command with
 * @param env - CLI environment for dependencies and I/O
 * @param config - Loaded configuration; `[complete]` provides the chunking defaults
 */
export function registerChunkCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  const defaults = config.complete;

  program
    .command(COMMANDS.chunk)
    .description("Print the chunks an input would be split into.")
    .argument("[prompt]", "Text to split. If omitted, --file or stdin is used.")
    .option(OPTION_FLAGS.file, OPTION_DESCRIPTIONS.file)
    .option(
      OPTION_FLAGS.chunkSize,
      OPTION_DESCRIPTIONS.chunkSize,
      createNumericParser({ label: "Chunk size", integer: true, min: 1 }),
      defaults["chunk-size"],
    )
    .option(OPTION_FLAGS.forceChunk, OPTION_DESCRIPTIONS.forceChunk, defaults["force-chunk"])
    .option(OPTION_FLAGS.hardCut, OPTION_DESCRIPTIONS.hardCut, defaults["hard-cut"])
    .option(OPTION_FLAGS.json, "Print the chunks as JSON.")
    .action((prompt: string | undefined, options: ChunkCommandOptions) =>
      executeAction(() => handleChunkCommand(prompt, options, env), env),
    );
}
