import { appendFile } from "node:fs/promises";
import type { Command } from "commander";
import { getCypher } from "../core/encoder.js";
import { calculateCost } from "../core/model-catalog.js";
import { type CompletionParamsInput, type CompletionResponse, resolveCompletionParams } from "../core/options.js";
import { CompletionPipeline, type PipelineResult } from "../core/pipeline.js";
import { createTemplateStore } from "../core/template-store.js";
import { TemplateRenderer } from "../core/templates.js";
import { parseLogitBias } from "../providers/logit-bias.js";
import { getOpenAIModelSpec } from "../providers/openai-models.js";
import type { CLIConfig } from "./config.js";
import { COMMANDS, SUMMARY_PREFIX } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { addCompleteOptions, type CompleteCommandOptions } from "./option-helpers.js";
import { createPainter, formatResponses, renderSummary, sumUsage } from "./ui/formatters.js";
import { createSigintListener, executeAction, parseKeyValuePairs, resolvePrompt } from "./utils.js";

/**
 * Maps command options to generation parameters. The `logprobs` format asks
 * for log-probabilities even without `--logprobs`.
 */
export function buildParamsInput(options: CompleteCommandOptions, env: CLIEnvironment): CompletionParamsInput {
  const logprobs = options.logprobs ?? (options.format === "logprobs" ? 0 : undefined);

  return {
    model: options.model,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    n: options.count,
    stop: options.stop,
    presencePenalty: options.presencePenalty,
    frequencyPenalty: options.frequencyPenalty,
    topP: options.topP,
    logprobs,
    logitBias:
      options.logitBias.length > 0 ? parseLogitBias(options.logitBias, env.createTokenizer(options.model)) : undefined,
    timeoutMs: options.timeout,
  };
}

/**
 * Text appended to the prompt file by `--append`: the out-prefix, then the
 * first completion of each chunk, ending in a newline.
 */
export function formatAppendedCompletion(responses: readonly CompletionResponse[], outPrefix = ""): string {
  const text = `${outPrefix}${responses.map((response) => response.choices[0]?.text ?? "").join("\n")}`;
  return text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Runs prompt → chunks → template → completions → formatted output.
 *
 * Writes the output to stdout and a usage summary to stderr. A failed run
 * (including Ctrl+C) is rethrown after any partial output is flushed. With
 * `--append`, a successful run also appends its completion to the prompt file.
 *
 * @param promptArg - Prompt from the command line (stdin or --file otherwise)
 * @param options - Complete command options
 * @param env - CLI environment for I/O operations
 * @param config - Loaded configuration (API settings and templates)
 */
export async function executeComplete(
  promptArg: string | undefined,
  options: CompleteCommandOptions,
  env: CLIEnvironment,
  config: CLIConfig,
): Promise<void> {
  const logger = env.createLogger("promptloom:complete");
  if (options.append && !options.file) {
    logger.warn("--append only applies to --file prompts; ignoring it");
  }
  const prompt = await resolvePrompt(promptArg, { file: options.file }, env);

  const params = resolveCompletionParams(buildParamsInput(options, env));
  const overrides = parseKeyValuePairs(options.arg);
  const cypher = options.encode ? getCypher(options.encode) : undefined;

  const renderer = new TemplateRenderer(
    createTemplateStore({ prompts: config.prompts, userDir: config.global["templates-dir"] }),
    { logger, env: env.env },
  );
  const client = env.createClient(params.model, {
    apiKey: config.global["api-key"],
    baseURL: config.global["api-base"],
    logger,
    env: env.env,
  });

  const color = options.color && env.stdoutIsTTY;
  const pipeline = new CompletionPipeline(client, {
    renderer,
    logger,
    retry: options.retries === undefined ? undefined : { retries: options.retries },
    formatter: (responses) => formatResponses(responses, options.format, { color, echo: options.echo }),
  });

  logger.debug("Starting completion", { model: params.model, template: options.template, format: options.format });

  const controller = new AbortController();
  const removeListener = createSigintListener(controller, env);
  const startTime = Date.now();

  let result: PipelineResult;
  try {
    result = await pipeline.run(prompt, {
      params,
      template: options.template,
      overrides,
      chunkSize: options.chunkSize,
      forceChunk: options.forceChunk,
      hardCut: options.hardCut,
      cypher,
      inPrefix: options.inPrefix,
      outPrefix: options.outPrefix,
      signal: controller.signal,
      partialOutput: options.partial,
    });
  } finally {
    removeListener();
  }

  if (result.output) {
    env.stdout.write(result.output.endsWith("\n") ? result.output : `${result.output}\n`);
  }

  if (result.state === "failed") {
    throw result.error;
  }

  if (options.append && options.file && result.responses.length > 0) {
    await appendFile(options.file, formatAppendedCompletion(result.responses, options.outPrefix), "utf-8");
    logger.debug("Appended completion", { file: options.file });
  }

  if (result.responses.length > 0) {
    const usage = sumUsage(result.responses);
    const lastChoice = result.responses.at(-1)?.choices.at(-1);
    const paint = createPainter(color);
    const summary = renderSummary(
      {
        model: params.model,
        chunks: result.responses.length,
        usage,
        elapsedSeconds: Math.round((Date.now() - startTime) / 100) / 10,
        cost: calculateCost(getOpenAIModelSpec(params.model), usage),
        finishReason: lastChoice?.finishReason,
      },
      paint,
    );
    if (summary) {
      env.stderr.write(`${paint.dim(SUMMARY_PREFIX)} ${summary}\n`);
    }
  }
}

/**
 * Registers the complete command as the program's default command.
 *
 * @param program - Commander program to register the command with
 * @param env - CLI environment for dependencies and I/O
 * @param config - Loaded configuration; `[complete]` provides option defaults
 */
export function registerCompleteCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.complete, { isDefault: true })
    .description("Send a prompt, optionally chunked and templated, and print the completions.")
    .argument("[prompt]", "Prompt to send. If omitted, --file or stdin is used.");

  addCompleteOptions(cmd, config.complete).action((prompt: string | undefined, options: CompleteCommandOptions) =>
    executeAction(() => executeComplete(prompt, options, env, config), env),
  );
}
