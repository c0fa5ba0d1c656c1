/**
 * CLI output formatting utilities.
 *
 * Renders completion responses in the `clean`, `json` and `logprobs` formats
 * and the one-line usage summary written to stderr.
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { CompletionChoice, CompletionResponse, TokenLogprob, TokenUsage } from "../../core/options.js";
import type { OutputFormat } from "../constants.js";

export interface FormatOptions {
  /** Colour the `logprobs` output */
  color?: boolean;
  /** Include each response's prompt */
  echo?: boolean;
}

/**
 * Chalk instance with colour forced on or off, independent of the terminal.
 */
export function createPainter(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

/**
 * Formats token counts with 'k' suffix for thousands.
 *
 * @example
 * ```typescript
 * formatTokens(896)    // "896"
 * formatTokens(11500)  // "11.5k"
 * ```
 */
export function formatTokens(tokens: number): string {
  return tokens >= 1000 ? `${(tokens / 1000).toFixed(1)}k` : `${tokens}`;
}

/**
 * Formats cost with precision based on magnitude.
 *
 * @example
 * ```typescript
 * formatCost(0.00012)  // "0.00012"
 * formatCost(0.0056)   // "0.0056"
 * formatCost(0.123)    // "0.123"
 * formatCost(1.5)      // "1.50"
 * ```
 */
export function formatCost(cost: number): string {
  if (cost < 0.001) {
    return cost.toFixed(5);
  }
  if (cost < 0.01) {
    return cost.toFixed(4);
  }
  if (cost < 1) {
    return cost.toFixed(3);
  }
  return cost.toFixed(2);
}

function joinChoices(choices: readonly CompletionChoice[], render: (choice: CompletionChoice) => string): string {
  return choices.map(render).join("\n\n");
}

/**
 * Choices joined by a blank line, responses by a newline. With `echo` each
 * response starts with its prompt.
 */
export function formatClean(responses: readonly CompletionResponse[], echo = false): string {
  return responses
    .map((response) => {
      const completions = joinChoices(response.choices, (choice) => choice.text);
      return echo ? `${response.prompt}${completions}` : completions;
    })
    .join("\n");
}

/**
 * Pretty-printed JSON array, one entry per response.
 */
export function formatJson(responses: readonly CompletionResponse[], echo = false): string {
  const entries = responses.map((response) => ({
    chunkIndex: response.chunkIndex,
    model: response.model,
    ...(echo ? { prompt: response.prompt } : {}),
    choices: response.choices.map((choice) => ({
      index: choice.index,
      text: choice.text,
      finishReason: choice.finishReason,
      ...(choice.logprobs ? { logprobs: choice.logprobs } : {}),
    })),
    ...(response.usage ? { usage: response.usage } : {}),
  }));
  return JSON.stringify(entries, null, 2);
}

/**
 * Probability of a token as a percentage with one decimal, e.g. `"87.5%"`.
 */
export function formatProbability(logprob: number): string {
  return `${(Math.exp(logprob) * 100).toFixed(1)}%`;
}

/**
 * Colours a token by probability: green ≥ 0.9, yellow ≥ 0.5, magenta ≥ 0.2,
 * red below.
 */
export function paintToken(token: TokenLogprob, paint: ChalkInstance): string {
  const probability = Math.exp(token.logprob);
  if (probability >= 0.9) return paint.green(token.token);
  if (probability >= 0.5) return paint.yellow(token.token);
  if (probability >= 0.2) return paint.magenta(token.token);
  return paint.red(token.token);
}

function formatChoiceLogprobs(choice: CompletionChoice, color: boolean, paint: ChalkInstance): string {
  if (!choice.logprobs || choice.logprobs.length === 0) {
    return choice.text;
  }
  if (color) {
    return choice.logprobs.map((token) => paintToken(token, paint)).join("");
  }
  return choice.logprobs.map((token) => `${formatProbability(token.logprob)}\t${JSON.stringify(token.token)}`).join("\n");
}

/**
 * Tokens coloured by probability, or one `<percent>\t<token as JSON>` line
 * per token without colour. Choices without log-probabilities print their
 * text.
 */
export function formatLogprobs(responses: readonly CompletionResponse[], options: FormatOptions = {}): string {
  const color = options.color ?? false;
  const paint = createPainter(color);
  return responses
    .map((response) => {
      const completions = joinChoices(response.choices, (choice) => formatChoiceLogprobs(choice, color, paint));
      return options.echo ? `${response.prompt}${completions}` : completions;
    })
    .join("\n");
}

/**
 * Renders responses in the requested output format.
 */
export function formatResponses(
  responses: readonly CompletionResponse[],
  format: OutputFormat,
  options: FormatOptions = {},
): string {
  switch (format) {
    case "clean":
      return formatClean(responses, options.echo);
    case "json":
      return formatJson(responses, options.echo);
    case "logprobs":
      return formatLogprobs(responses, options);
  }
}

/**
 * Adds up the usage of every response that reported one.
 */
export function sumUsage(responses: readonly CompletionResponse[]): TokenUsage | undefined {
  let total: TokenUsage | undefined;
  for (const { usage } of responses) {
    if (!usage) continue;
    total = {
      inputTokens: (total?.inputTokens ?? 0) + usage.inputTokens,
      outputTokens: (total?.outputTokens ?? 0) + usage.outputTokens,
      totalTokens: (total?.totalTokens ?? 0) + usage.totalTokens,
    };
  }
  return total;
}

/**
 * Metadata for the usage summary. All fields are optional.
 */
export interface SummaryMetadata {
  /** Model name/ID being used */
  model?: string;

  /** Number of chunks sent */
  chunks?: number;

  /** Token usage summed over all responses */
  usage?: TokenUsage;

  /** Elapsed time in seconds */
  elapsedSeconds?: number;

  /** Total cost in USD, when the model's pricing is known */
  cost?: number;

  /** Finish reason of the last choice */
  finishReason?: string | null;
}

/**
 * Renders metadata as a compact summary line.
 *
 * **Format:** `model | N chunks | ↑ input | ↓ output | time | cost | finish`
 *
 * @returns Formatted summary string, or null if no fields are populated
 *
 * @example
 * ```typescript
 * renderSummary({
 *   model: "gpt-4o-mini",
 *   usage: { inputTokens: 896, outputTokens: 11500, totalTokens: 12396 },
 *   cost: 0.0123,
 *   finishReason: "stop",
 * }, createPainter(false));
 * // "gpt-4o-mini | ↑ 896 | ↓ 11.5k | $0.0123 | stop"
 * ```
 */
export function renderSummary(metadata: SummaryMetadata, paint: ChalkInstance = chalk): string | null {
  const parts: string[] = [];

  if (metadata.model) {
    parts.push(paint.magenta(metadata.model));
  }

  if (metadata.chunks !== undefined && metadata.chunks > 1) {
    parts.push(paint.cyan(`${metadata.chunks} chunks`));
  }

  if (metadata.usage) {
    parts.push(paint.dim("↑") + paint.yellow(` ${formatTokens(metadata.usage.inputTokens)}`));
    parts.push(paint.dim("↓") + paint.green(` ${formatTokens(metadata.usage.outputTokens)}`));
  }

  if (metadata.elapsedSeconds !== undefined && metadata.elapsedSeconds > 0) {
    parts.push(paint.dim(`${metadata.elapsedSeconds}s`));
  }

  if (metadata.cost !== undefined && metadata.cost > 0) {
    parts.push(paint.cyan(`$${formatCost(metadata.cost)}`));
  }

  if (metadata.finishReason) {
    parts.push(paint.dim(metadata.finishReason));
  }

  if (parts.length === 0) {
    return null;
  }

  return parts.join(paint.dim(" | "));
}
