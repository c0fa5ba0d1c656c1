import { z } from "zod";
import { InvalidConfigurationError } from "./errors.js";

/**
 * Default generation parameters. Anything the caller leaves out falls back to
 * these values.
 */
export const DEFAULT_COMPLETION_PARAMS = {
  model: "gpt-4o-mini",
  temperature: 0.7,
  maxTokens: 256,
  n: 1,
  presencePenalty: 0,
  frequencyPenalty: 0,
  topP: 1,
  timeoutMs: 60_000,
} as const;

/**
 * Validation schema for generation parameters. Omitted fields take the
 * defaults above. Token ids in `logitBias` are decimal strings, as the API
 * expects.
 */
export const completionParamsSchema = z
  .object({
    model: z.string().trim().min(1, "model must not be empty").default(DEFAULT_COMPLETION_PARAMS.model),
    temperature: z.number().min(0).max(2).default(DEFAULT_COMPLETION_PARAMS.temperature),
    maxTokens: z.number().int().min(1).default(DEFAULT_COMPLETION_PARAMS.maxTokens),
    n: z.number().int().min(1).default(DEFAULT_COMPLETION_PARAMS.n),
    stop: z.array(z.string().min(1)).max(4, "at most 4 stop sequences are allowed").default([]),
    presencePenalty: z.number().min(-2).max(2).default(DEFAULT_COMPLETION_PARAMS.presencePenalty),
    frequencyPenalty: z.number().min(-2).max(2).default(DEFAULT_COMPLETION_PARAMS.frequencyPenalty),
    topP: z.number().min(0).max(1).default(DEFAULT_COMPLETION_PARAMS.topP),
    logprobs: z.number().int().min(0).max(20).optional(),
    logitBias: z
      .record(z.string().regex(/^\d+$/, "token ids must be integers"), z.number().min(-100).max(100))
      .optional(),
    timeoutMs: z.number().int().min(1).default(DEFAULT_COMPLETION_PARAMS.timeoutMs),
  })
  .strict();

/** Parameters as callers supply them; every field is optional. */
export type CompletionParamsInput = z.input<typeof completionParamsSchema>;

export type CompletionParams = z.output<typeof completionParamsSchema>;

/**
 * Generation parameters of a built request.
 */
export type FrozenCompletionParams = Readonly<Omit<CompletionParams, "stop" | "logitBias">> & {
  readonly stop: readonly string[];
  readonly logitBias?: Readonly<Record<string, number>>;
};

/**
 * A single request to the completion backend. Frozen once built.
 */
export interface CompletionRequest {
  readonly chunkIndex: number;
  readonly prompt: string;
  readonly params: FrozenCompletionParams;
}

export interface TokenLogprob {
  readonly token: string;
  readonly logprob: number;
  /** Most likely alternatives at this position, when requested */
  readonly topLogprobs?: ReadonlyArray<{ token: string; logprob: number }>;
}

export interface CompletionChoice {
  readonly index: number;
  readonly text: string;
  readonly finishReason: string | null;
  readonly logprobs?: readonly TokenLogprob[];
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * What the backend returned for one request. Frozen after creation.
 */
export interface CompletionResponse {
  readonly chunkIndex: number;
  readonly model: string;
  /** The prompt that was sent */
  readonly prompt: string;
  readonly choices: readonly CompletionChoice[];
  readonly usage?: TokenUsage;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "params"}: ${issue.message}`)
    .join("; ");
}

/**
 * Applies defaults to `params` and validates the result.
 *
 * @throws InvalidConfigurationError naming every invalid parameter
 */
export function resolveCompletionParams(params: CompletionParamsInput = {}): CompletionParams {
  const result = completionParamsSchema.safeParse(params);
  if (!result.success) {
    throw new InvalidConfigurationError(`Invalid generation parameters: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Builds a frozen request for one rendered chunk.
 */
export function buildCompletionRequest(
  chunkIndex: number,
  prompt: string,
  params: CompletionParams | FrozenCompletionParams,
): CompletionRequest {
  const frozenParams = Object.freeze({
    ...params,
    stop: Object.freeze([...params.stop]),
    ...(params.logitBias ? { logitBias: Object.freeze({ ...params.logitBias }) } : {}),
  });
  return Object.freeze({ chunkIndex, prompt, params: frozenParams });
}

/**
 * Deep-freezes a response so later stages cannot mutate it.
 */
export function freezeResponse(response: CompletionResponse): CompletionResponse {
  const choices = response.choices.map((choice) =>
    Object.freeze({
      ...choice,
      ...(choice.logprobs ? { logprobs: Object.freeze(choice.logprobs.map((lp) => Object.freeze({ ...lp }))) } : {}),
    }),
  );
  return Object.freeze({
    ...response,
    choices: Object.freeze(choices),
    ...(response.usage ? { usage: Object.freeze({ ...response.usage }) } : {}),
  });
}
