import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import type { Completion, CompletionCreateParamsNonStreaming } from "openai/resources/completions";
import type { ILogObj, Logger } from "tslog";
import { CancelledError, CompletionError, InvalidConfigurationError } from "../core/errors.js";
import { isLegacyCompletionModel } from "../core/model-catalog.js";
import {
  type CompletionChoice,
  type CompletionRequest,
  type CompletionResponse,
  freezeResponse,
  type TokenLogprob,
  type TokenUsage,
} from "../core/options.js";
import { formatCompletionError, kindFromStatus, toCompletionError } from "../core/retry.js";
import { getOpenAIModelSpec } from "./openai-models.js";
import type { CompletionCallOptions, CompletionClient, Tokenizer } from "./provider.js";
import { createTiktokenTokenizer } from "./tokenizer.js";
import { stripLeadingNewline } from "./utils.js";

interface SdkRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
}

/**
 * The parts of the OpenAI SDK this client calls.
 */
export interface OpenAIApi {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: SdkRequestOptions): Promise<ChatCompletion>;
    };
  };
  completions: {
    create(body: CompletionCreateParamsNonStreaming, options?: SdkRequestOptions): Promise<Completion>;
  };
}

export interface OpenAICompletionClientOptions {
  /** Tokenizer used for the max-token clamp (defaults to tiktoken) */
  tokenizerFor?: (model: string) => Tokenizer;
  logger?: Logger<ILogObj>;
}

/**
 * Completion client for OpenAI-compatible APIs.
 *
 * Models whose id contains `instruct`, `davinci` or `babbage` use the legacy
 * completions endpoint; everything else goes through chat completions with the
 * prompt as a single user message.
 */
export class OpenAICompletionClient implements CompletionClient {
  readonly clientId = "openai";

  constructor(
    private readonly client: OpenAIApi,
    private readonly options: OpenAICompletionClientOptions = {},
  ) {}

  async complete(request: CompletionRequest, options: CompletionCallOptions = {}): Promise<CompletionResponse> {
    const maxTokens = this.clampMaxTokens(request);
    const requestOptions: SdkRequestOptions = {
      timeout: request.params.timeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
    };

    try {
      const response = isLegacyCompletionModel(request.params.model)
        ? await this.completeLegacy(request, maxTokens, requestOptions)
        : await this.completeChat(request, maxTokens, requestOptions);
      return freezeResponse(response);
    } catch (error) {
      throw mapOpenAIError(error);
    }
  }

  /**
   * Limits `maxTokens` to what is left of the model's context window after the
   * prompt. Unknown models are sent as requested.
   *
   * @throws InvalidConfigurationError when the prompt alone fills the window
   */
  private clampMaxTokens(request: CompletionRequest): number {
    const { model, maxTokens } = request.params;
    const spec = getOpenAIModelSpec(model);
    if (!spec) {
      return maxTokens;
    }

    const tokenizer = this.options.tokenizerFor?.(model) ?? createTiktokenTokenizer(model);
    const promptTokens = tokenizer.encode(request.prompt).length;
    const available = spec.contextWindow - promptTokens;

    if (available < 1) {
      throw new InvalidConfigurationError(
        `Prompt for chunk ${request.chunkIndex} uses ${promptTokens} tokens, which fills the ${spec.contextWindow}-token context window of ${model}`,
      );
    }

    if (maxTokens > available) {
      this.options.logger?.debug("Clamped max tokens to the context window", {
        model,
        requested: maxTokens,
        clamped: available,
      });
      return available;
    }
    return maxTokens;
  }

  private async completeChat(
    request: CompletionRequest,
    maxTokens: number,
    requestOptions: SdkRequestOptions,
  ): Promise<CompletionResponse> {
    const { params } = request;
    const supportsTemperature = getOpenAIModelSpec(params.model)?.metadata?.supportsTemperature !== false;

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      messages: [{ role: "user", content: request.prompt }],
      max_completion_tokens: maxTokens,
      n: params.n,
      top_p: params.topP,
      presence_penalty: params.presencePenalty,
      frequency_penalty: params.frequencyPenalty,
      ...(supportsTemperature ? { temperature: params.temperature } : {}),
      ...(params.stop.length > 0 ? { stop: [...params.stop] } : {}),
      ...(params.logprobs !== undefined ? { logprobs: true, top_logprobs: params.logprobs } : {}),
      ...(params.logitBias ? { logit_bias: { ...params.logitBias } } : {}),
    };

    const completion = await this.client.chat.completions.create(body, requestOptions);

    const choices: CompletionChoice[] = [...completion.choices]
      .sort((a, b) => a.index - b.index)
      .map((choice) => ({
        index: choice.index,
        text: stripLeadingNewline(choice.message.content ?? ""),
        finishReason: choice.finish_reason ?? null,
        ...(choice.logprobs?.content
          ? {
              logprobs: choice.logprobs.content.map((entry) => ({
                token: entry.token,
                logprob: entry.logprob,
                topLogprobs: entry.top_logprobs.map((top) => ({ token: top.token, logprob: top.logprob })),
              })),
            }
          : {}),
      }));

    return {
      chunkIndex: request.chunkIndex,
      model: completion.model,
      prompt: request.prompt,
      choices,
      ...(completion.usage ? { usage: toUsage(completion.usage) } : {}),
    };
  }

  private async completeLegacy(
    request: CompletionRequest,
    maxTokens: number,
    requestOptions: SdkRequestOptions,
  ): Promise<CompletionResponse> {
    const { params } = request;

    const body: CompletionCreateParamsNonStreaming = {
      model: params.model,
      prompt: request.prompt,
      max_tokens: maxTokens,
      n: params.n,
      temperature: params.temperature,
      top_p: params.topP,
      presence_penalty: params.presencePenalty,
      frequency_penalty: params.frequencyPenalty,
      ...(params.stop.length > 0 ? { stop: [...params.stop] } : {}),
      ...(params.logprobs !== undefined ? { logprobs: params.logprobs } : {}),
      ...(params.logitBias ? { logit_bias: { ...params.logitBias } } : {}),
    };

    const completion = await this.client.completions.create(body, requestOptions);

    const choices: CompletionChoice[] = [...completion.choices]
      .sort((a, b) => a.index - b.index)
      .map((choice) => {
        const logprobs = toLegacyLogprobs(choice.logprobs);
        return {
          index: choice.index,
          text: stripLeadingNewline(choice.text),
          finishReason: choice.finish_reason ?? null,
          ...(logprobs ? { logprobs } : {}),
        };
      });

    return {
      chunkIndex: request.chunkIndex,
      model: completion.model,
      prompt: request.prompt,
      choices,
      ...(completion.usage ? { usage: toUsage(completion.usage) } : {}),
    };
  }
}

function toUsage(usage: { prompt_tokens: number; completion_tokens: number; total_tokens: number }): TokenUsage {
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

function toLegacyLogprobs(logprobs: Completion["choices"][number]["logprobs"]): TokenLogprob[] | undefined {
  if (!logprobs?.tokens || !logprobs.token_logprobs) {
    return undefined;
  }
  const values = logprobs.token_logprobs;
  const alternatives = logprobs.top_logprobs;

  return logprobs.tokens.map((token, i) => {
    const top = alternatives?.[i];
    return {
      token,
      logprob: values[i] ?? 0,
      ...(top
        ? { topLogprobs: Object.entries(top).map(([alternative, logprob]) => ({ token: alternative, logprob })) }
        : {}),
    };
  });
}

/**
 * Maps OpenAI SDK errors to {@link CompletionError}s: by SDK class first, then
 * by status, then by message.
 */
export function mapOpenAIError(error: unknown): Error {
  if (error instanceof CompletionError || error instanceof InvalidConfigurationError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new CancelledError("Request cancelled", { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new CompletionError("Timeout", formatCompletionError(error), { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new CompletionError("ServiceUnavailable", formatCompletionError(error), { cause: error });
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return new CompletionError(kindFromStatus(error.status), formatCompletionError(error), {
      cause: error,
      status: error.status,
    });
  }
  return toCompletionError(error);
}

export interface OpenAIClientSettings {
  apiKey: string;
  baseURL?: string;
  logger?: Logger<ILogObj>;
  tokenizerFor?: (model: string) => Tokenizer;
}

/**
 * Creates a client on the OpenAI SDK with SDK-level retries disabled; retries
 * are the pipeline's job.
 */
export function createOpenAICompletionClient(settings: OpenAIClientSettings): OpenAICompletionClient {
  const sdk = new OpenAI({
    apiKey: settings.apiKey,
    ...(settings.baseURL ? { baseURL: settings.baseURL } : {}),
    maxRetries: 0,
  });
  return new OpenAICompletionClient(sdk, { logger: settings.logger, tokenizerFor: settings.tokenizerFor });
}
