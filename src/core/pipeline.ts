import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import type { CompletionClient } from "../providers/provider.js";
import { type Chunk, chunkText } from "./chunker.js";
import type { Cypher } from "./encoder.js";
import {
  CancelledError,
  ChunkFailedError,
  CompletionError,
  InvalidConfigurationError,
  isLoomError,
  type LoomError,
  MissingTemplateKeyError,
} from "./errors.js";
import {
  buildCompletionRequest,
  type CompletionParams,
  type CompletionRequest,
  type CompletionResponse,
  freezeResponse,
} from "./options.js";
import { classifyError, createRetryPolicy, type RetryConfig, type RetryPolicy, toCompletionError } from "./retry.js";
import type { PreparedTemplate, TemplateOverrides, TemplateRenderer } from "./templates.js";

export type PipelineState =
  | "idle"
  | "chunking"
  | "rendering"
  | "requesting"
  | "collecting"
  | "formatting"
  | "done"
  | "failed";

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  idle: ["chunking", "failed"],
  chunking: ["rendering", "done", "failed"],
  rendering: ["requesting", "failed"],
  requesting: ["collecting", "failed"],
  collecting: ["rendering", "formatting", "failed"],
  formatting: ["done", "failed"],
  done: [],
  failed: [],
};

export interface PipelineTransition {
  from: PipelineState;
  to: PipelineState;
  /** Chunk being processed, for per-chunk states */
  chunkIndex?: number;
}

/**
 * Thrown on a transition the state table does not allow. Always a bug.
 */
export class InvalidTransitionError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly to: PipelineState,
  ) {
    super(`Invalid pipeline transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Tracks the state of one run and reports every transition.
 */
export class PipelineStateMachine {
  private current: PipelineState = "idle";

  constructor(
    private readonly onTransition?: (transition: PipelineTransition) => void,
    private readonly logger?: Logger<ILogObj>,
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * @throws InvalidTransitionError if `to` is not reachable from the current state
   */
  transition(to: PipelineState, chunkIndex?: number): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;

    const transition: PipelineTransition = chunkIndex === undefined ? { from, to } : { from, to, chunkIndex };
    this.logger?.debug(`Pipeline ${from} -> ${to}`, chunkIndex === undefined ? {} : { chunkIndex });
    this.onTransition?.(transition);
  }
}

export type PipelineResult =
  | {
      state: "done";
      responses: readonly CompletionResponse[];
      output: string;
    }
  | {
      state: "failed";
      error: LoomError;
      /** Chunk that was being processed when the run failed */
      failedChunkIndex?: number;
      /** Responses collected before the failure */
      responses: readonly CompletionResponse[];
      /** Formatted partial output, only with `partialOutput` */
      output?: string;
    };

export type OutputFormatter = (responses: readonly CompletionResponse[]) => string;

/**
 * Choices of a response joined by a blank line, responses by a newline.
 */
export const joinCompletions: OutputFormatter = (responses) =>
  responses.map((response) => response.choices.map((choice) => choice.text).join("\n\n")).join("\n");

export interface PipelineOptions {
  /** Required when runs name a template */
  renderer?: TemplateRenderer;
  retry?: RetryConfig;
  /** Turns collected responses into the run's output (defaults to {@link joinCompletions}) */
  formatter?: OutputFormatter;
  logger?: Logger<ILogObj>;
  onTransition?: (transition: PipelineTransition) => void;
}

export interface RunOptions {
  params: CompletionParams;
  /** Template name; without one the chunk text is sent unchanged */
  template?: string;
  overrides?: TemplateOverrides;
  /** Maximum chunk size; without one the whole input is a single chunk */
  chunkSize?: number;
  forceChunk?: boolean;
  hardCut?: boolean;
  /** Encodes chunks before rendering and decodes completions */
  cypher?: Cypher;
  /** Text put before each chunk, such as a speaker label */
  inPrefix?: string;
  /** Text put after each chunk, where the completion should start */
  outPrefix?: string;
  signal?: AbortSignal;
  /** Format the responses collected so far when the run fails */
  partialOutput?: boolean;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

function decodeResponse(response: CompletionResponse, cypher: Cypher): CompletionResponse {
  return freezeResponse({
    ...response,
    choices: response.choices.map((choice) => ({ ...choice, text: cypher.decode(choice.text) })),
  });
}

/**
 * Drives input through chunking, template rendering, completion requests and
 * formatting, one chunk at a time.
 *
 * Template problems surface before any request is made. Each request is
 * retried according to the retry policy; a chunk that still fails ends the run
 * in the `failed` state with a {@link ChunkFailedError}.
 *
 * @example
 * ```typescript
 * const pipeline = new CompletionPipeline(client, { renderer });
 * const result = await pipeline.run(text, {
 *   params: resolveCompletionParams({ model: "gpt-4o-mini" }),
 *   template: "summarize",
 *   chunkSize: 4000,
 * });
 * if (result.state === "done") console.log(result.output);
 * ```
 */
export class CompletionPipeline {
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger<ILogObj>;
  private readonly formatter: OutputFormatter;

  constructor(
    private readonly client: CompletionClient,
    private readonly options: PipelineOptions = {},
  ) {
    this.retryPolicy = createRetryPolicy(options.retry);
    this.logger = options.logger ?? defaultLogger;
    this.formatter = options.formatter ?? joinCompletions;
  }

  async run(input: string, options: RunOptions): Promise<PipelineResult> {
    const machine = new PipelineStateMachine(this.options.onTransition, this.logger);
    const responses: CompletionResponse[] = [];
    const overrides = options.overrides ?? {};
    const { signal, cypher } = options;

    const fail = (error: unknown, failedChunkIndex?: number): PipelineResult => {
      if (!machine.isTerminal) {
        machine.transition("failed", failedChunkIndex);
      }
      if (!isLoomError(error)) {
        throw error;
      }
      this.logger.debug("Pipeline failed", { kind: error.kind, message: error.message, failedChunkIndex });
      return {
        state: "failed",
        error,
        ...(failedChunkIndex === undefined ? {} : { failedChunkIndex }),
        responses: [...responses],
        ...(options.partialOutput ? { output: this.formatter(responses) } : {}),
      };
    };

    machine.transition("chunking");

    let chunks: Chunk[];
    let template: PreparedTemplate | undefined;
    try {
      throwIfCancelled(signal);
      template = options.template ? this.prepareTemplate(options.template, overrides) : undefined;
      chunks = this.split(input, options);
    } catch (error) {
      return fail(error);
    }

    this.logger.debug("Chunked input", { chunks: chunks.length, template: options.template });

    if (chunks.length === 0) {
      machine.transition("done");
      return { state: "done", responses: [], output: "" };
    }

    let previous = "";
    for (const chunk of chunks) {
      machine.transition("rendering", chunk.index);

      let prompt: string;
      try {
        throwIfCancelled(signal);
        const encoded = cypher ? cypher.encode(chunk.text) : chunk.text;
        const text = `${options.inPrefix ?? ""}${encoded}${options.outPrefix ?? ""}`;
        prompt = template
          ? template.render(text, overrides, { index: chunk.index, count: chunks.length, previous })
          : text;
      } catch (error) {
        return fail(error, chunk.index);
      }

      machine.transition("requesting", chunk.index);

      let response: CompletionResponse;
      try {
        response = await this.request(buildCompletionRequest(chunk.index, prompt, options.params), signal);
      } catch (error) {
        return fail(error, chunk.index);
      }

      machine.transition("collecting", chunk.index);

      const collected = cypher ? decodeResponse(response, cypher) : response;
      responses.push(collected);
      previous = collected.choices[0]?.text ?? "";
    }

    machine.transition("formatting");

    let output: string;
    try {
      throwIfCancelled(signal);
      output = this.formatter(responses);
    } catch (error) {
      return fail(error);
    }

    machine.transition("done");
    return { state: "done", responses: [...responses], output };
  }

  private prepareTemplate(name: string, overrides: TemplateOverrides): PreparedTemplate {
    if (!this.options.renderer) {
      throw new InvalidConfigurationError(`Template '${name}' requested but the pipeline has no template renderer`);
    }
    const template = this.options.renderer.prepare(name);
    const missing = template.missingKeys(overrides);
    if (missing.length > 0) {
      throw new MissingTemplateKeyError(name, missing);
    }
    return template;
  }

  private split(input: string, options: RunOptions): Chunk[] {
    if (options.chunkSize === undefined) {
      return [{ index: 0, text: input, start: 0, end: input.length }];
    }
    return chunkText(input, {
      maxSize: options.chunkSize,
      force: options.forceChunk,
      hardCut: options.hardCut,
    });
  }

  /**
   * Sends one request with retries.
   *
   * @throws CancelledError when the signal aborts the request or a backoff wait
   * @throws ChunkFailedError when retries are exhausted or the failure is not retryable
   */
  private async request(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const policy = this.retryPolicy;
    const retries = policy.enabled ? policy.retries : 0;
    let attempts = 0;

    try {
      return await pRetry(
        async (attemptNumber) => {
          attempts = attemptNumber;
          this.logger.debug("Requesting completion", {
            chunkIndex: request.chunkIndex,
            attempt: attemptNumber,
            maxAttempts: retries + 1,
          });
          try {
            return await this.client.complete(request, signal ? { signal } : {});
          } catch (error) {
            throw isLoomError(error) ? error : toCompletionError(error);
          }
        },
        {
          retries,
          minTimeout: policy.minTimeout,
          maxTimeout: policy.maxTimeout,
          factor: policy.factor,
          randomize: policy.randomize,
          ...(signal ? { signal } : {}),
          shouldRetry: ({ error, attemptNumber, retriesLeft }) => {
            const kind = isLoomError(error) ? error.kind : classifyError(error);
            if (kind === "Cancelled" || signal?.aborted) {
              return false;
            }
            if (!policy.shouldRetry(attemptNumber, kind)) {
              return false;
            }
            this.logger.warn(
              `Chunk ${request.chunkIndex} request failed (attempt ${attemptNumber}/${attemptNumber + retriesLeft}), retrying...`,
              { error: error.message, kind },
            );
            if (error instanceof CompletionError) {
              policy.onRetry?.(error, attemptNumber);
            }
            return true;
          },
        },
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error instanceof CancelledError ? error : new CancelledError("Run cancelled", { cause: error });
      }
      if (error instanceof CancelledError) {
        throw error;
      }

      const cause = isLoomError(error) ? error : toCompletionError(error);
      if (cause.kind === "Cancelled") {
        throw new CancelledError(cause.message, { cause });
      }
      if (cause instanceof CompletionError) {
        policy.onRetriesExhausted?.(cause, attempts);
      }
      throw new ChunkFailedError(request.chunkIndex, cause, attempts);
    }
  }
}
