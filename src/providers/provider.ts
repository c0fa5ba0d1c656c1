import type { CompletionRequest, CompletionResponse } from "../core/options.js";

export interface CompletionCallOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Capability interface over a text-generation backend.
 *
 * Implementations reject with a `CompletionError` whose `kind` tells the
 * caller whether the failure is worth retrying. They do not retry themselves.
 */
export interface CompletionClient {
  readonly clientId: string;

  complete(request: CompletionRequest, options?: CompletionCallOptions): Promise<CompletionResponse>;
}

/**
 * Text → token ids for a model's encoding.
 */
export interface Tokenizer {
  encode(text: string): number[];
}
