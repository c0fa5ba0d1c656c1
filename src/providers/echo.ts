import { CancelledError } from "../core/errors.js";
import { type CompletionRequest, type CompletionResponse, freezeResponse } from "../core/options.js";
import type { CompletionCallOptions, CompletionClient } from "./provider.js";

/**
 * Model id served by {@link EchoCompletionClient}.
 */
export const ECHO_MODEL = "test";

/**
 * Offline client that returns the prompt itself as every completion.
 * Used by the `test` model to check templates and chunking without network
 * access or an API key.
 */
export class EchoCompletionClient implements CompletionClient {
  readonly clientId = "echo";

  async complete(request: CompletionRequest, options: CompletionCallOptions = {}): Promise<CompletionResponse> {
    if (options.signal?.aborted) {
      throw new CancelledError("Request cancelled");
    }

    return freezeResponse({
      chunkIndex: request.chunkIndex,
      model: request.params.model,
      prompt: request.prompt,
      choices: Array.from({ length: request.params.n }, (_, index) => ({
        index,
        text: request.prompt,
        finishReason: "stop",
      })),
    });
  }
}
