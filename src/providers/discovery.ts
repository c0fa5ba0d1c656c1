import type { ILogObj, Logger } from "tslog";
import { CompletionError } from "../core/errors.js";
import { ECHO_MODEL, EchoCompletionClient } from "./echo.js";
import { createOpenAICompletionClient } from "./openai.js";
import type { CompletionClient } from "./provider.js";
import { isNonEmpty, readEnvVar } from "./utils.js";

export const API_KEY_ENV_VAR = "OPENAI_API_KEY";
export const API_BASE_ENV_VAR = "OPENAI_BASE_URL";

export interface ClientSettings {
  /** API key; falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Base URL of an OpenAI-compatible API; falls back to OPENAI_BASE_URL */
  baseURL?: string;
  logger?: Logger<ILogObj>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Picks the client for `model`: the offline echo client for `test`, the
 * OpenAI client otherwise.
 *
 * @throws CompletionError (`AuthInvalid`) when no API key is configured
 */
export function createCompletionClient(model: string, settings: ClientSettings = {}): CompletionClient {
  if (model === ECHO_MODEL) {
    return new EchoCompletionClient();
  }

  const apiKey = isNonEmpty(settings.apiKey) ? settings.apiKey : readEnvVar(API_KEY_ENV_VAR, settings.env);
  if (!isNonEmpty(apiKey)) {
    throw new CompletionError(
      "AuthInvalid",
      `No API key configured. Set ${API_KEY_ENV_VAR} or api-key in the [global] config section`,
    );
  }

  const baseURL = isNonEmpty(settings.baseURL) ? settings.baseURL : readEnvVar(API_BASE_ENV_VAR, settings.env);

  return createOpenAICompletionClient({
    apiKey: apiKey.trim(),
    ...(isNonEmpty(baseURL) ? { baseURL: baseURL.trim() } : {}),
    logger: settings.logger,
  });
}
