/**
 * OpenAI Model Specifications
 *
 * Context windows, tokenizers and pricing for the chat and legacy completion
 * models this client knows about. Unknown models still work; they just skip
 * the max-token clamp and cost estimate.
 */

import { findModelSpec, type ModelSpec } from "../core/model-catalog.js";

export const OPENAI_MODELS: ModelSpec[] = [
  {
    modelId: "gpt-4.1",
    displayName: "GPT-4.1",
    contextWindow: 1_047_576,
    maxOutputTokens: 32_768,
    encoding: "o200k_base",
    endpoint: "chat",
    pricing: { input: 2.0, output: 8.0 },
    metadata: { family: "GPT-4.1" },
  },
  {
    modelId: "gpt-4.1-mini",
    displayName: "GPT-4.1 Mini",
    contextWindow: 1_047_576,
    maxOutputTokens: 32_768,
    encoding: "o200k_base",
    endpoint: "chat",
    pricing: { input: 0.4, output: 1.6 },
    metadata: { family: "GPT-4.1" },
  },
  {
    modelId: "gpt-4o",
    displayName: "GPT-4o",
    contextWindow: 128_000,
    maxOutputTokens: 16_384,
    encoding: "o200k_base",
    endpoint: "chat",
    pricing: { input: 2.5, output: 10.0 },
    metadata: { family: "GPT-4o" },
  },
  {
    modelId: "gpt-4o-mini",
    displayName: "GPT-4o Mini",
    contextWindow: 128_000,
    maxOutputTokens: 16_384,
    encoding: "o200k_base",
    endpoint: "chat",
    pricing: { input: 0.15, output: 0.6 },
    metadata: { family: "GPT-4o" },
  },
  {
    modelId: "gpt-4-turbo",
    displayName: "GPT-4 Turbo",
    contextWindow: 128_000,
    maxOutputTokens: 4_096,
    encoding: "cl100k_base",
    endpoint: "chat",
    pricing: { input: 10.0, output: 30.0 },
    metadata: { family: "GPT-4" },
  },
  {
    modelId: "gpt-4",
    displayName: "GPT-4",
    contextWindow: 8_192,
    maxOutputTokens: 8_192,
    encoding: "cl100k_base",
    endpoint: "chat",
    pricing: { input: 30.0, output: 60.0 },
    metadata: { family: "GPT-4" },
  },
  {
    modelId: "gpt-3.5-turbo",
    displayName: "GPT-3.5 Turbo",
    contextWindow: 16_385,
    maxOutputTokens: 4_096,
    encoding: "cl100k_base",
    endpoint: "chat",
    pricing: { input: 0.5, output: 1.5 },
    metadata: { family: "GPT-3.5" },
  },
  {
    modelId: "gpt-3.5-turbo-instruct",
    displayName: "GPT-3.5 Turbo Instruct",
    contextWindow: 4_096,
    maxOutputTokens: 4_096,
    encoding: "cl100k_base",
    endpoint: "completions",
    pricing: { input: 1.5, output: 2.0 },
    metadata: { family: "GPT-3.5" },
  },
  {
    modelId: "davinci-002",
    displayName: "Davinci 002",
    contextWindow: 16_384,
    maxOutputTokens: 16_384,
    encoding: "cl100k_base",
    endpoint: "completions",
    pricing: { input: 2.0, output: 2.0 },
    metadata: { family: "Base" },
  },
  {
    modelId: "babbage-002",
    displayName: "Babbage 002",
    contextWindow: 16_384,
    maxOutputTokens: 16_384,
    encoding: "cl100k_base",
    endpoint: "completions",
    pricing: { input: 0.4, output: 0.4 },
    metadata: { family: "Base" },
  },
];

export function getOpenAIModelSpec(modelId: string): ModelSpec | undefined {
  return findModelSpec(OPENAI_MODELS, modelId);
}
