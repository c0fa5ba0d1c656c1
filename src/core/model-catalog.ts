/**
 * Model Catalog Types
 *
 * Context windows, tokenizers, endpoints and pricing of known models.
 */

import type { TiktokenEncoding } from "tiktoken";
import type { TokenUsage } from "./options.js";

export interface ModelPricing {
  /** Price per 1 million input tokens in USD */
  input: number;
  /** Price per 1 million output tokens in USD */
  output: number;
}

/**
 * Which API a model is served from: chat completions or the legacy
 * prompt-in/text-out completions endpoint.
 */
export type ModelEndpoint = "chat" | "completions";

export interface ModelSpec {
  /** Full model identifier used in API calls */
  modelId: string;
  /** Human-readable display name */
  displayName: string;
  /** Maximum context window size in tokens (prompt + completion) */
  contextWindow: number;
  /** Maximum output tokens per request */
  maxOutputTokens: number;
  /** tiktoken encoding used by the model */
  encoding: TiktokenEncoding;
  endpoint: ModelEndpoint;
  /** Pricing per 1M tokens */
  pricing: ModelPricing;
  metadata?: {
    /** Model family/series */
    family?: string;
    /** Whether manual temperature configuration is supported (defaults to true) */
    supportsTemperature?: boolean;
  };
}

const LEGACY_COMPLETION_PATTERN = /instruct|davinci|babbage/;

/**
 * Models served from the legacy completions endpoint.
 */
export function isLegacyCompletionModel(modelId: string): boolean {
  return LEGACY_COMPLETION_PATTERN.test(modelId);
}

// -2024-08-06 or -0613
const SNAPSHOT_SUFFIX = /^-(?:\d{4}-\d{2}-\d{2}|\d{4})$/;

/**
 * Finds the spec for `modelId`: an exact match, else the model it is a dated
 * snapshot of (`gpt-4o-2024-08-06` resolves to `gpt-4o`, `gpt-4-0613` to
 * `gpt-4`). Other variants such as `gpt-4-32k` are unknown.
 */
export function findModelSpec(specs: readonly ModelSpec[], modelId: string): ModelSpec | undefined {
  const exact = specs.find((spec) => spec.modelId === modelId);
  if (exact) {
    return exact;
  }

  return specs.find(
    (spec) => modelId.startsWith(spec.modelId) && SNAPSHOT_SUFFIX.test(modelId.slice(spec.modelId.length)),
  );
}

/**
 * Estimated cost in USD of a request, or undefined without pricing data.
 */
export function calculateCost(spec: ModelSpec | undefined, usage: TokenUsage | undefined): number | undefined {
  if (!spec || !usage) {
    return undefined;
  }
  return (usage.inputTokens * spec.pricing.input + usage.outputTokens * spec.pricing.output) / 1_000_000;
}
