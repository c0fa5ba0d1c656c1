import { InvalidConfigurationError } from "../core/errors.js";
import type { Tokenizer } from "./provider.js";

const TOKEN_PREFIX = "token:";

/**
 * Turns `word=bias` and `token:<id>=bias` specs into the token id → bias map
 * the API expects.
 *
 * A word is biased through the first token of `" " + word`, the form it takes
 * mid-sentence. Later specs for the same token win.
 *
 * @throws InvalidConfigurationError for malformed specs
 *
 * @example
 * ```typescript
 * parseLogitBias(["token:50256=-100", "maybe=-5"], tokenizer);
 * // { "50256": -100, "<id of ' maybe'>": -5 }
 * ```
 */
export function parseLogitBias(specs: readonly string[], tokenizer: Tokenizer): Record<string, number> {
  const biases: Record<string, number> = {};

  for (const spec of specs) {
    const separator = spec.lastIndexOf("=");
    if (separator <= 0) {
      throw new InvalidConfigurationError(`Invalid logit bias '${spec}'. Expected word=bias or token:<id>=bias`);
    }

    const key = spec.slice(0, separator).trim();
    const rawBias = spec.slice(separator + 1).trim();
    const bias = Number(rawBias);
    if (rawBias === "" || !Number.isFinite(bias)) {
      throw new InvalidConfigurationError(`Invalid logit bias value '${rawBias}' for '${key}'`);
    }

    if (key.startsWith(TOKEN_PREFIX)) {
      const id = key.slice(TOKEN_PREFIX.length).trim();
      if (!/^\d+$/.test(id)) {
        throw new InvalidConfigurationError(`Invalid token id '${id}' in logit bias '${spec}'`);
      }
      biases[String(Number(id))] = bias;
      continue;
    }

    if (key === "") {
      throw new InvalidConfigurationError(`Invalid logit bias '${spec}'. The word is empty`);
    }

    const [first] = tokenizer.encode(` ${key}`);
    if (first === undefined) {
      throw new InvalidConfigurationError(`Logit bias word '${key}' encodes to no tokens`);
    }
    biases[String(first)] = bias;
  }

  return biases;
}
