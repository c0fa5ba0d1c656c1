import { get_encoding, type TiktokenEncoding } from "tiktoken";
import { getOpenAIModelSpec } from "./openai-models.js";
import type { Tokenizer } from "./provider.js";

const FALLBACK_ENCODING: TiktokenEncoding = "o200k_base";

/**
 * tiktoken-backed tokenizer for `model`. Unknown models use o200k_base.
 */
export function createTiktokenTokenizer(model: string): Tokenizer {
  const encodingName = getOpenAIModelSpec(model)?.encoding ?? FALLBACK_ENCODING;

  return {
    encode(text: string): number[] {
      const encoding = get_encoding(encodingName);
      try {
        return Array.from(encoding.encode(text));
      } finally {
        encoding.free();
      }
    },
  };
}
