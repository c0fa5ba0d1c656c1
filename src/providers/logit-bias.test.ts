import { describe, expect, it } from "vitest";
import { InvalidConfigurationError } from "../core/errors.js";
import { parseLogitBias } from "./logit-bias.js";
import type { Tokenizer } from "./provider.js";

// One token per character: the code point
const charTokenizer: Tokenizer = {
  encode: (text) => [...text].map((char) => char.codePointAt(0) ?? 0),
};

describe("parseLogitBias", () => {
  it("passes token ids through", () => {
    expect(parseLogitBias(["token:50256=-100"], charTokenizer)).toEqual({ "50256": -100 });
  });

  it("maps words to the first token of the space-prefixed word", () => {
    // " no" encodes to [32, 110, 111]
    expect(parseLogitBias(["no=-5"], charTokenizer)).toEqual({ "32": -5 });
  });

  it("uses the tokenizer's first token", () => {
    const tokenizer: Tokenizer = { encode: () => [7, 8] };
    expect(parseLogitBias(["maybe=2.5"], tokenizer)).toEqual({ "7": 2.5 });
  });

  it("lets later specs win", () => {
    expect(parseLogitBias(["token:1=1", "token:01=-1"], charTokenizer)).toEqual({ "1": -1 });
  });

  it.each(["nobias", "=3", "word=", "word=lots", "token:x=1"])("rejects %s", (spec) => {
    expect(() => parseLogitBias([spec], charTokenizer)).toThrow(InvalidConfigurationError);
  });

  it("rejects words without tokens", () => {
    const empty: Tokenizer = { encode: () => [] };
    expect(() => parseLogitBias(["word=1"], empty)).toThrow("encodes to no tokens");
  });
});
