import { InvalidConfigurationError } from "./errors.js";

/**
 * A reversible word-wise transformation applied to prompts before they are
 * sent and to completions after they come back.
 */
export interface Cypher {
  readonly name: string;
  encode(text: string): string;
  decode(text: string): string;
}

const SEPARATOR = /([^\p{L}\p{N}]+)/u;
const WORD = /^[\p{L}\p{N}]+$/u;

/**
 * Applies `transform` to every run of letters and digits, leaving
 * punctuation and whitespace untouched.
 */
export function mapWords(text: string, transform: (word: string) => string): string {
  return text
    .split(SEPARATOR)
    .map((part) => (WORD.test(part) ? transform(part) : part))
    .join("");
}

const ALPHABET_SIZE = 26;

/**
 * Shifts ASCII letters by `shift` positions, wrapping within the alphabet.
 */
export function caesarShift(word: string, shift: number): string {
  const offset = ((shift % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
  return word.replace(/[A-Za-z]/g, (letter) => {
    const base = letter <= "Z" ? 65 : 97;
    return String.fromCharCode(((letter.charCodeAt(0) - base + offset) % ALPHABET_SIZE) + base);
  });
}

export function base64Encode(word: string): string {
  return Buffer.from(word, "utf-8").toString("base64").replace(/=+$/, "");
}

const BASE64_WORD = /^[A-Za-z0-9+/]+$/;
const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes an unpadded base64 word. Words that are not valid base64 of UTF-8
 * text are returned unchanged.
 */
export function base64Decode(word: string): string {
  if (!BASE64_WORD.test(word) || word.length % 4 === 1) {
    return word;
  }
  try {
    return strictUtf8.decode(Buffer.from(word, "base64"));
  } catch {
    return word;
  }
}

export function reverseWord(word: string): string {
  return [...word].reverse().join("");
}

function wordCypher(name: string, encodeWord: (w: string) => string, decodeWord: (w: string) => string): Cypher {
  return {
    name,
    encode: (text) => mapWords(text, encodeWord),
    decode: (text) => mapWords(text, decodeWord),
  };
}

export const CYPHER_NAMES = ["none", "base64", "b64", "reverse", "rev", "rot<N>", "caesar<N>"] as const;

/**
 * Looks up a cypher by name: `base64` (`b64`), `reverse` (`rev`),
 * `rot<N>` / `caesar<N>` or `none`.
 *
 * @throws InvalidConfigurationError for unknown names
 */
export function getCypher(spec: string): Cypher {
  const name = spec.trim().toLowerCase();

  if (name === "none" || name === "") {
    return { name: "none", encode: (text) => text, decode: (text) => text };
  }
  if (name === "base64" || name === "b64") {
    return wordCypher("base64", base64Encode, base64Decode);
  }
  if (name === "reverse" || name === "rev") {
    return wordCypher("reverse", reverseWord, reverseWord);
  }

  const shift = /^(?:rot|caesar)-?(\d+)$/.exec(name);
  if (shift?.[1]) {
    const amount = Number.parseInt(shift[1], 10);
    return wordCypher(
      name,
      (word) => caesarShift(word, amount),
      (word) => caesarShift(word, -amount),
    );
  }

  throw new InvalidConfigurationError(`Unknown cypher '${spec}'. Expected one of: ${CYPHER_NAMES.join(", ")}`);
}
