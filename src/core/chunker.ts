import { InvalidConfigurationError } from "./errors.js";

/**
 * A contiguous slice of the input text.
 *
 * `text === input.slice(start, end)`, and consecutive chunks share a boundary
 * (`chunks[i].end === chunks[i + 1].start`), so joining every chunk's text in
 * order reproduces the input exactly.
 */
export interface Chunk {
  /** Zero-based position in the sequence */
  readonly index: number;
  readonly text: string;
  /** Offset of the first character in the source (inclusive) */
  readonly start: number;
  /** Offset after the last character in the source (exclusive) */
  readonly end: number;
}

export interface ChunkOptions {
  /**
   * Maximum chunk size in UTF-16 code units (JavaScript string length).
   */
  maxSize: number;
  /**
   * Split even when the whole input already fits in `maxSize`.
   * @default false
   */
  force?: boolean;
  /**
   * Cut at exactly `maxSize` when a window contains no boundary, instead of
   * keeping the unbroken unit whole as one oversized chunk.
   * @default false
   */
  hardCut?: boolean;
}

// Blank line, then any whitespace that follows it.
const PARAGRAPH_BREAK = /\n[^\S\n]*\n\s*/g;
// Terminal punctuation, optional closing quotes or brackets, then whitespace.
const SENTENCE_BREAK = /[.!?]["'”’)\]]*\s+/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Offset just past the last match of `pattern` in `window`, or -1.
 * A match must end after position 0 so every chunk makes progress.
 */
function lastBreak(window: string, pattern: RegExp): number {
  let cut = -1;
  for (const match of window.matchAll(pattern)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > 0) {
      cut = end;
    }
  }
  return cut;
}

function findCut(window: string): number {
  for (const pattern of [PARAGRAPH_BREAK, SENTENCE_BREAK, WHITESPACE_RUN]) {
    const cut = lastBreak(window, pattern);
    if (cut > 0) {
      return cut;
    }
  }
  return -1;
}

/**
 * End of the unbroken unit that reaches `from`: `from` itself when whitespace
 * starts there, otherwise where the next whitespace starts, or the end of the
 * input. The whitespace is left for the next chunk.
 */
function endOfUnit(input: string, from: number): number {
  if (from >= input.length) {
    return input.length;
  }
  const match = /\s/.exec(input.slice(from));
  return match ? from + match.index : input.length;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits `input` into ordered chunks of at most `maxSize` characters.
 *
 * Cuts prefer paragraph breaks, then sentence ends, then any whitespace, always
 * the last such boundary inside the window. Boundary whitespace stays with the
 * chunk before the cut. A window without any boundary is either extended to
 * the end of its unbroken unit (one oversized chunk, never including the
 * whitespace after it) or, with `hardCut`, cut at `maxSize`.
 *
 * With `force`, the final window is split too: an input that fits is still cut
 * at its last boundary when text follows it.
 *
 * @throws InvalidConfigurationError if `maxSize` is not a positive integer
 *
 * @example
 * ```typescript
 * chunkText("a. b. c.", { maxSize: 4 }).map((c) => c.text);
 * // ["a. ", "b. ", "c."]
 * ```
 */
export function chunkText(input: string, options: ChunkOptions): Chunk[] {
  const { maxSize, force = false, hardCut = false } = options;

  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new InvalidConfigurationError(`Chunk size must be a positive integer, got ${maxSize}`);
  }

  if (input.length === 0) {
    return [];
  }

  if (input.length <= maxSize && !force) {
    return [{ index: 0, text: input, start: 0, end: input.length }];
  }

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < input.length) {
    let end: number;

    if (input.length - start <= maxSize && !force) {
      end = input.length;
    } else {
      const window = input.slice(start, start + maxSize);
      const cut = findCut(window);

      if (cut > 0) {
        end = start + cut;
      } else if (hardCut) {
        end = start + maxSize;
        // Keep surrogate pairs together
        if (end < input.length && maxSize > 1 && isHighSurrogate(input.charCodeAt(end - 1))) {
          end -= 1;
        }
      } else {
        end = endOfUnit(input, start + maxSize);
      }

      end = Math.min(end, input.length);
    }

    chunks.push({ index: chunks.length, text: input.slice(start, end), start, end });
    start = end;
  }

  return chunks;
}

/**
 * Length of the longest chunk, or 0 for an empty list.
 */
export function largestChunkSize(chunks: readonly Chunk[]): number {
  return chunks.reduce((max, chunk) => Math.max(max, chunk.text.length), 0);
}
