/**
 * Chunking Engine
 *
 * Splits extracted text into overlapping fixed-size word windows.
 * Each window records the word range it covers and the character range
 * of those words in the input, so a hit can be traced back to the source.
 */

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * One window of consecutive words
 */
export interface TextWindow {
  /** Position of the window in the file (0-based) */
  ordinal: number;
  /** The window's words joined by single spaces */
  text: string;
  /** Index of the first word (inclusive) */
  wordStart: number;
  /** Index after the last word (exclusive) */
  wordEnd: number;
  /** Offset of the first word's first character in the input */
  charStart: number;
  /** Offset after the last word's last character in the input */
  charEnd: number;
}

interface WordSpan {
  word: string;
  start: number;
  end: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Words are maximal runs of non-whitespace
 */
function tokenize(text: string): WordSpan[] {
  const words: WordSpan[] = [];
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    words.push({ word: match[0], start: match.index, end: match.index + match[0].length });
  }

  return words;
}

/**
 * Number of words shared by consecutive windows
 */
export function overlapWords(sizeWords: number, overlapRatio: number): number {
  return Math.round(sizeWords * overlapRatio);
}

// ============================================================================
// Chunking
// ============================================================================

/**
 * Split text into word windows
 *
 * Windows start every `sizeWords - overlap` words. The walk stops at the
 * first window that reaches the last word, so no window is contained in
 * its predecessor.
 *
 * @throws RangeError if sizeWords is not a positive integer, overlapRatio
 *         is outside [0, 1), or the rounded overlap leaves no step
 *
 * @example
 * ```typescript
 * // 300 words, size 150, ratio 0.15: overlap 23, step 127
 * chunkText(text, 150, 0.15).map((w) => [w.wordStart, w.wordEnd]);
 * // => [[0, 150], [127, 277], [254, 300]]
 * ```
 */
export function chunkText(text: string, sizeWords: number, overlapRatio: number): TextWindow[] {
  if (!Number.isInteger(sizeWords) || sizeWords < 1) {
    throw new RangeError(`sizeWords must be a positive integer, got ${sizeWords}`);
  }
  if (!(overlapRatio >= 0 && overlapRatio < 1)) {
    throw new RangeError(`overlapRatio must be in [0, 1), got ${overlapRatio}`);
  }

  const overlap = overlapWords(sizeWords, overlapRatio);
  if (overlap >= sizeWords) {
    throw new RangeError(`overlap of ${overlap} words leaves no step for windows of ${sizeWords}`);
  }
  const step = sizeWords - overlap;

  const words = tokenize(text);
  const windows: TextWindow[] = [];

  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + sizeWords, words.length);
    const slice = words.slice(start, end);

    windows.push({
      ordinal: windows.length,
      text: slice.map((w) => w.word).join(' '),
      wordStart: start,
      wordEnd: end,
      charStart: slice[0].start,
      charEnd: slice[slice.length - 1].end,
    });

    if (end === words.length) {
      break;
    }
  }

  return windows;
}
