import { JAPANESE_TEXT } from '../config/constants';

const SENTENCE_PATTERN = new RegExp(
  `[^${JAPANESE_TEXT.SENTENCE_END}]*[${JAPANESE_TEXT.SENTENCE_END}]+[${JAPANESE_TEXT.TRAILING_CLOSERS}]*|[^${JAPANESE_TEXT.SENTENCE_END}]+`,
  'g',
);
const ASCII_ALPHANUMERIC = /[A-Za-z0-9]/;

/**
 * Join pieces of running text. Japanese needs no separator; a space is
 * inserted only between two ASCII alphanumerics ("PDF" + "file").
 */
export function joinUnits(parts: readonly string[]): string {
  let result = '';
  for (const part of parts) {
    const piece = part.trim();
    if (!piece) continue;
    if (
      ASCII_ALPHANUMERIC.test(result.slice(-1)) &&
      ASCII_ALPHANUMERIC.test(piece[0])
    ) {
      result += ' ';
    }
    result += piece;
  }
  return result;
}

/**
 * Split text into paragraphs at blank lines; the lines of each paragraph are
 * joined into one run of text.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n[ \t　]*\n/)
    .map((paragraph) => joinUnits(paragraph.split('\n')))
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Split after sentence-final marks, keeping each mark and any closing
 * brackets right after it with the sentence.
 *
 * @example
 * ```typescript
 * splitSentences('「はい。」と答えた。次へ');
 * // ['「はい。」', 'と答えた。', '次へ']
 * ```
 */
export function splitSentences(text: string): string[] {
  return text.match(SENTENCE_PATTERN) ?? [];
}

/**
 * Merge chunks shorter than `minLength` into the chunk before them whenever
 * the result stays within `maxLength`.
 *
 * Afterwards no short chunk sits next to a chunk it could still be merged
 * with.
 */
export function mergeShortUnits(
  chunks: readonly string[],
  minLength: number,
  maxLength: number,
): string[] {
  const result: string[] = [];

  for (const chunk of chunks) {
    const last = result.at(-1);
    if (last !== undefined && (last.length < minLength || chunk.length < minLength)) {
      const merged = joinUnits([last, chunk]);
      if (merged.length <= maxLength) {
        result[result.length - 1] = merged;
        continue;
      }
    }
    result.push(chunk);
  }

  return result;
}
