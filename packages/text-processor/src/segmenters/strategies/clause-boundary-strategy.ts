import type { SegmentStrategy } from './segment-strategy';

import { CLAUSE_MARKERS, CLAUSE_SEGMENTATION } from '../../config/constants';
import { joinUnits, splitParagraphs } from '../segment-utils';

// Longest first so "であって、" wins over "で、"
const CLAUSE_MARKER_PATTERN = new RegExp(
  [...CLAUSE_MARKERS].sort((a, b) => b.length - a.length).join('|'),
  'g',
);

// Shortest match, so consecutive long phrases break one by one
const LONG_PHRASE_PATTERN = new RegExp(
  `、.{${CLAUSE_SEGMENTATION.LONG_PHRASE_LENGTH},}?、`,
  'g',
);

/**
 * ClauseBoundaryStrategy
 *
 * Semantic line breaks: after topic/subject/object particles followed by a
 * comma, after attributive phrases ("という", "ような" ...), and around a long
 * phrase set off by commas. Very short lines are folded into the next one.
 */
export class ClauseBoundaryStrategy implements SegmentStrategy {
  readonly name = 'clause';

  split(text: string): string[] {
    return splitParagraphs(text).flatMap((paragraph) => {
      const lines = paragraph
        .replace(CLAUSE_MARKER_PATTERN, '$&\n')
        .split('\n')
        .flatMap((line) => this.breakLongPhrases(line))
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

      return this.mergeShortLines(lines);
    });
  }

  /**
   * Break after both commas around a phrase of at least LONG_PHRASE_LENGTH
   * characters, and after any comma inside it
   */
  private breakLongPhrases(line: string): string[] {
    return line
      .replace(LONG_PHRASE_PATTERN, (phrase) => phrase.replace(/、/g, '、\n'))
      .split('\n');
  }

  /**
   * Fold lines shorter than MIN_LINE_LENGTH into the following line; a short
   * last line goes to the previous one
   */
  private mergeShortLines(lines: readonly string[]): string[] {
    const result: string[] = [];
    let carry = '';

    for (const line of lines) {
      const combined = joinUnits([carry, line]);
      if (combined.length < CLAUSE_SEGMENTATION.MIN_LINE_LENGTH) {
        carry = combined;
      } else {
        result.push(combined);
        carry = '';
      }
    }

    if (carry) {
      if (result.length > 0) {
        result[result.length - 1] = joinUnits([result[result.length - 1], carry]);
      } else {
        result.push(carry);
      }
    }

    return result;
  }
}
