import type { SegmentContext, SegmentStrategy } from './segment-strategy';

import { CONNECTIVES } from '../../config/constants';
import { splitParagraphs, splitSentences } from '../segment-utils';

const COMMA_PIECE = /[^、]*、+|[^、]+/g;

/**
 * PunctuationCascadeStrategy
 *
 * Breaks after sentence-final marks. A sentence still longer than the limit
 * is broken at commas, and failing that after the first connective
 * ("しかし", "ので" ...).
 */
export class PunctuationCascadeStrategy implements SegmentStrategy {
  readonly name = 'punctuation';

  split(text: string, context: SegmentContext): string[] {
    const chunks: string[] = [];

    for (const paragraph of splitParagraphs(text)) {
      for (const raw of splitSentences(paragraph)) {
        const sentence = raw.trim();
        if (!sentence) continue;
        chunks.push(...this.splitSentence(sentence, context.maxLength));
      }
    }

    return chunks;
  }

  private splitSentence(sentence: string, maxLength: number): string[] {
    if (sentence.length <= maxLength) return [sentence];

    if (!sentence.includes('、')) {
      return this.splitAtConnective(sentence, maxLength);
    }

    return this.splitAtCommas(sentence, maxLength).flatMap((chunk) =>
      chunk.length > maxLength
        ? this.splitAtConnective(chunk, maxLength)
        : [chunk],
    );
  }

  /**
   * Accumulate comma-terminated pieces up to `maxLength`
   */
  private splitAtCommas(sentence: string, maxLength: number): string[] {
    const chunks: string[] = [];
    let current = '';

    for (const piece of sentence.match(COMMA_PIECE) ?? []) {
      if (current && current.length + piece.length > maxLength) {
        chunks.push(current);
        current = piece;
      } else {
        current += piece;
      }
    }
    if (current) chunks.push(current);

    return chunks;
  }

  /**
   * Break after the earliest connective, keeping it with the first half, and
   * cascade into the rest. Text without a usable connective is returned as is.
   */
  private splitAtConnective(text: string, maxLength: number): string[] {
    const chunks: string[] = [];
    let rest = text;

    while (rest.length > maxLength) {
      const end = this.findConnectiveEnd(rest);
      if (end === -1) break;
      chunks.push(rest.slice(0, end));
      rest = rest.slice(end);
    }
    chunks.push(rest);

    return chunks;
  }

  private findConnectiveEnd(text: string): number {
    let bestIndex = -1;
    let bestEnd = -1;
    for (const connective of CONNECTIVES) {
      const index = text.indexOf(connective);
      const end = index + connective.length;
      if (index === -1 || end >= text.length) continue;
      if (bestIndex === -1 || index < bestIndex) {
        bestIndex = index;
        bestEnd = end;
      }
    }
    return bestEnd;
  }
}
