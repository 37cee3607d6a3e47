import type { SegmentStrategy } from './segment-strategy';

import { CLEAN_ONLY } from '../../config/constants';
import { TextNormalizer } from '../../normalizers/text-normalizer';
import { splitSentences } from '../segment-utils';

/**
 * CleanOnlyStrategy
 *
 * Keeps the existing line breaks and only removes stray whitespace. Lines
 * over LONG_LINE_LENGTH are broken after sentence-final marks; a resulting
 * piece that is still long and comma-heavy is broken after every
 * COMMAS_PER_BREAK-th comma.
 */
export class CleanOnlyStrategy implements SegmentStrategy {
  readonly name = 'clean-only';

  split(text: string): string[] {
    const cleaned = TextNormalizer.normalize(
      TextNormalizer.removeMeaninglessSpaces(text),
      { aggressive: true },
    );

    return cleaned.split('\n').flatMap((line) => {
      const trimmed = line.trim();
      if (!trimmed) return [];
      if (trimmed.length <= CLEAN_ONLY.LONG_LINE_LENGTH) return [trimmed];

      return splitSentences(trimmed).flatMap((piece) =>
        this.breakAtCommas(piece),
      );
    });
  }

  private breakAtCommas(piece: string): string[] {
    const commaCount = piece.split('、').length - 1;
    if (
      commaCount <= CLEAN_ONLY.COMMAS_PER_BREAK ||
      piece.length <= CLEAN_ONLY.LONG_SENTENCE_LENGTH
    ) {
      return [piece];
    }

    const parts: string[] = [];
    let current = '';
    let commas = 0;
    for (const char of piece) {
      current += char;
      if (char !== '、') continue;
      commas++;
      if (commas === CLEAN_ONLY.COMMAS_PER_BREAK) {
        parts.push(current);
        current = '';
        commas = 0;
      }
    }
    if (current) parts.push(current);

    return parts;
  }
}
