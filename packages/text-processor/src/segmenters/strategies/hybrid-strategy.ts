import type { SegmentContext, SegmentStrategy } from './segment-strategy';

import { TextNormalizer } from '../../normalizers/text-normalizer';
import { PunctuationCascadeStrategy } from './punctuation-cascade-strategy';

/**
 * HybridStrategy
 *
 * Thorough whitespace cleanup first, then the punctuation cascade.
 */
export class HybridStrategy implements SegmentStrategy {
  readonly name = 'hybrid';

  private readonly cascade = new PunctuationCascadeStrategy();

  split(text: string, context: SegmentContext): string[] {
    const cleaned = TextNormalizer.normalize(
      TextNormalizer.removeMeaninglessSpaces(text),
      { aggressive: true },
    );
    return this.cascade.split(cleaned, context);
  }
}
