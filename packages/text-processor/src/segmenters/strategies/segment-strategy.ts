import type { SegmentationStrategy } from '@ondoku/model';

/**
 * Length limits a strategy works with
 */
export interface SegmentContext {
  maxLength: number;
  minLength: number;
}

/**
 * One way of breaking cleaned page text into reading units.
 *
 * Strategies return raw chunks; trimming, dropping empties and merging short
 * chunks is left to the Segmenter.
 */
export interface SegmentStrategy {
  readonly name: SegmentationStrategy;
  split(text: string, context: SegmentContext): string[];
}
