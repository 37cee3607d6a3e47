import type { LoggerMethods } from '@ondoku/logger';
import type {
  MorphologicalTokenizer,
  SegmentationStrategy,
  SegmentUnit,
} from '@ondoku/model';

import type { CollaboratorUnavailableError } from '../errors';
import type { SegmentContext, SegmentStrategy } from './strategies';

import { mergeShortUnits } from './segment-utils';
import {
  ClauseBoundaryStrategy,
  CleanOnlyStrategy,
  HybridStrategy,
  MorphologicalStrategy,
  PunctuationCascadeStrategy,
} from './strategies';

/**
 * Segmenter options
 */
export interface SegmenterOptions {
  /**
   * Segmentation policy (default: 'punctuation')
   */
  strategy?: SegmentationStrategy;

  /**
   * Upper bound for a reading unit (default: 45)
   */
  maxLineLength?: number;

  /**
   * Units shorter than this are merged with a neighbour (default: 10)
   */
  minLineLength?: number;

  /**
   * Morphological analyzer for the 'morphological' strategy
   */
  tokenizer?: MorphologicalTokenizer;

  /**
   * Receives recoverable problems such as a missing analyzer
   */
  onWarning?: (warning: CollaboratorUnavailableError) => void;
}

/**
 * Segmenter
 *
 * Breaks cleaned page text into reading units with the configured strategy,
 * then trims the units, drops empty ones and merges short ones. Stateless
 * across calls.
 */
export class Segmenter {
  private readonly strategy: SegmentStrategy;
  private readonly context: SegmentContext;

  constructor(
    private readonly logger: LoggerMethods,
    options?: SegmenterOptions,
  ) {
    this.context = {
      maxLength: options?.maxLineLength ?? 45,
      minLength: options?.minLineLength ?? 10,
    };
    this.strategy = this.createStrategy(
      options?.strategy ?? 'punctuation',
      options,
    );
  }

  /**
   * Name of the strategy in use
   */
  get strategyName(): SegmentationStrategy {
    return this.strategy.name;
  }

  segment(text: string): SegmentUnit[] {
    const chunks = this.strategy
      .split(text, this.context)
      .map((chunk) => chunk.trim())
      .filter((chunk) => chunk.length > 0);

    return mergeShortUnits(
      chunks,
      this.context.minLength,
      this.context.maxLength,
    );
  }

  private createStrategy(
    strategy: SegmentationStrategy,
    options?: SegmenterOptions,
  ): SegmentStrategy {
    this.logger.debug(`[Segmenter] Using ${strategy} strategy`);

    switch (strategy) {
      case 'punctuation':
        return new PunctuationCascadeStrategy();
      case 'clause':
        return new ClauseBoundaryStrategy();
      case 'morphological':
        return new MorphologicalStrategy(
          this.logger,
          options?.tokenizer,
          options?.onWarning,
        );
      case 'hybrid':
        return new HybridStrategy();
      case 'clean-only':
        return new CleanOnlyStrategy();
      default: {
        const unknown: never = strategy;
        throw new Error(`Unknown segmentation strategy: ${String(unknown)}`);
      }
    }
  }
}
