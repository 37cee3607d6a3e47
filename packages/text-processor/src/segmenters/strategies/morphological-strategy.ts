import type { LoggerMethods } from '@ondoku/logger';
import type { MorphToken, MorphologicalTokenizer } from '@ondoku/model';

import type { SegmentContext, SegmentStrategy } from './segment-strategy';

import {
  JAPANESE_TEXT,
  MORPHOLOGICAL_BREAK_POS,
} from '../../config/constants';
import {
  CollaboratorUnavailableError,
  TextProcessingError,
} from '../../errors';
import { splitParagraphs } from '../segment-utils';
import { PunctuationCascadeStrategy } from './punctuation-cascade-strategy';

const BREAK_POS: readonly string[] = MORPHOLOGICAL_BREAK_POS;
const SENTENCE_FINAL = new RegExp(`^[${JAPANESE_TEXT.SENTENCE_END}]+$`);

/**
 * MorphologicalStrategy
 *
 * Breaks at word-group boundaries found by a morphological analyzer: after a
 * particle, auxiliary or symbol once the line has reached the limit, and
 * always after a sentence-final mark.
 *
 * Without a working analyzer it falls back to the punctuation cascade and
 * reports a CollaboratorUnavailableError through `onWarning`.
 */
export class MorphologicalStrategy implements SegmentStrategy {
  readonly name = 'morphological';

  private readonly fallback = new PunctuationCascadeStrategy();

  constructor(
    private readonly logger: LoggerMethods,
    private readonly tokenizer: MorphologicalTokenizer | undefined,
    private readonly onWarning?: (warning: CollaboratorUnavailableError) => void,
  ) {
    if (!tokenizer) {
      this.report(
        new CollaboratorUnavailableError(
          'morphological-tokenizer',
          'Morphological analyzer is not available',
        ),
      );
    }
  }

  split(text: string, context: SegmentContext): string[] {
    if (!this.tokenizer) {
      return this.fallback.split(text, context);
    }

    const chunks: string[] = [];
    for (const paragraph of splitParagraphs(text)) {
      let tokens: MorphToken[];
      try {
        tokens = this.tokenizer.tokenize(paragraph);
      } catch (error) {
        this.report(
          new CollaboratorUnavailableError(
            'morphological-tokenizer',
            `Morphological analyzer failed: ${TextProcessingError.getErrorMessage(error)}`,
            { cause: error },
          ),
        );
        return this.fallback.split(text, context);
      }
      chunks.push(...this.splitTokens(tokens, context.maxLength));
    }

    return chunks;
  }

  private splitTokens(tokens: readonly MorphToken[], maxLength: number): string[] {
    const chunks: string[] = [];
    let current = '';

    for (const token of tokens) {
      current += token.surface;

      if (BREAK_POS.includes(token.pos) && current.length >= maxLength) {
        chunks.push(current);
        current = '';
      } else if (SENTENCE_FINAL.test(token.surface)) {
        chunks.push(current);
        current = '';
      }
    }
    if (current) chunks.push(current);

    return chunks;
  }

  private report(warning: CollaboratorUnavailableError): void {
    this.logger.warn(
      `[MorphologicalStrategy] ${warning.message}, using punctuation strategy`,
    );
    this.onWarning?.(warning);
  }
}
