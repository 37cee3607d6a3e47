/**
 * Line-segmentation policies
 *
 * - punctuation: sentence marks, then commas, then connectives
 * - clause: breaks after particles and conjunctive phrases
 * - morphological: token-boundary breaks driven by a morphological analyzer
 * - hybrid: aggressive whitespace cleanup followed by punctuation
 * - clean-only: whitespace cleanup, breaking only very long lines
 */
export type SegmentationStrategy =
  | 'punctuation'
  | 'clause'
  | 'morphological'
  | 'hybrid'
  | 'clean-only';

/**
 * A finished reading unit
 */
export type SegmentUnit = string;

/**
 * Token produced by a morphological analyzer
 *
 * @interface MorphToken
 */
export interface MorphToken {
  /**
   * Surface form as it appears in the text
   */
  surface: string;

  /**
   * Part-of-speech tag (e.g. "助詞", "名詞")
   */
  pos: string;
}

/**
 * Morphological analyzer capability, injected where available
 *
 * @interface MorphologicalTokenizer
 */
export interface MorphologicalTokenizer {
  tokenize(text: string): MorphToken[];
}
