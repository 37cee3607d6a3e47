import type { BoilerplateSet } from './boilerplate';
import type { SegmentUnit } from './segmentation';

/**
 * Reading units of one page
 *
 * @interface PageSegments
 */
export interface PageSegments {
  pageIndex: number;

  /**
   * Units in reading order
   */
  chunks: SegmentUnit[];
}

/**
 * A page that could not be processed
 *
 * @interface PageFailure
 */
export interface PageFailure {
  pageIndex: number;
  message: string;
  cause: unknown;
}

/**
 * Outcome of one batch run
 *
 * @interface TextProcessResult
 */
export interface TextProcessResult {
  /**
   * Pages with content left after cleaning, in input order
   */
  pages: PageSegments[];

  /**
   * Boilerplate detected over the whole batch
   */
  boilerplate: BoilerplateSet;

  /**
   * Pages skipped because their processing threw
   */
  failures: PageFailure[];

  /**
   * Recoverable problems, e.g. a missing morphological analyzer
   */
  warnings: string[];
}
