/**
 * Text of one document page as handed over by the extraction provider
 *
 * @interface PageText
 */
export interface PageText {
  /**
   * 1-based page index in the source document
   *
   * Indices are usually contiguous but gaps are allowed; an absent page is
   * simply not processed.
   */
  pageIndex: number;

  /**
   * Lines in reading order, without line terminators
   */
  lines: readonly string[];
}

/**
 * One line of a page with its position, derived for boilerplate analysis
 *
 * @interface LineRecord
 */
export interface LineRecord {
  /**
   * Line as it appears in the page
   */
  text: string;

  /**
   * Line with surrounding whitespace removed
   */
  trimmed: string;

  /**
   * Comparison signature (digits and dates replaced by placeholders)
   *
   * Empty string for blank lines.
   */
  signature: string;

  /**
   * Index of the line within the page (0-based)
   */
  index: number;

  /**
   * Number of non-empty lines above this line
   */
  fromTop: number;

  /**
   * Number of non-empty lines below this line
   */
  fromBottom: number;
}

/**
 * Source of per-page text, e.g. a wrapper around a PDF text extraction tool
 *
 * @interface PageTextProvider
 */
export interface PageTextProvider {
  /**
   * Extract every page of the given source in page order
   */
  extractPages(source: string): Promise<PageText[]>;
}
