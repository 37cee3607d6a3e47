/**
 * How often one line signature was seen across a page set
 *
 * @interface PatternOccurrence
 */
export interface PatternOccurrence {
  /**
   * Number of pages the signature appeared on (counted once per page)
   */
  pages: number;

  /**
   * Number of pages where it appeared within the top window
   */
  top: number;

  /**
   * Number of pages where it appeared within the bottom window
   */
  bottom: number;
}

/**
 * Signature → occurrence table built once per batch
 */
export type PatternCount = ReadonlyMap<string, PatternOccurrence>;

/**
 * Signatures recognised as running headers or footers
 *
 * A signature belongs to at most one of the two sets.
 *
 * @interface BoilerplateSet
 */
export interface BoilerplateSet {
  headers: ReadonlySet<string>;
  footers: ReadonlySet<string>;
}
