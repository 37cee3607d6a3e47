/**
 * Configuration constants for PdfTextExtractor
 */
export const PDF_TEXT_EXTRACTOR = {
  /**
   * Default timeout for a single pdfinfo / pdftotext call in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 30000,

  /**
   * Default number of pages extracted at the same time
   */
  DEFAULT_CONCURRENCY: 4,

  /**
   * Pattern for the page count line of pdfinfo output
   */
  PAGE_COUNT_PATTERN: /^Pages:\s+(\d+)/m,
} as const;
