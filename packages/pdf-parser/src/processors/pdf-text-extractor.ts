import type { LoggerMethods } from '@ondoku/logger';
import type { PageText, PageTextProvider } from '@ondoku/model';

import { ConcurrentPool, spawnAsync } from '@ondoku/shared';

import { PDF_TEXT_EXTRACTOR } from '../config/constants';
import { InputUnavailableError } from '../errors';

/**
 * PdfTextExtractor Options
 */
export interface PdfTextExtractorOptions {
  /**
   * Timeout for each pdfinfo / pdftotext call in milliseconds (default: 30000)
   */
  timeoutMs?: number;

  /**
   * Number of pages extracted at the same time (default: 4)
   */
  concurrency?: number;
}

/**
 * Extracts text from PDF pages using the pdftotext command-line tool.
 *
 * Uses the `-layout` flag to preserve the original page layout.
 * A page that fails to extract is logged as a warning and comes back empty;
 * a document that cannot be opened at all raises InputUnavailableError.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdfTextExtractor implements PageTextProvider {
  private readonly timeoutMs: number;
  private readonly concurrency: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: PdfTextExtractorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? PDF_TEXT_EXTRACTOR.DEFAULT_TIMEOUT_MS;
    this.concurrency =
      options.concurrency ?? PDF_TEXT_EXTRACTOR.DEFAULT_CONCURRENCY;
  }

  /**
   * Extract every page of a PDF as lines of text.
   *
   * @param pdfPath - Path to the source PDF file
   * @throws {InputUnavailableError} When pdfinfo cannot run or reports no pages
   */
  async extractPages(pdfPath: string): Promise<PageText[]> {
    let totalPages: number;
    try {
      totalPages = await this.getPageCount(pdfPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InputUnavailableError(pdfPath, `pdfinfo failed: ${message}`, {
        cause: error,
      });
    }

    if (totalPages === 0) {
      throw new InputUnavailableError(pdfPath, 'No pages found');
    }

    const pageTexts = await this.extractText(pdfPath, totalPages);

    return [...pageTexts].map(([pageIndex, text]) => ({
      pageIndex,
      lines: toLines(text),
    }));
  }

  /**
   * Extract text from all pages of a PDF.
   *
   * @param pdfPath - Path to the source PDF file
   * @param totalPages - Total number of pages in the PDF
   * @returns Map of 1-based page numbers to extracted text strings
   */
  async extractText(
    pdfPath: string,
    totalPages: number,
  ): Promise<Map<number, string>> {
    this.logger.info(
      `[PdfTextExtractor] Extracting text from ${totalPages} pages...`,
    );

    const pages = Array.from({ length: totalPages }, (_, i) => i + 1);
    const texts = await ConcurrentPool.run(pages, this.concurrency, (page) =>
      this.extractPageText(pdfPath, page),
    );

    const pageTexts = new Map<number, string>();
    pages.forEach((page, index) => pageTexts.set(page, texts[index]));

    const nonEmptyCount = texts.filter((t) => t.trim().length > 0).length;
    this.logger.info(
      `[PdfTextExtractor] Extracted text from ${nonEmptyCount}/${totalPages} pages`,
    );

    return pageTexts;
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   * Returns 0 when pdfinfo exits with an error.
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath], {
      timeoutMs: this.timeoutMs,
    });
    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdfinfo failed: ${result.stderr || 'Unknown error'}`,
      );
      return 0;
    }
    const match = result.stdout.match(PDF_TEXT_EXTRACTOR.PAGE_COUNT_PATTERN);
    return match ? parseInt(match[1], 10) : 0;
  }

  /**
   * Extract text from a single PDF page using pdftotext.
   * Returns empty string on failure (logged as warning).
   */
  async extractPageText(pdfPath: string, page: number): Promise<string> {
    try {
      const result = await spawnAsync(
        'pdftotext',
        [
          '-f',
          page.toString(),
          '-l',
          page.toString(),
          '-layout',
          pdfPath,
          '-',
        ],
        { timeoutMs: this.timeoutMs },
      );

      if (result.code !== 0) {
        this.logger.warn(
          `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
        );
        return '';
      }

      return result.stdout;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${message}`,
      );
      return '';
    }
  }
}

/**
 * pdftotext ends every page with a form feed and may emit CRLF on some builds.
 */
function toLines(text: string): string[] {
  const body = text.replace(/\f/g, '').replace(/\r\n?/g, '\n').trimEnd();
  return body ? body.split('\n') : [];
}
