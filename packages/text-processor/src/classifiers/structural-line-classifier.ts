import {
  BARE_PAGE_NUMBER_PATTERN,
  HEADING_PATTERNS,
  JAPANESE_TEXT,
  PAGE_NUMBER_PATTERNS,
  STRUCTURAL_KEYWORDS,
  STRUCTURAL_LINES,
} from '../config/constants';

/**
 * StructuralLineClassifier options
 */
export interface StructuralLineClassifierOptions {
  /**
   * Keyword and heading rules only apply to lines up to this length
   * (default: 20)
   */
  shortLineCutoff?: number;

  /**
   * Custom structural keywords to add (optional)
   */
  additionalKeywords?: string[];
}

/**
 * StructuralLineClassifier
 *
 * Recognises chapter titles, sidebar headings and page numbers that are not
 * part of the running prose. All methods are pure and never throw.
 */
export class StructuralLineClassifier {
  private readonly shortLineCutoff: number;
  private readonly keywordPatterns: RegExp[];

  constructor(options?: StructuralLineClassifierOptions) {
    this.shortLineCutoff = options?.shortLineCutoff ?? 20;
    this.keywordPatterns = [
      ...STRUCTURAL_KEYWORDS,
      ...(options?.additionalKeywords ?? []),
    ].map(toKeywordPattern);
  }

  /**
   * Single-line check: a short heading-like line, or a page number.
   *
   * @example
   * ```typescript
   * classifier.isStructural('第3章');  // true
   * classifier.isStructural('これは本文中の第3章という単語を含む長い一文です');  // false
   * ```
   */
  isStructural(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed) return false;
    return this.isPageNumber(trimmed) || this.isHeadingLike(trimmed);
  }

  /**
   * Whether the line is one of the page number shapes
   * (`12`, `- 12 -`, `[12]`, `（12）`, `P.12`, `12ページ`, `Page 12`)
   */
  isPageNumber(line: string): boolean {
    const trimmed = line.trim();
    return PAGE_NUMBER_PATTERNS.some((pattern) => pattern.test(trimmed));
  }

  /**
   * Whether the line holds nothing but an integer
   */
  isBarePageNumber(line: string): boolean {
    return BARE_PAGE_NUMBER_PATTERN.test(line.trim());
  }

  /**
   * Page-level check. Returns the indices of structural lines.
   *
   * Stricter than {@link isStructural} for headings: a heading-like line
   * counts only next to a blank line or a page edge. Page numbers always
   * count, and so does a short line repeating one of the lines just above it.
   */
  findStructuralLines(lines: readonly string[]): Set<number> {
    const structural = new Set<number>();
    const trimmedLines = lines.map((line) => line.trim());

    trimmedLines.forEach((trimmed, index) => {
      if (!trimmed) return;

      if (this.isPageNumber(trimmed)) {
        structural.add(index);
        return;
      }

      if (
        this.isHeadingLike(trimmed) &&
        (this.isBlankOrEdge(trimmedLines, index - 1) ||
          this.isBlankOrEdge(trimmedLines, index + 1))
      ) {
        structural.add(index);
        return;
      }

      if (this.repeatsRecentLine(trimmedLines, index)) {
        structural.add(index);
      }
    });

    return structural;
  }

  private isHeadingLike(trimmed: string): boolean {
    if (trimmed.length > this.shortLineCutoff) return false;
    if (JAPANESE_TEXT.SENTENCE_END.includes(trimmed.slice(-1))) return false;

    return (
      this.keywordPatterns.some((pattern) => pattern.test(trimmed)) ||
      HEADING_PATTERNS.some((pattern) => pattern.test(trimmed))
    );
  }

  private isBlankOrEdge(trimmedLines: readonly string[], index: number): boolean {
    return index < 0 || index >= trimmedLines.length || !trimmedLines[index];
  }

  private repeatsRecentLine(
    trimmedLines: readonly string[],
    index: number,
  ): boolean {
    const trimmed = trimmedLines[index];
    if (trimmed.length >= STRUCTURAL_LINES.DUPLICATE_LINE_CUTOFF) return false;

    const from = Math.max(0, index - STRUCTURAL_LINES.DUPLICATE_LOOKBACK);
    return trimmedLines.slice(from, index).includes(trimmed);
  }
}

/**
 * Latin keywords match whole words only ("Part" but not "Partner");
 * other keywords match anywhere in the line.
 */
function toKeywordPattern(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return /^[A-Za-z]/.test(keyword) || /[A-Za-z]$/.test(keyword)
    ? new RegExp(`(?<![A-Za-z])${escaped}(?![A-Za-z])`)
    : new RegExp(escaped);
}
