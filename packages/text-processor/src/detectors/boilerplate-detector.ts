import type { LoggerMethods } from '@ondoku/logger';
import type {
  BoilerplateSet,
  PageText,
  PatternCount,
  PatternOccurrence,
} from '@ondoku/model';

import { BOILERPLATE } from '../config/constants';
import { createLineRecords } from './line-signature';

/**
 * BoilerplateDetector options
 */
export interface BoilerplateDetectorOptions {
  /**
   * Non-empty lines examined at the top and at the bottom of each page
   * (default: 3)
   */
  topBottomWindow?: number;

  /**
   * Share of pages a signature must appear on to count as boilerplate
   * (default: 0.4)
   */
  thresholdFraction?: number;

  /**
   * Longer candidate lines are ignored (default: 100)
   */
  maxCandidateLength?: number;
}

interface WindowHit {
  top: boolean;
  bottom: boolean;
}

/**
 * BoilerplateDetector
 *
 * Finds running headers and footers by counting, across the whole page set,
 * how many pages carry the same line signature near the page edges.
 */
export class BoilerplateDetector {
  private readonly window: number;
  private readonly thresholdFraction: number;
  private readonly maxCandidateLength: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: BoilerplateDetectorOptions,
  ) {
    this.window = options?.topBottomWindow ?? 3;
    this.thresholdFraction = options?.thresholdFraction ?? 0.4;
    this.maxCandidateLength = options?.maxCandidateLength ?? 100;
  }

  /**
   * Detect header and footer signatures.
   *
   * A signature qualifies when it appears on at least
   * `max(2, thresholdFraction × pages)` pages. It is a header when seen in the
   * top window more often than in the bottom window, a footer otherwise.
   * Fewer than two pages always yield an empty set.
   */
  detect(pages: readonly PageText[]): BoilerplateSet {
    const headers = new Set<string>();
    const footers = new Set<string>();

    if (pages.length < BOILERPLATE.MIN_OCCURRENCES) {
      this.logger.debug(
        `[BoilerplateDetector] Skipping detection for ${pages.length} page(s)`,
      );
      return { headers, footers };
    }

    const threshold = Math.max(
      BOILERPLATE.MIN_OCCURRENCES,
      this.thresholdFraction * pages.length,
    );

    for (const [signature, occurrence] of this.countPatterns(pages)) {
      if (occurrence.pages < threshold) continue;

      const isHeader = occurrence.top > occurrence.bottom;
      (isHeader ? headers : footers).add(signature);
      this.logger.info(
        `[BoilerplateDetector] ${isHeader ? 'Header' : 'Footer'} pattern "${signature}" on ${occurrence.pages}/${pages.length} pages`,
      );
    }

    this.logger.info(
      `[BoilerplateDetector] Detected ${headers.size} header(s) and ${footers.size} footer(s) across ${pages.length} pages`,
    );

    return { headers, footers };
  }

  /**
   * Count, per signature, the pages it appears on within the top or bottom
   * window. Each page contributes at most once per signature.
   */
  countPatterns(pages: readonly PageText[]): PatternCount {
    const counts = new Map<string, PatternOccurrence>();

    for (const page of pages) {
      for (const [signature, hit] of this.collectCandidates(page)) {
        const occurrence = counts.get(signature) ?? {
          pages: 0,
          top: 0,
          bottom: 0,
        };
        occurrence.pages++;
        if (hit.top) occurrence.top++;
        if (hit.bottom) occurrence.bottom++;
        counts.set(signature, occurrence);
      }
    }

    return counts;
  }

  private collectCandidates(page: PageText): Map<string, WindowHit> {
    const candidates = new Map<string, WindowHit>();

    for (const record of createLineRecords(page.lines)) {
      if (!record.trimmed) continue;
      if (record.trimmed.length > this.maxCandidateLength) continue;

      const top = record.fromTop < this.window;
      const bottom = record.fromBottom < this.window;
      if (!top && !bottom) continue;

      const hit = candidates.get(record.signature) ?? {
        top: false,
        bottom: false,
      };
      hit.top ||= top;
      hit.bottom ||= bottom;
      candidates.set(record.signature, hit);
    }

    return candidates;
  }
}
