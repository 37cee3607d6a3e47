import type { LoggerMethods } from '@ondoku/logger';
import type { BoilerplateSet, PageText } from '@ondoku/model';

import type { StructuralLineClassifier } from '../classifiers/structural-line-classifier';

import { REGEX_PATTERN_PREFIX } from '../config/constants';
import { createLineSignature } from '../detectors/line-signature';

/**
 * PageCleaner options
 */
export interface PageCleanerOptions {
  /**
   * Extra text to remove from every page: a literal substring, or a regular
   * expression when prefixed with `regex:`
   */
  removePatterns?: readonly string[];
}

export interface CleanOptions {
  /**
   * Drop chapter titles, sidebar headings and page numbers (default: true)
   */
  stripStructural?: boolean;
}

type RemovalPattern =
  | { kind: 'literal'; text: string }
  | { kind: 'regex'; pattern: RegExp };

/**
 * PageCleaner
 *
 * Removes boilerplate and structural lines from one page while keeping the
 * order and paragraph breaks of the remaining text.
 */
export class PageCleaner {
  private readonly removePatterns: RemovalPattern[];

  constructor(
    private readonly logger: LoggerMethods,
    private readonly classifier: StructuralLineClassifier,
    options?: PageCleanerOptions,
  ) {
    this.removePatterns = (options?.removePatterns ?? []).map(
      (pattern): RemovalPattern =>
        pattern.startsWith(REGEX_PATTERN_PREFIX)
          ? {
              kind: 'regex',
              pattern: new RegExp(
                pattern.slice(REGEX_PATTERN_PREFIX.length),
                'g',
              ),
            }
          : { kind: 'literal', text: pattern },
    );
  }

  /**
   * Clean one page.
   *
   * Boilerplate lines and bare page numbers are always dropped; structural
   * lines (with one blank line after them) only when `stripStructural` is set.
   * Runs of blank lines collapse to one and blank lines at both ends go.
   */
  clean(
    page: PageText,
    boilerplate: BoilerplateSet,
    options?: CleanOptions,
  ): string {
    const stripStructural = options?.stripStructural ?? true;
    const structural = stripStructural
      ? this.classifier.findStructuralLines(page.lines)
      : new Set<number>();

    const kept: string[] = [];
    let removed = 0;
    let skipNextBlank = false;

    page.lines.forEach((line, index) => {
      const trimmed = line.trim();
      const afterStructural = skipNextBlank;
      skipNextBlank = false;

      if (!trimmed) {
        const previous = kept.at(-1);
        if (!afterStructural && previous !== undefined && previous !== '') {
          kept.push('');
        }
        return;
      }

      if (this.isBoilerplate(trimmed, boilerplate)) {
        removed++;
        return;
      }

      if (structural.has(index)) {
        removed++;
        skipNextBlank = true;
        return;
      }

      if (this.classifier.isBarePageNumber(trimmed)) {
        removed++;
        return;
      }

      kept.push(line.trimEnd());
    });

    while (kept.at(-1) === '') {
      kept.pop();
    }

    if (removed > 0) {
      this.logger.debug(
        `[PageCleaner] Page ${page.pageIndex}: removed ${removed} line(s)`,
      );
    }

    return this.applyRemovePatterns(kept.join('\n'));
  }

  private isBoilerplate(trimmed: string, boilerplate: BoilerplateSet): boolean {
    const signature = createLineSignature(trimmed);
    return boilerplate.headers.has(signature) || boilerplate.footers.has(signature);
  }

  private applyRemovePatterns(text: string): string {
    return this.removePatterns.reduce(
      (result, removal) =>
        removal.kind === 'regex'
          ? result.replace(removal.pattern, '')
          : result.replaceAll(removal.text, ''),
      text,
    );
  }
}
