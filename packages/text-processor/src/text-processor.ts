import type { LoggerMethods } from '@ondoku/logger';
import type {
  BoilerplateSet,
  MorphologicalTokenizer,
  PageFailure,
  PageSegments,
  PageText,
  TextProcessResult,
} from '@ondoku/model';

import type { TextProcessorConfig, TextProcessorConfigInput } from './config';

import { ConcurrentPool } from '@ondoku/shared';

import { StructuralLineClassifier } from './classifiers';
import { PageCleaner } from './cleaners';
import { parseTextProcessorConfig } from './config';
import { BoilerplateDetector } from './detectors';
import { PageProcessingError } from './errors';
import { PreambleFilter, TextNormalizer } from './normalizers';
import { Segmenter } from './segmenters';

/**
 * TextProcessor Options
 */
export interface TextProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Processing options; validated when the processor is created
   */
  config?: TextProcessorConfigInput;

  /**
   * Morphological analyzer for the 'morphological' strategy
   */
  tokenizer?: MorphologicalTokenizer;

  /**
   * Abort signal; checked between pipeline stages
   */
  abortSignal?: AbortSignal;
}

/**
 * TextProcessor
 *
 * Turns raw per-page text into cleaned reading units:
 * 1. Preamble removal and whitespace normalization per page
 * 2. Boilerplate detection across all pages
 * 3. Cleaning and segmentation per page, concurrently
 *
 * A page that fails is recorded in `failures`; the rest of the batch goes on.
 */
export class TextProcessor {
  private readonly logger: LoggerMethods;
  private readonly config: TextProcessorConfig;
  private readonly tokenizer?: MorphologicalTokenizer;
  private readonly abortSignal?: AbortSignal;
  private readonly preambleFilter: PreambleFilter;
  private readonly detector: BoilerplateDetector;
  private readonly cleaner: PageCleaner;

  /**
   * @throws {ConfigurationInvalidError} When an option is out of range
   */
  constructor(options: TextProcessorOptions) {
    this.logger = options.logger;
    this.config = parseTextProcessorConfig(options.config ?? {});
    this.tokenizer = options.tokenizer;
    this.abortSignal = options.abortSignal;

    this.preambleFilter = new PreambleFilter({
      markers: this.config.preambleMarkers,
      terminator: this.config.preambleTerminator,
    });
    this.detector = new BoilerplateDetector(this.logger, {
      topBottomWindow: this.config.topBottomWindow,
      thresholdFraction: this.config.boilerplateThresholdFraction,
      maxCandidateLength: this.config.maxCandidateLength,
    });
    this.cleaner = new PageCleaner(
      this.logger,
      new StructuralLineClassifier({
        shortLineCutoff: this.config.shortLineCutoff,
        additionalKeywords: this.config.structuralKeywords,
      }),
      { removePatterns: this.config.removePatterns },
    );
  }

  /**
   * Process a batch of pages.
   *
   * Output pages keep the input order; pages left without any text are
   * omitted.
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  async process(pages: readonly PageText[]): Promise<TextProcessResult> {
    this.logger.info(
      `[TextProcessor] Starting processing of ${pages.length} pages...`,
    );
    const startTime = Date.now();
    this.checkAborted();

    const failures: PageFailure[] = [];
    const warnings: string[] = [];

    const prepared = this.preparePages(pages, failures);
    this.checkAborted();

    const boilerplate = this.detector.detect(prepared);
    this.checkAborted();

    const segmenter = this.createSegmenter(warnings);
    const outcomes = await ConcurrentPool.runSettled(
      prepared,
      this.config.concurrency,
      async (page) => this.processPage(page, boilerplate, segmenter),
    );

    const results: PageSegments[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        failures.push(
          this.recordFailure(prepared[index].pageIndex, outcome.reason),
        );
      } else if (outcome.value.chunks.length > 0) {
        results.push(outcome.value);
      }
    });

    this.logger.info(
      `[TextProcessor] Processed ${results.length}/${pages.length} pages in ${Date.now() - startTime}ms (${failures.length} failed)`,
    );

    return { pages: results, boilerplate, failures, warnings };
  }

  /**
   * Clean and segment a single text without cross-page boilerplate detection.
   */
  processText(text: string, pageIndex = 1): string[] {
    const [page] = this.preparePages(
      [{ pageIndex, lines: text.split(/\r?\n/) }],
      [],
    );
    if (!page) return [];

    const boilerplate: BoilerplateSet = {
      headers: new Set(),
      footers: new Set(),
    };
    return this.processPage(page, boilerplate, this.createSegmenter([]))
      .chunks;
  }

  private preparePages(
    pages: readonly PageText[],
    failures: PageFailure[],
  ): PageText[] {
    const prepared: PageText[] = [];

    for (const page of pages) {
      if (!Number.isInteger(page.pageIndex) || page.pageIndex < 1) {
        failures.push(
          this.recordFailure(
            page.pageIndex,
            new Error(`Invalid page index: ${page.pageIndex}`),
          ),
        );
        continue;
      }

      try {
        prepared.push(this.preparePage(page));
      } catch (error) {
        failures.push(this.recordFailure(page.pageIndex, error));
      }
    }

    return prepared;
  }

  private preparePage(page: PageText): PageText {
    const text = this.preambleFilter.strip(page.lines).join('\n');
    const normalized = this.config.aggressiveWhitespace
      ? TextNormalizer.normalize(TextNormalizer.removeMeaninglessSpaces(text), {
          aggressive: true,
        })
      : TextNormalizer.normalize(text);

    return {
      pageIndex: page.pageIndex,
      lines: normalized ? normalized.split('\n') : [],
    };
  }

  private processPage(
    page: PageText,
    boilerplate: BoilerplateSet,
    segmenter: Segmenter,
  ): PageSegments {
    const cleaned = this.cleaner.clean(page, boilerplate, {
      stripStructural: this.config.stripStructural,
    });
    return { pageIndex: page.pageIndex, chunks: segmenter.segment(cleaned) };
  }

  private createSegmenter(warnings: string[]): Segmenter {
    return new Segmenter(this.logger, {
      strategy: this.config.strategy,
      maxLineLength: this.config.maxLineLength,
      minLineLength: this.config.minLineLength,
      tokenizer: this.tokenizer,
      onWarning: (warning) => warnings.push(warning.message),
    });
  }

  private recordFailure(pageIndex: number, error: unknown): PageFailure {
    const failure = PageProcessingError.forPage(pageIndex, error);
    this.logger.warn(`[TextProcessor] Skipping page: ${failure.message}`);
    return { pageIndex, message: failure.message, cause: error };
  }

  /**
   * Check if abort has been requested and throw error if so
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      const error = new Error('Text processing was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}
