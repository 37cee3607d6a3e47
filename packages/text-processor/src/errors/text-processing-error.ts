import type { ZodIssue } from 'zod';

/**
 * TextProcessingError
 *
 * Base error class for the text processing pipeline.
 */
export class TextProcessingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TextProcessingError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * ConfigurationInvalidError
 *
 * Thrown while building a processor when an option is out of range.
 */
export class ConfigurationInvalidError extends TextProcessingError {
  /**
   * Individual validation failures
   */
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[], options?: ErrorOptions) {
    super(ConfigurationInvalidError.formatIssues(issues), options);
    this.name = 'ConfigurationInvalidError';
    this.issues = issues;
  }

  private static formatIssues(issues: ZodIssue[]): string {
    const details = issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return `Invalid configuration: ${details.join('; ')}`;
  }
}

/**
 * CollaboratorUnavailableError
 *
 * An optional collaborator (the morphological analyzer) is missing or failed.
 * Recovered by falling back; reported as a warning rather than thrown.
 */
export class CollaboratorUnavailableError extends TextProcessingError {
  constructor(
    readonly collaborator: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CollaboratorUnavailableError';
  }
}

/**
 * PageProcessingError
 *
 * Wraps whatever a single page threw; the batch records it and moves on.
 */
export class PageProcessingError extends TextProcessingError {
  constructor(
    readonly pageIndex: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PageProcessingError';
  }

  static forPage(pageIndex: number, error: unknown): PageProcessingError {
    return new PageProcessingError(
      pageIndex,
      `Page ${pageIndex}: ${TextProcessingError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
