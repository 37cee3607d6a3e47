/**
 * Error thrown when a source document cannot be read at all,
 * e.g. the file is missing or pdfinfo reports no pages.
 */
export class InputUnavailableError extends Error {
  public readonly name = 'InputUnavailableError';

  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read ${source}: ${message}`, options);
  }
}
