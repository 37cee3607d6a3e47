import { describe, expect, test } from 'vitest';

import { InputUnavailableError } from './input-unavailable-error';

describe('InputUnavailableError', () => {
  test('should have correct name property', () => {
    const error = new InputUnavailableError('/tmp/book.pdf', 'no pages');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InputUnavailableError');
  });

  test('should format message with the source', () => {
    const error = new InputUnavailableError('/tmp/book.pdf', 'no pages');

    expect(error.source).toBe('/tmp/book.pdf');
    expect(error.message).toBe('Cannot read /tmp/book.pdf: no pages');
  });

  test('should keep the cause', () => {
    const cause = new Error('spawn pdfinfo ENOENT');
    const error = new InputUnavailableError('/tmp/book.pdf', 'pdfinfo failed', {
      cause,
    });

    expect(error.cause).toBe(cause);
  });
});
