import type { MorphToken, MorphologicalTokenizer } from '@ondoku/model';

import { describe, expect, test, vi } from 'vitest';

import { CollaboratorUnavailableError } from '../../errors';
import { MorphologicalStrategy } from './morphological-strategy';

const TOKENS: MorphToken[] = [
  { surface: 'これ', pos: '名詞' },
  { surface: 'は', pos: '助詞' },
  { surface: 'ペン', pos: '名詞' },
  { surface: 'です', pos: '助動詞' },
  { surface: '。', pos: '記号' },
];

describe('MorphologicalStrategy', () => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  function createTokenizer(tokens: MorphToken[]): MorphologicalTokenizer {
    return { tokenize: vi.fn(() => tokens) };
  }

  test('breaks after particles and auxiliaries once the limit is reached', () => {
    const strategy = new MorphologicalStrategy(
      mockLogger,
      createTokenizer(TOKENS),
    );

    expect(strategy.split('これはペンです。', { maxLength: 3, minLength: 0 })).toEqual(
      ['これは', 'ペンです', '。'],
    );
  });

  test('always breaks after a sentence-final mark', () => {
    const strategy = new MorphologicalStrategy(
      mockLogger,
      createTokenizer(TOKENS),
    );

    expect(
      strategy.split('これはペンです。', { maxLength: 10, minLength: 0 }),
    ).toEqual(['これはペンです。']);
  });

  test('tokenizes each paragraph separately', () => {
    const tokenizer = createTokenizer(TOKENS);
    const strategy = new MorphologicalStrategy(mockLogger, tokenizer);

    strategy.split('一つ目\n\n二つ目', { maxLength: 10, minLength: 0 });

    expect(tokenizer.tokenize).toHaveBeenCalledTimes(2);
    expect(tokenizer.tokenize).toHaveBeenNthCalledWith(1, '一つ目');
    expect(tokenizer.tokenize).toHaveBeenNthCalledWith(2, '二つ目');
  });

  test('falls back to punctuation and warns when no analyzer is given', () => {
    const onWarning = vi.fn();
    const strategy = new MorphologicalStrategy(mockLogger, undefined, onWarning);

    expect(
      strategy.split('はい。そうです。', { maxLength: 45, minLength: 10 }),
    ).toEqual(['はい。', 'そうです。']);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[MorphologicalStrategy] Morphological analyzer is not available, using punctuation strategy',
    );
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning.mock.calls[0][0]).toBeInstanceOf(
      CollaboratorUnavailableError,
    );
  });

  test('falls back to punctuation when the analyzer throws', () => {
    const failure = new Error('dictionary missing');
    const onWarning = vi.fn();
    const strategy = new MorphologicalStrategy(
      mockLogger,
      {
        tokenize: () => {
          throw failure;
        },
      },
      onWarning,
    );

    expect(
      strategy.split('はい。そうです。', { maxLength: 45, minLength: 10 }),
    ).toEqual(['はい。', 'そうです。']);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[MorphologicalStrategy] Morphological analyzer failed: dictionary missing, using punctuation strategy',
    );

    const warning = onWarning.mock.calls[0][0];
    expect(warning).toBeInstanceOf(CollaboratorUnavailableError);
    expect(warning.collaborator).toBe('morphological-tokenizer');
    expect(warning.cause).toBe(failure);
  });

  test('does not warn when an analyzer is available', () => {
    new MorphologicalStrategy(mockLogger, createTokenizer(TOKENS));

    expect(mockLogger.warn).not.toHaveBeenCalled();
  });
});
