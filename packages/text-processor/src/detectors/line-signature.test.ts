import { describe, expect, test } from 'vitest';

import { createLineRecords, createLineSignature } from './line-signature';

describe('createLineSignature', () => {
  test('replaces digit runs with a placeholder', () => {
    expect(createLineSignature('Page 3')).toBe('Page <NUM>');
    expect(createLineSignature('Page 47')).toBe('Page <NUM>');
    expect(createLineSignature('- 12 -')).toBe('- <NUM> -');
  });

  test('treats full-width digits like ASCII digits', () => {
    expect(createLineSignature('第１２号')).toBe('第<NUM>号');
  });

  test('replaces dates before digits', () => {
    expect(createLineSignature('2024年4月1日発行')).toBe('<DATE>発行');
    expect(createLineSignature('2024/04/01 更新')).toBe('<DATE> 更新');
    expect(createLineSignature('2024-4-1')).toBe('<DATE>');
    expect(createLineSignature('2024.4.1')).toBe('<DATE>');
  });

  test('does not read a lone year as a date', () => {
    expect(createLineSignature('報告書 2024')).toBe('報告書 <NUM>');
  });

  test('collapses whitespace, ideographic space included, and trims', () => {
    expect(createLineSignature('  報告書　2024年4月1日 ')).toBe(
      '報告書 <DATE>',
    );
  });

  test('returns empty string for blank input', () => {
    expect(createLineSignature('   ')).toBe('');
  });
});

describe('createLineRecords', () => {
  test('counts non-empty lines above and below each line', () => {
    const records = createLineRecords(['', 'A', '', 'B 1', 'C']);

    expect(
      records.map(({ index, fromTop, fromBottom }) => [
        index,
        fromTop,
        fromBottom,
      ]),
    ).toEqual([
      [0, 0, 3],
      [1, 0, 2],
      [2, 1, 2],
      [3, 1, 1],
      [4, 2, 0],
    ]);
  });

  test('keeps raw text, trimmed text and signature', () => {
    const [blank, line] = createLineRecords(['  ', '  Page 5  ']);

    expect(blank).toEqual({
      text: '  ',
      trimmed: '',
      signature: '',
      index: 0,
      fromTop: 0,
      fromBottom: 1,
    });
    expect(line).toEqual({
      text: '  Page 5  ',
      trimmed: 'Page 5',
      signature: 'Page <NUM>',
      index: 1,
      fromTop: 0,
      fromBottom: 0,
    });
  });

  test('returns an empty array for a page without lines', () => {
    expect(createLineRecords([])).toEqual([]);
  });
});
