import { describe, expect, test } from 'vitest';

import { StructuralLineClassifier } from './structural-line-classifier';

describe('StructuralLineClassifier', () => {
  const classifier = new StructuralLineClassifier();

  describe('isStructural', () => {
    test.each(['第3章', '第三章　はじまり', 'Chapter 4', '1.2 概要', '第2節'])(
      'classifies heading %j as structural',
      (line) => {
        expect(classifier.isStructural(line)).toBe(true);
      },
    );

    test('does not classify a long sentence containing a keyword', () => {
      expect(
        classifier.isStructural(
          'これは本文中の第3章という単語を含む長い一文です',
        ),
      ).toBe(false);
    });

    test('does not classify a short line ending a sentence', () => {
      expect(classifier.isStructural('第3章を読んだ。')).toBe(false);
    });

    test('does not classify short lines without keywords', () => {
      expect(classifier.isStructural('短い本文')).toBe(false);
    });

    test('classifies page numbers regardless of length rules', () => {
      expect(classifier.isStructural('- 12 -')).toBe(true);
      expect(classifier.isStructural('12')).toBe(true);
    });

    test('returns false for blank lines', () => {
      expect(classifier.isStructural('')).toBe(false);
      expect(classifier.isStructural('   ')).toBe(false);
    });

    test('accepts additional keywords', () => {
      const custom = new StructuralLineClassifier({
        additionalKeywords: ['付録'],
      });

      expect(classifier.isStructural('付録A')).toBe(false);
      expect(custom.isStructural('付録A')).toBe(true);
    });

    test('matches Latin keywords as whole words only', () => {
      expect(classifier.isStructural('PART II')).toBe(true);
      expect(classifier.isStructural('Partner')).toBe(false);
      expect(classifier.isStructural('Sectional')).toBe(false);
    });

    test('matches additional Latin keywords as whole words only', () => {
      const custom = new StructuralLineClassifier({
        additionalKeywords: ['Appendix', 'Q&A'],
      });

      expect(custom.isStructural('Appendix B')).toBe(true);
      expect(custom.isStructural('Appendixes')).toBe(false);
      expect(custom.isStructural('よくあるQ&A')).toBe(true);
    });

    test('honours a custom short line cutoff', () => {
      const narrow = new StructuralLineClassifier({ shortLineCutoff: 3 });

      expect(narrow.isStructural('第3章')).toBe(true);
      expect(narrow.isStructural('第3章 序')).toBe(false);
    });
  });

  describe('isPageNumber', () => {
    test.each([
      '12',
      '１２',
      '- 12 -',
      '—12—',
      '[12]',
      '(12)',
      '（１２）',
      'P.12',
      'p. 12',
      '12ページ',
      '12 頁',
      'ページ 12',
      'Page 12',
      '  12  ',
    ])('recognises %j', (line) => {
      expect(classifier.isPageNumber(line)).toBe(true);
    });

    test.each(['12章', 'Page', '- 12', '12.5', '第12'])(
      'rejects %j',
      (line) => {
        expect(classifier.isPageNumber(line)).toBe(false);
      },
    );
  });

  describe('isBarePageNumber', () => {
    test('accepts only a bare integer', () => {
      expect(classifier.isBarePageNumber('12')).toBe(true);
      expect(classifier.isBarePageNumber(' １２ ')).toBe(true);
      expect(classifier.isBarePageNumber('- 12 -')).toBe(false);
      expect(classifier.isBarePageNumber('')).toBe(false);
    });
  });

  describe('findStructuralLines', () => {
    test('requires a blank neighbour for headings but not for page numbers', () => {
      const lines = [
        '',
        '第1章 はじめに',
        '',
        '本文が続きます。',
        '第2節の内容は次の通り',
        '本文です。',
        '12',
      ];

      expect([...classifier.findStructuralLines(lines)]).toEqual([1, 6]);
    });

    test('treats the page edge as blank', () => {
      expect([
        ...classifier.findStructuralLines(['第1章', '本文です。']),
      ]).toEqual([0]);
      expect([
        ...classifier.findStructuralLines(['本文です。', '第1章']),
      ]).toEqual([1]);
    });

    test('marks a short line repeating one of the previous five lines', () => {
      const lines = ['見出しA', '本文その一。', '見出しA', '本文その二。'];

      expect([...classifier.findStructuralLines(lines)]).toEqual([2]);
    });

    test('ignores repeats further back than five lines', () => {
      const lines = ['見出しA', 'いち', 'に', 'さん', 'よん', 'ご', '見出しA'];

      expect(classifier.findStructuralLines(lines).size).toBe(0);
    });

    test('ignores repeats of long lines', () => {
      const long = 'あ'.repeat(30);

      expect(classifier.findStructuralLines([long, long]).size).toBe(0);
    });

    test('returns an empty set for an empty page', () => {
      expect(classifier.findStructuralLines([]).size).toBe(0);
    });
  });
});
