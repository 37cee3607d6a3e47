import { JAPANESE_TEXT } from '../config/constants';

const JP = JAPANESE_TEXT.SCRIPT_CLASS;

const INVISIBLE_CHARS = new RegExp(`[${JAPANESE_TEXT.INVISIBLE_CLASS}]`, 'g');
const SPACE_VARIANTS = new RegExp(
  `[${JAPANESE_TEXT.SPACE_VARIANTS_CLASS}]`,
  'g',
);
const SPACE_BEFORE_CLOSER = new RegExp(` +(?=[${JAPANESE_TEXT.CLOSERS}])`, 'g');
const SPACE_AFTER_OPENER = new RegExp(`(?<=[${JAPANESE_TEXT.OPENERS}]) +`, 'g');
const SPACE_BETWEEN_JAPANESE = new RegExp(`(?<=[${JP}]) +(?=[${JP}])`, 'g');
const SPACE_JAPANESE_CLOSER = new RegExp(
  `(?<=[${JP}]) +(?=[${JAPANESE_TEXT.CLOSERS}])`,
  'g',
);
const SPACE_OPENER_JAPANESE = new RegExp(
  `(?<=[${JAPANESE_TEXT.OPENERS}]) +(?=[${JP}])`,
  'g',
);
const SPACE_NUMBER_UNIT = new RegExp(
  `(?<=[0-9０-９]) +(?=[${JAPANESE_TEXT.UNIT_COUNTERS}])`,
  'g',
);

export interface NormalizeOptions {
  /**
   * Strip ideographic indentation and spaces between Japanese characters
   * (default: false)
   */
  aggressive?: boolean;
}

/**
 * TextNormalizer - whitespace normalization for extracted Japanese text
 *
 * - Invisible/control character removal
 * - Ideographic space handling (indentation vs. mid-line)
 * - Space cleanup around brackets and punctuation
 * - Blank line collapsing
 *
 * Both passes are idempotent.
 */
export class TextNormalizer {
  /**
   * Normalizes whitespace while keeping line structure.
   *
   * Leading ideographic spaces are indentation and survive unless
   * `aggressive` is set; mid-line ones become ordinary spaces. Runs of blank
   * lines collapse to a single paragraph break, and the whole text is
   * trimmed.
   *
   * @example
   * ```typescript
   * TextNormalizer.normalize('前書き\n　本文　の 「 例 」です。');
   * // '前書き\n　本文 の 「例」です。'
   * TextNormalizer.normalize('前書き\n　本文　の 「 例 」です。', { aggressive: true });
   * // '前書き\n本文の 「例」です。'
   * ```
   */
  static normalize(text: string, options: NormalizeOptions = {}): string {
    if (!text) return '';

    const aggressive = options.aggressive ?? false;

    // Invisible characters go first so NFC can compose what they separated
    const prepared = text
      .replace(/\r\n?/g, '\n')
      .replace(INVISIBLE_CHARS, '')
      .normalize('NFC')
      .replace(/\t/g, ' ');

    const lines = prepared
      .split('\n')
      .map((line) => this.normalizeLine(line, aggressive));

    // Indentation survives on every line but the first
    return lines
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Removes spaces that carry no meaning in Japanese text.
   *
   * Stricter than {@link normalize}: every Unicode space variant (including
   * the ideographic space) becomes an ordinary space, every line is trimmed,
   * and spaces next to Japanese characters, brackets and unit counters are
   * dropped. Consecutive blank lines collapse to one.
   *
   * @example
   * ```typescript
   * TextNormalizer.removeMeaninglessSpaces('2024 年 の 報告 。');
   * // '2024年の報告。'
   * ```
   */
  static removeMeaninglessSpaces(text: string): string {
    if (!text) return '';

    const lines = text
      .replace(/\r\n?/g, '\n')
      .replace(SPACE_VARIANTS, ' ')
      .split('\n')
      .map((line) =>
        line
          .trim()
          .replace(SPACE_BETWEEN_JAPANESE, '')
          .replace(SPACE_JAPANESE_CLOSER, '')
          .replace(SPACE_OPENER_JAPANESE, '')
          .replace(SPACE_NUMBER_UNIT, '')
          .replace(/ {2,}/g, ' '),
      );

    const result: string[] = [];
    for (const line of lines) {
      if (!line && result.length > 0 && !result[result.length - 1]) {
        continue;
      }
      result.push(line);
    }
    return result.join('\n');
  }

  private static normalizeLine(line: string, aggressive: boolean): string {
    const body = line.replace(/^　+/, '');
    const indent = line.slice(0, line.length - body.length);

    let cleaned = body
      .replace(/　/g, ' ')
      .replace(/ {2,}/g, ' ')
      .replace(SPACE_BEFORE_CLOSER, '')
      .replace(SPACE_AFTER_OPENER, '');

    if (aggressive) {
      cleaned = cleaned.replace(SPACE_BETWEEN_JAPANESE, '');
    }

    return !aggressive && indent
      ? (indent + cleaned).trimEnd()
      : cleaned.trim();
  }
}
