import type { LineRecord } from '@ondoku/model';

import { BOILERPLATE } from '../config/constants';

const DIGIT = '[0-9０-９]';

/**
 * 2024年4月1日, 2024年4月, 2024/04/01, 2024-4-1, 2024.4.1
 */
const DATE_PATTERN = new RegExp(
  `${DIGIT}{4}\\s*(?:年\\s*${DIGIT}{1,2}\\s*月(?:\\s*${DIGIT}{1,2}\\s*日)?|[/.\\-]${DIGIT}{1,2}[/.\\-]${DIGIT}{1,2})`,
  'g',
);
const DIGIT_RUN = new RegExp(`${DIGIT}+`, 'g');

/**
 * Comparison form of a line: "Page 3" and "Page 47" share one signature.
 *
 * @example
 * ```typescript
 * createLineSignature('  報告書　2024年4月1日 ');  // '報告書 <DATE>'
 * createLineSignature('- 12 -');                   // '- <NUM> -'
 * ```
 */
export function createLineSignature(line: string): string {
  return line
    .normalize('NFC')
    .replace(DATE_PATTERN, BOILERPLATE.DATE_PLACEHOLDER)
    .replace(DIGIT_RUN, BOILERPLATE.NUMBER_PLACEHOLDER)
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Build a LineRecord for every line of a page.
 *
 * `fromTop` / `fromBottom` count non-empty lines only, so blank padding does
 * not push a running header out of the top window.
 */
export function createLineRecords(lines: readonly string[]): LineRecord[] {
  const trimmedLines = lines.map((line) => line.trim());
  const nonEmptyTotal = trimmedLines.filter((line) => line.length > 0).length;

  let seen = 0;
  return lines.map((text, index) => {
    const trimmed = trimmedLines[index];
    const fromTop = seen;
    if (trimmed) seen++;

    return {
      text,
      trimmed,
      signature: trimmed ? createLineSignature(trimmed) : '',
      index,
      fromTop,
      fromBottom: nonEmptyTotal - seen,
    };
  });
}
