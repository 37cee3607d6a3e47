import { PREAMBLE } from '../config/constants';

export interface PreambleFilterOptions {
  /**
   * Line prefixes that open a metadata preamble
   */
  markers?: readonly string[];

  /**
   * Line prefix that closes the preamble
   */
  terminator?: string;
}

/**
 * PreambleFilter
 *
 * Drops the metadata block some extractors write ahead of page text
 * ("PDFファイル: ...", "ページ番号: ...", "==========").
 */
export class PreambleFilter {
  private readonly markers: readonly string[];
  private readonly terminator: string;

  constructor(options: PreambleFilterOptions = {}) {
    this.markers = options.markers ?? PREAMBLE.MARKERS;
    this.terminator = options.terminator ?? PREAMBLE.TERMINATOR;
  }

  /**
   * Remove every preamble block from the lines.
   *
   * A block runs from a marker line through the next terminator line. When no
   * terminator follows, only the marker line itself is dropped.
   */
  strip(lines: readonly string[]): string[] {
    const result: string[] = [];
    let index = 0;

    while (index < lines.length) {
      const line = lines[index];
      if (this.isMarker(line)) {
        const end = this.findTerminator(lines, index + 1);
        index = end === -1 ? index + 1 : end + 1;
        continue;
      }
      result.push(line);
      index++;
    }

    return result;
  }

  private isMarker(line: string): boolean {
    const trimmed = line.trim();
    return this.markers.some((marker) => trimmed.startsWith(marker));
  }

  private findTerminator(lines: readonly string[], from: number): number {
    for (let i = from; i < lines.length; i++) {
      if (lines[i].trim().startsWith(this.terminator)) {
        return i;
      }
    }
    return -1;
  }
}
