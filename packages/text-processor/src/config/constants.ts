/**
 * Character tables shared by the normalizer, classifier and segmenters
 */
export const JAPANESE_TEXT = {
  /**
   * Character-class body for Japanese script: hiragana, katakana, the
   * prolonged sound mark, CJK ideographs and 々〆〇
   */
  SCRIPT_CLASS:
    '\\u3041-\\u3096\\u30A1-\\u30FA\\u30FC\\u3400-\\u4DBF\\u4E00-\\u9FFF\\u3005-\\u3007',

  /**
   * Closing punctuation and brackets; a space before them is dropped
   */
  CLOSERS: '。、！？）」』】)',

  /**
   * Opening brackets; a space after them is dropped
   */
  OPENERS: '（「『【(',

  /**
   * Sentence-final marks
   */
  SENTENCE_END: '。！？',

  /**
   * Brackets that stay attached to a sentence-final mark right before them
   */
  TRAILING_CLOSERS: '」』）】)',

  /**
   * Counters that bind to a preceding number ("3 年" → "3年")
   */
  UNIT_COUNTERS: '年月日時分秒円個本枚冊',

  /**
   * Zero-width, soft hyphen, BOM and control characters other than tab/newline
   */
  INVISIBLE_CLASS:
    '\\u0000-\\u0008\\u000B-\\u001F\\u007F\\u00AD\\u200B-\\u200D\\u2060\\uFEFF',

  /**
   * Space variants folded to an ordinary space by the strict pass
   */
  SPACE_VARIANTS_CLASS:
    '\\u00A0\\u1680\\u2000-\\u200A\\u202F\\u205F\\u3000',
} as const;

/**
 * Constants for the BoilerplateDetector
 */
export const BOILERPLATE = {
  /**
   * Minimum page count for a signature to qualify, whatever the fraction
   */
  MIN_OCCURRENCES: 2,

  /**
   * Placeholder for digit runs in a line signature
   */
  NUMBER_PLACEHOLDER: '<NUM>',

  /**
   * Placeholder for dates in a line signature
   */
  DATE_PLACEHOLDER: '<DATE>',
} as const;

/**
 * Keywords marking structural divisions (chapter, section, part ...)
 */
export const STRUCTURAL_KEYWORDS = [
  '第',
  '章',
  '節',
  '部',
  '編',
  'Chapter',
  'CHAPTER',
  'Section',
  'SECTION',
  'Part',
  'PART',
] as const;

/**
 * Heading shapes: 第三章 / 第2節, 1.2, Chapter 4
 */
export const HEADING_PATTERNS: readonly RegExp[] = [
  /^第[一二三四五六七八九十百〇\d０-９]+[章節部編]/,
  /^\d+(?:\.\d+)+(?:\s|$)/,
  /^(?:Chapter|Section|Part)\s+\d+/i,
];

/**
 * Page number shapes, matched against a trimmed line
 */
export const PAGE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^[0-9０-９]+$/,
  /^[-‐‑–—−]\s*[0-9０-９]+\s*[-‐‑–—−]$/,
  /^\[\s*[0-9０-９]+\s*\]$/,
  /^[(（]\s*[0-9０-９]+\s*[)）]$/,
  /^[Pp]\.\s*[0-9０-９]+$/,
  /^[0-9０-９]+\s*(?:ページ|頁)$/,
  /^(?:ページ|[Pp]age)\s*[0-9０-９]+$/,
];

/**
 * A line holding nothing but an integer
 */
export const BARE_PAGE_NUMBER_PATTERN = /^[0-9０-９]+$/;

/**
 * Constants for the StructuralLineClassifier
 */
export const STRUCTURAL_LINES = {
  /**
   * Lines shorter than this may be dropped as repeated headings
   */
  DUPLICATE_LINE_CUTOFF: 30,

  /**
   * How many previous lines a repeated heading is looked up in
   */
  DUPLICATE_LOOKBACK: 5,
} as const;

/**
 * Connectives an over-long sentence without commas is split after
 */
export const CONNECTIVES = [
  'が、',
  'けれど',
  'しかし',
  'また、',
  'そして',
  'ので',
  'から',
] as const;

/**
 * Particle, conjunctive and copula endings a clause break follows
 */
export const CLAUSE_MARKERS = [
  'は、',
  'が、',
  'を、',
  'に、',
  'で、',
  'と、',
  'から、',
  'まで、',
  'より、',
  'という',
  'といった',
  'などの',
  'ような',
  'ために',
  'であり、',
  'であって、',
  'ですが、',
  'ですけれど、',
] as const;

/**
 * Constants for the clause-boundary strategy
 */
export const CLAUSE_SEGMENTATION = {
  /**
   * Lines shorter than this are merged into the following line
   */
  MIN_LINE_LENGTH: 10,

  /**
   * Commas around a phrase at least this long break on both sides
   */
  LONG_PHRASE_LENGTH: 20,
} as const;

/**
 * Part-of-speech tags a morphological break may follow
 */
export const MORPHOLOGICAL_BREAK_POS = ['助詞', '助動詞', '記号'] as const;

/**
 * Constants for the clean-only strategy
 */
export const CLEAN_ONLY = {
  /**
   * Lines longer than this are broken after sentence-final marks
   */
  LONG_LINE_LENGTH: 80,

  /**
   * Sentences longer than this with many commas are broken at commas
   */
  LONG_SENTENCE_LENGTH: 60,

  /**
   * Break after every Nth comma
   */
  COMMAS_PER_BREAK: 3,
} as const;

/**
 * Extractor preamble written ahead of page text
 */
export const PREAMBLE = {
  MARKERS: ['PDFファイル:', 'ページ番号:'],
  TERMINATOR: '==========',
} as const;

/**
 * Prefix marking a removal pattern as a regular expression
 */
export const REGEX_PATTERN_PREFIX = 'regex:';
