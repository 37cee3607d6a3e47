import { z } from 'zod';

import { ConfigurationInvalidError } from '../errors';
import { PREAMBLE, REGEX_PATTERN_PREFIX } from './constants';

/**
 * Segmentation strategy names
 */
export const segmentationStrategySchema = z.enum([
  'punctuation',
  'clause',
  'morphological',
  'hybrid',
  'clean-only',
]);

/**
 * A removal pattern: a literal substring, or a regular expression when it
 * starts with `regex:` (the expression must compile)
 */
const removePatternSchema = z
  .string()
  .min(1, { message: 'Removal pattern must not be empty' })
  .refine(
    (pattern) => {
      if (!pattern.startsWith(REGEX_PATTERN_PREFIX)) return true;
      try {
        new RegExp(pattern.slice(REGEX_PATTERN_PREFIX.length), 'g');
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Removal pattern is not a valid regular expression' },
  );

/**
 * Options accepted by TextProcessor. Every field has a default.
 */
export const textProcessorConfigSchema = z
  .object({
    // Boilerplate detection
    topBottomWindow: z.number().int().min(1).max(20).default(3),
    boilerplateThresholdFraction: z
      .number()
      .gt(0, { message: 'Threshold fraction must be greater than 0' })
      .max(1)
      .default(0.4),
    maxCandidateLength: z.number().int().positive().default(100),

    // Structural lines
    shortLineCutoff: z.number().int().positive().default(20),
    stripStructural: z.boolean().default(true),
    structuralKeywords: z.array(z.string().min(1)).default([]),

    // Segmentation
    maxLineLength: z.number().int().positive().default(45),
    minLineLength: z.number().int().nonnegative().default(10),
    strategy: segmentationStrategySchema.default('punctuation'),

    // Whitespace
    aggressiveWhitespace: z.boolean().default(true),

    // Pre-filtering
    preambleMarkers: z
      .array(z.string().min(1))
      .default([...PREAMBLE.MARKERS]),
    preambleTerminator: z.string().min(1).default(PREAMBLE.TERMINATOR),
    removePatterns: z.array(removePatternSchema).default([]),

    // Batch
    concurrency: z.number().int().min(1).max(64).default(4),
  })
  .strict()
  .refine((config) => config.minLineLength <= config.maxLineLength, {
    message: 'minLineLength must not exceed maxLineLength',
    path: ['minLineLength'],
  });

/**
 * Fully resolved configuration
 */
export type TextProcessorConfig = z.infer<typeof textProcessorConfigSchema>;

/**
 * Configuration as callers write it (every field optional)
 */
export type TextProcessorConfigInput = z.input<
  typeof textProcessorConfigSchema
>;

/**
 * Validate options and fill in defaults.
 *
 * Accepts untyped input so options read from JSON go through the same checks.
 *
 * @throws {ConfigurationInvalidError} When any option is out of range
 */
export function parseTextProcessorConfig(
  input: unknown = {},
): TextProcessorConfig {
  const result = textProcessorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationInvalidError(result.error.issues, {
      cause: result.error,
    });
  }
  return result.data;
}
