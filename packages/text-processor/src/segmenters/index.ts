export { Segmenter } from './segmenter';
export type { SegmenterOptions } from './segmenter';
export {
  joinUnits,
  mergeShortUnits,
  splitParagraphs,
  splitSentences,
} from './segment-utils';
export * from './strategies';
