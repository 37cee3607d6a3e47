export type { LineRecord, PageText, PageTextProvider } from './page-text';
export type {
  BoilerplateSet,
  PatternCount,
  PatternOccurrence,
} from './boilerplate';
export type {
  MorphToken,
  MorphologicalTokenizer,
  SegmentationStrategy,
  SegmentUnit,
} from './segmentation';
export type {
  PageFailure,
  PageSegments,
  TextProcessResult,
} from './text-process-result';
