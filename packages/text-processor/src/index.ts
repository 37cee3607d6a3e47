export { TextProcessor } from './text-processor';
export type { TextProcessorOptions } from './text-processor';

export {
  parseTextProcessorConfig,
  segmentationStrategySchema,
  textProcessorConfigSchema,
} from './config';
export type { TextProcessorConfig, TextProcessorConfigInput } from './config';

export {
  CollaboratorUnavailableError,
  ConfigurationInvalidError,
  PageProcessingError,
  TextProcessingError,
} from './errors';

export { PreambleFilter, TextNormalizer } from './normalizers';
export type { NormalizeOptions, PreambleFilterOptions } from './normalizers';
export {
  BoilerplateDetector,
  createLineRecords,
  createLineSignature,
} from './detectors';
export type { BoilerplateDetectorOptions } from './detectors';
export { StructuralLineClassifier } from './classifiers';
export type { StructuralLineClassifierOptions } from './classifiers';
export { PageCleaner } from './cleaners';
export type { CleanOptions, PageCleanerOptions } from './cleaners';
export {
  ClauseBoundaryStrategy,
  CleanOnlyStrategy,
  HybridStrategy,
  MorphologicalStrategy,
  PunctuationCascadeStrategy,
  Segmenter,
} from './segmenters';
export type {
  SegmentContext,
  SegmenterOptions,
  SegmentStrategy,
} from './segmenters';
