export * from './constants';
export {
  parseTextProcessorConfig,
  segmentationStrategySchema,
  textProcessorConfigSchema,
} from './text-processor-config';
export type {
  TextProcessorConfig,
  TextProcessorConfigInput,
} from './text-processor-config';
