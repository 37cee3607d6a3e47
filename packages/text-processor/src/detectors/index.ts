export { BoilerplateDetector } from './boilerplate-detector';
export type { BoilerplateDetectorOptions } from './boilerplate-detector';
export { createLineRecords, createLineSignature } from './line-signature';
