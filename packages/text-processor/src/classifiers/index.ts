export { StructuralLineClassifier } from './structural-line-classifier';
export type { StructuralLineClassifierOptions } from './structural-line-classifier';
