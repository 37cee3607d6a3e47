export { ClauseBoundaryStrategy } from './clause-boundary-strategy';
export { CleanOnlyStrategy } from './clean-only-strategy';
export { HybridStrategy } from './hybrid-strategy';
export { MorphologicalStrategy } from './morphological-strategy';
export { PunctuationCascadeStrategy } from './punctuation-cascade-strategy';
export type { SegmentContext, SegmentStrategy } from './segment-strategy';
