export { PreambleFilter } from './preamble-filter';
export type { PreambleFilterOptions } from './preamble-filter';
export { TextNormalizer } from './text-normalizer';
export type { NormalizeOptions } from './text-normalizer';
