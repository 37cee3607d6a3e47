export { PageCleaner } from './page-cleaner';
export type { CleanOptions, PageCleanerOptions } from './page-cleaner';
