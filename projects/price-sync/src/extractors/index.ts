export { BasePaginatedExtractor } from './base';
export type { ExtractorOptions, RecordOutcome } from './base';
export { ArticleExtractor } from './articles';
export type { ArticleExtractorOptions } from './articles';
export { PriceExtractor } from './prices';
export type { PriceExtractorOptions } from './prices';
