/**
 * Patterns module barrel export.
 */

export * from './types.js';
export { loadStaticCatalog, DEFAULT_CATALOG_PATH } from './static-catalog.js';
export {
  extractKeywords,
  keywordsOf,
  jaccardSimilarity,
  slugify,
  uniqueIdentifier,
} from './text-utils.js';
export {
  applyNoveltyFilter,
  bestCategoryMatch,
  mergeExamples,
  syncStaticPatterns,
  type NoveltyFilterOptions,
  type NoveltyFilterResult,
} from './novelty-filter.js';
export {
  updatePatternStats,
  countMatchingSessions,
  exampleFromSession,
  EXAMPLE_CHAR_LIMIT,
  type PatternStatsOptions,
} from './pattern-stats.js';
