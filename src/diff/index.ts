/**
 * Diff Processing Module
 *
 * Splitting, filtering, scoring and token-budget truncation of diffs
 */

export {
  preprocess,
  preprocessDiff,
  DEFAULT_MODEL,
  DEFAULT_TOKEN_LIMIT,
  FILTER_ONLY_RATIO,
  type PreprocessedDiff,
  type PreprocessorConfig,
  type PreprocessMode,
} from './preprocessor.js';

export {
  splitDiffSections,
  parseSection,
  extractFilePath,
  countChanges,
  SECTION_BOUNDARY,
} from './splitter.js';

export {
  classifySection,
  shouldExcludeSection,
  isLockfileOrGenerated,
  isMinifiedContent,
  summarizeExcludedSection,
} from './filter.js';

export { filterSections, defaultWorkerCount, type FilterOptions } from './parallel-filter.js';

export {
  scoreSection,
  scoreSections,
  getExtensionScore,
  analyzeCodePatterns,
  CODE_PATTERNS,
  type CodePattern,
  type ImportanceTable,
} from './scorer.js';

export {
  truncateSections,
  truncateDiff,
  formatSkipSummary,
  formatUsageSummary,
  type TruncateOptions,
} from './truncator.js';

export { truncateSection, TRUNCATION_MARKER } from './section-truncator.js';

export type {
  ChangeKind,
  DiffSection,
  ScoredSection,
  ExclusionReason,
  ClassifierOptions,
  TokenBudgetOptions,
  TruncationResult,
} from './types.js';
