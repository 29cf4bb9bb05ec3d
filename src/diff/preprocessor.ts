/**
 * Diff Preprocessor Module
 *
 * Turns a raw diff into prompt-ready text within a token budget:
 * 1. Small diffs (<= 80% of the budget) are only filtered for noise
 * 2. Larger diffs are split, filtered, scored and truncated
 *
 * Filtering and truncation can each be switched off.
 */

import { countTokens as defaultCountTokens, type TokenCounter } from '../tokenizer/index.js';
import { filterSections } from './parallel-filter.js';
import { scoreSections } from './scorer.js';
import { parseSection, splitDiffSections } from './splitter.js';
import { truncateSections } from './truncator.js';
import type { ExclusionReason } from './types.js';

/**
 * Token budget used when none is given
 */
export const DEFAULT_TOKEN_LIMIT = 6000;

/**
 * Model used for token counting when none is given
 */
export const DEFAULT_MODEL = 'anthropic:claude-3-haiku-latest';

/**
 * Share of the budget under which a diff skips scoring and truncation
 */
export const FILTER_ONLY_RATIO = 0.8;

/**
 * Which path a diff went through. `filter-only` means no scoring or
 * truncation ran, either because the diff was small or truncation was off.
 */
export type PreprocessMode = 'empty' | 'filter-only' | 'truncated';

/**
 * Preprocessor configuration
 */
export interface PreprocessorConfig {
  /** Token budget for the output */
  tokenLimit: number;
  /** Model identifier for token counting */
  model: string;
  /** Token counter (default: gpt-tokenizer backed) */
  countTokens?: TokenCounter;
  /** Filter pool size override */
  maxWorkers?: number;
  /** Extra glob patterns to exclude */
  excludePatterns?: string[];
  /** Keep excluded files as one-line summaries */
  summarizeExcluded?: boolean;
  /** Drop noise sections (default: true) */
  filter?: boolean;
  /** Score and truncate diffs that exceed the filter-only share (default: true) */
  truncate?: boolean;
  /** Budgets at or above this take the truncator's fast path */
  fastPathTokenLimit?: number;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Preprocessed diff with statistics
 */
export interface PreprocessedDiff {
  /** Text to hand to the prompt */
  processedDiff: string;
  /** Path taken */
  mode: PreprocessMode;
  stats: {
    originalTokens: number;
    processedTokens: number;
    tokenLimit: number;
    sectionCount: number;
    keptSectionCount: number;
    excluded: Partial<Record<ExclusionReason, number>>;
    includedCount: number;
    skippedFiles: string[];
    truncatedSection: boolean;
  };
}

const DEFAULT_CONFIG: PreprocessorConfig = {
  tokenLimit: DEFAULT_TOKEN_LIMIT,
  model: DEFAULT_MODEL,
  filter: true,
  truncate: true,
  verbose: false,
};

/**
 * Preprocess a diff and report what happened
 *
 * @param rawDiff - Raw diff text
 * @param config - Budget, model and filter options
 * @returns Processed text plus statistics
 */
export async function preprocessDiff(
  rawDiff: string,
  config: Partial<PreprocessorConfig> = {}
): Promise<PreprocessedDiff> {
  const cfg: PreprocessorConfig = {
    ...DEFAULT_CONFIG,
    ...config,
    tokenLimit: config.tokenLimit ?? DEFAULT_CONFIG.tokenLimit,
    model: config.model ?? DEFAULT_CONFIG.model,
  };
  const tokenCounter = cfg.countTokens ?? defaultCountTokens;
  const count = (text: string): number => tokenCounter(text, cfg.model);

  const excluded: Partial<Record<ExclusionReason, number>> = {};
  const stats: PreprocessedDiff['stats'] = {
    originalTokens: 0,
    processedTokens: 0,
    tokenLimit: cfg.tokenLimit,
    sectionCount: 0,
    keptSectionCount: 0,
    excluded,
    includedCount: 0,
    skippedFiles: [],
    truncatedSection: false,
  };

  if (!rawDiff) {
    return { processedDiff: rawDiff, mode: 'empty', stats };
  }
  if (cfg.tokenLimit <= 0) {
    return { processedDiff: '', mode: 'empty', stats };
  }

  stats.originalTokens = count(rawDiff);

  const sections = splitDiffSections(rawDiff);
  stats.sectionCount = sections.length;

  const kept =
    cfg.filter === false
      ? sections
      : await filterSections(sections, {
          excludePatterns: cfg.excludePatterns,
          maxWorkers: cfg.maxWorkers,
          summarizeExcluded: cfg.summarizeExcluded,
          verbose: cfg.verbose,
          onExcluded: (reason) => {
            excluded[reason] = (excluded[reason] ?? 0) + 1;
          },
        });
  stats.keptSectionCount = kept.length;

  if (cfg.truncate === false || stats.originalTokens <= cfg.tokenLimit * FILTER_ONLY_RATIO) {
    const processedDiff = kept.join('');
    stats.processedTokens = count(processedDiff);
    stats.includedCount = kept.length;
    return { processedDiff, mode: 'filter-only', stats };
  }

  if (cfg.verbose) {
    console.log(
      `[Preprocessor] Processing large diff (${stats.originalTokens} tokens, limit ${cfg.tokenLimit}, ${sections.length} files)`
    );
  }

  const scored = scoreSections(kept.map(parseSection));
  const result = truncateSections(scored, cfg.tokenLimit, {
    model: cfg.model,
    countTokens: tokenCounter,
    fastPathTokenLimit: cfg.fastPathTokenLimit,
  });

  stats.processedTokens = result.tokensUsed;
  stats.includedCount = result.includedCount;
  stats.skippedFiles = result.skippedFiles;
  stats.truncatedSection = result.truncatedSection;

  if (cfg.verbose) {
    console.log(
      `[Preprocessor] Kept ${result.includedCount} of ${result.totalCount} files, ${result.tokensUsed}/${cfg.tokenLimit} tokens`
    );
  }

  return { processedDiff: result.text, mode: 'truncated', stats };
}

/**
 * Preprocess a diff to fit `tokenLimit` tokens of `model`
 *
 * @returns The processed diff text
 */
export async function preprocess(
  diff: string,
  tokenLimit: number = DEFAULT_TOKEN_LIMIT,
  model: string = DEFAULT_MODEL
): Promise<string> {
  const result = await preprocessDiff(diff, { tokenLimit, model });
  return result.processedDiff;
}
