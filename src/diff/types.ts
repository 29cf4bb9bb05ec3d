/**
 * Shared types for diff preprocessing
 */

import type { TokenCounter } from '../tokenizer/index.js';

/**
 * How a file changed in the diff
 */
export type ChangeKind = 'add' | 'delete' | 'modify' | 'rename' | 'unknown';

/**
 * One file's worth of diff text plus derived metadata
 */
export interface DiffSection {
  /** Verbatim diff text, from `diff --git` up to the next file */
  readonly rawText: string;
  /** Path on the `b/` side; undefined for malformed sections */
  readonly filePath?: string;
  /** Change type derived from the extended header */
  readonly changeKind: ChangeKind;
  /** Lines starting with `+` (excluding `+++`) */
  readonly additions: number;
  /** Lines starting with `-` (excluding `---`) */
  readonly deletions: number;
}

/**
 * A section paired with its importance score
 */
export interface ScoredSection {
  readonly section: DiffSection;
  /** Strictly positive, higher is more important */
  readonly score: number;
}

/**
 * Why a section was filtered out
 */
export type ExclusionReason =
  | 'binary'
  | 'minified-extension'
  | 'build-directory'
  | 'lockfile'
  | 'generated'
  | 'custom-pattern'
  | 'minified-content';

/**
 * Options accepted by the classifier
 */
export interface ClassifierOptions {
  /** Extra glob patterns (minimatch) whose matching paths are excluded */
  excludePatterns?: readonly string[];
}

/**
 * Token counting context shared by the truncation stages
 */
export interface TokenBudgetOptions {
  /** Model identifier handed to the token counter */
  model?: string;
  /** Token counter (default: gpt-tokenizer backed) */
  countTokens?: TokenCounter;
}

/**
 * Final output of budget truncation
 */
export interface TruncationResult {
  /** Concatenated output text */
  text: string;
  /** Section texts in output order (a single truncated section when one file was cut) */
  sections: string[];
  /** Paths of sections left out, in rank order */
  skippedFiles: string[];
  /** Skipped-files line, when it fit */
  skipSummary?: string;
  /** Usage line, when it fit */
  usageSummary?: string;
  /** Tokens consumed by `text` */
  tokensUsed: number;
  /** Sections included in full */
  includedCount: number;
  /** Distinct sections considered */
  totalCount: number;
  /** Whether the output is an intra-section truncation */
  truncatedSection: boolean;
}
