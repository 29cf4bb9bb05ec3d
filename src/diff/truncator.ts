/**
 * Budget Truncator
 *
 * Packs scored sections into a token budget: highest score first, one section
 * per file, skipping (not stopping at) sections that do not fit.
 */

import { countTokens as defaultCountTokens } from '../tokenizer/index.js';
import { truncateSection } from './section-truncator.js';
import type { ScoredSection, TokenBudgetOptions, TruncationResult } from './types.js';

/**
 * Budgets at or above this try to include everything with a single count
 */
export const DEFAULT_FAST_PATH_TOKEN_LIMIT = 100_000;

/**
 * Room required before a skipped-files line is attempted
 */
export const SKIP_SUMMARY_RESERVE = 200;

/**
 * Room required before a usage line is attempted
 */
export const USAGE_SUMMARY_RESERVE = 100;

/**
 * Skipped paths listed by name in the summary
 */
export const MAX_LISTED_SKIPPED = 5;

/**
 * Truncator options
 */
export interface TruncateOptions extends TokenBudgetOptions {
  /** Budgets at or above this take the fast path */
  fastPathTokenLimit?: number;
}

interface Candidate {
  text: string;
  label: string;
}

/**
 * Format the skipped-files line
 *
 * @param skipped - Skipped paths in rank order
 * @param listed - How many paths to name
 */
export function formatSkipSummary(skipped: readonly string[], listed: number): string {
  if (listed <= 0) {
    return `\n[Skipped ${skipped.length} files due to token limits]\n`;
  }
  const names = skipped.slice(0, listed).join(', ');
  const rest = skipped.length - listed;
  const more = rest > 0 ? ` and ${rest} more` : '';
  return `\n[Skipped files due to token limits: ${names}${more}]\n`;
}

/**
 * Format the usage line
 */
export function formatUsageSummary(
  includedCount: number,
  totalCount: number,
  tokensUsed: number,
  tokenLimit: number
): string {
  return `\n[Summary: ${includedCount} of ${totalCount} files shown, ${tokensUsed}/${tokenLimit} tokens used, prioritized by importance]\n`;
}

function emptyResult(totalCount = 0): TruncationResult {
  return {
    text: '',
    sections: [],
    skippedFiles: [],
    tokensUsed: 0,
    includedCount: 0,
    totalCount,
    truncatedSection: false,
  };
}

/**
 * Rank sections by score (stable) and drop repeated paths.
 * Sections without a path are never treated as duplicates.
 */
function rankCandidates(scored: readonly ScoredSection[]): Candidate[] {
  const ranked = [...scored].sort((a, b) => b.score - a.score);
  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  for (const { section } of ranked) {
    const path = section.filePath;
    if (path !== undefined) {
      if (seen.has(path)) {
        continue;
      }
      seen.add(path);
    }
    candidates.push({ text: section.rawText, label: path ?? '(unknown path)' });
  }

  return candidates;
}

/**
 * Select the sections that fit in `tokenLimit` tokens
 *
 * @param scored - Scored sections in original diff order
 * @param tokenLimit - Token budget for the whole output
 * @returns The packed output and what was left out
 */
export function truncateSections(
  scored: readonly ScoredSection[],
  tokenLimit: number,
  options: TruncateOptions = {}
): TruncationResult {
  const model = options.model ?? '';
  const count = (text: string): number => (options.countTokens ?? defaultCountTokens)(text, model);

  if (tokenLimit <= 0 || scored.length === 0) {
    return emptyResult();
  }

  const candidates = rankCandidates(scored);
  const totalCount = candidates.length;

  const fastPathLimit = options.fastPathTokenLimit ?? DEFAULT_FAST_PATH_TOKEN_LIMIT;
  if (tokenLimit >= fastPathLimit) {
    const texts = candidates.map((c) => c.text);
    const text = texts.join('');
    const tokens = count(text);
    if (tokens <= tokenLimit) {
      return {
        text,
        sections: texts,
        skippedFiles: [],
        tokensUsed: tokens,
        includedCount: totalCount,
        totalCount,
        truncatedSection: false,
      };
    }
  }

  const included: string[] = [];
  const skipped: Candidate[] = [];
  let used = 0;

  for (const candidate of candidates) {
    const tokens = Math.max(count(candidate.text), 1);
    if (used + tokens > tokenLimit) {
      skipped.push(candidate);
      continue;
    }
    included.push(candidate.text);
    used += tokens;
  }

  const skippedFiles = skipped.map((c) => c.label);

  const top = skipped[0];
  if (included.length === 0 && top) {
    // Nothing fits whole: keep as much of the top-ranked file as possible
    const text = truncateSection(top.text, tokenLimit, options);
    return {
      text,
      sections: text ? [text] : [],
      skippedFiles: skippedFiles.slice(1),
      tokensUsed: count(text),
      includedCount: 0,
      totalCount,
      truncatedSection: true,
    };
  }

  const pieces = [...included];
  let skipSummary: string | undefined;
  let usageSummary: string | undefined;

  if (skipped.length > 0 && used + SKIP_SUMMARY_RESERVE <= tokenLimit) {
    for (let listed = Math.min(MAX_LISTED_SKIPPED, skipped.length); listed >= 0; listed--) {
      const summary = formatSkipSummary(skippedFiles, listed);
      const tokens = count(summary);
      if (used + tokens <= tokenLimit) {
        skipSummary = summary;
        pieces.push(summary);
        used += tokens;
        break;
      }
    }
  }

  if (used + USAGE_SUMMARY_RESERVE <= tokenLimit) {
    const summary = formatUsageSummary(included.length, totalCount, used, tokenLimit);
    const tokens = count(summary);
    if (used + tokens <= tokenLimit) {
      usageSummary = summary;
      pieces.push(summary);
      used += tokens;
    }
  }

  // Section counts are summed; BPE may tokenize the joined text differently
  let text = pieces.join('');
  let tokensUsed = used;
  if (count(text) > tokenLimit) {
    while (pieces.length > 0 && count(pieces.join('')) > tokenLimit) {
      const dropped = pieces.pop();
      if (dropped === usageSummary) {
        usageSummary = undefined;
      } else if (dropped === skipSummary) {
        skipSummary = undefined;
      } else {
        included.pop();
      }
    }
    text = pieces.join('');
    tokensUsed = count(text);
  }

  return {
    text,
    sections: included,
    skippedFiles,
    skipSummary,
    usageSummary,
    tokensUsed,
    includedCount: included.length,
    totalCount,
    truncatedSection: false,
  };
}

/**
 * String form of {@link truncateSections}
 */
export function truncateDiff(
  scored: readonly ScoredSection[],
  tokenLimit: number,
  options: TruncateOptions = {}
): string {
  return truncateSections(scored, tokenLimit, options).text;
}
