/**
 * Intra-section truncation
 *
 * Cuts a single file's diff down to a token budget, keeping changed lines
 * ahead of hunk headers and context.
 */

import { countTokens as defaultCountTokens } from '../tokenizer/index.js';
import type { TokenBudgetOptions } from './types.js';

/**
 * Appended whenever lines were dropped from a section
 */
export const TRUNCATION_MARKER = '[... truncated due to token limit ...]';

/**
 * Line ranks; lower ranks are kept first
 */
const LINE_PRIORITY = {
  addition: 0,
  deletion: 0,
  hunk: 2,
  context: 3,
} as const;

interface CandidateLine {
  index: number;
  rank: number;
  cost: number;
}

function lineRank(line: string): number {
  if (line.startsWith('+')) {
    return LINE_PRIORITY.addition;
  }
  if (line.startsWith('-')) {
    return LINE_PRIORITY.deletion;
  }
  if (line.startsWith('@@')) {
    return LINE_PRIORITY.hunk;
  }
  return LINE_PRIORITY.context;
}

/**
 * Truncate one file's diff to at most `maxTokens` tokens
 *
 * The header (everything up to and including the first `@@` line) is kept
 * whole when it fits; the remaining budget goes to added and removed lines,
 * then hunk headers, then context. Kept lines stay in document order. When
 * the header itself does not fit, lines are taken from the top until one
 * does not fit.
 *
 * @param text - Section text
 * @param maxTokens - Token budget for the returned text
 * @returns Text whose token count is at most maxTokens
 */
export function truncateSection(
  text: string,
  maxTokens: number,
  options: TokenBudgetOptions = {}
): string {
  const model = options.model ?? '';
  const count = (value: string): number => (options.countTokens ?? defaultCountTokens)(value, model);

  if (maxTokens <= 0 || !text) {
    return '';
  }
  if (count(text) <= maxTokens) {
    return text;
  }

  const lines = text.split('\n');
  const markerTokens = count(TRUNCATION_MARKER);
  const withMarker = markerTokens <= maxTokens;
  const lineBudget = withMarker ? maxTokens - markerTokens : maxTokens;
  const lineCost = (line: string): number => count(`${line}\n`);

  const hunkIndex = lines.findIndex((line) => line.startsWith('@@'));
  const headerLines = hunkIndex === -1 ? [] : lines.slice(0, hunkIndex + 1);
  const headerCost = headerLines.reduce((sum, line) => sum + lineCost(line), 0);

  let kept: number[];
  if (hunkIndex === -1 || headerCost > lineBudget) {
    kept = takeLeadingLines(lines, lineBudget, lineCost);
  } else {
    kept = takePriorityLines(lines, hunkIndex, headerCost, lineBudget, lineCost);
  }

  const truncated = kept.length < lines.length;
  const render = (indexes: number[]): string => {
    const output = indexes.map((i) => lines[i] ?? '');
    if (truncated && withMarker) {
      output.push(TRUNCATION_MARKER);
    }
    return output.join('\n');
  };

  // Per-line costs are an estimate for BPE tokenizers; trim until the joined text fits
  let result = render(kept);
  while (kept.length > 0 && count(result) > maxTokens) {
    kept = kept.slice(0, -1);
    result = render(kept);
  }
  if (count(result) > maxTokens) {
    return '';
  }

  return result;
}

function takeLeadingLines(
  lines: string[],
  budget: number,
  lineCost: (line: string) => number
): number[] {
  const kept: number[] = [];
  let used = 0;

  for (let i = 0; i < lines.length; i++) {
    const cost = lineCost(lines[i] ?? '');
    if (used + cost > budget) {
      break;
    }
    kept.push(i);
    used += cost;
  }

  return kept;
}

function takePriorityLines(
  lines: string[],
  hunkIndex: number,
  headerCost: number,
  budget: number,
  lineCost: (line: string) => number
): number[] {
  const candidates: CandidateLine[] = [];
  for (let i = hunkIndex + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!line.trim()) {
      continue;
    }
    candidates.push({ index: i, rank: lineRank(line), cost: lineCost(line) });
  }

  // Stable sort keeps document order within a rank
  candidates.sort((a, b) => a.rank - b.rank);

  const kept: number[] = [];
  for (let i = 0; i <= hunkIndex; i++) {
    kept.push(i);
  }

  let used = headerCost;
  for (const candidate of candidates) {
    if (used + candidate.cost <= budget) {
      kept.push(candidate.index);
      used += candidate.cost;
    }
  }

  return kept.sort((a, b) => a - b);
}
