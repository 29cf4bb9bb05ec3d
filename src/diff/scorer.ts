/**
 * Importance Scorer
 *
 * Ranks diff sections so the truncator keeps the most meaningful files when
 * the budget runs out. Scores are relative and only used for ordering.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { DiffSection, ScoredSection } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const IMPORTANCE_TABLE_PATH = join(__dirname, '..', '..', 'data', 'file-importance.json');

const importanceTableSchema = z.object({
  filenames: z.record(z.number().positive()),
  extensions: z.record(z.number().positive()),
});

/**
 * File importance weights, by special filename and by extension
 */
export type ImportanceTable = z.infer<typeof importanceTableSchema>;

/**
 * Multiplier applied to a matching pattern in added lines
 */
export interface CodePattern {
  name: string;
  pattern: RegExp;
  multiplier: number;
}

/**
 * Patterns checked against added lines, in evaluation order.
 * Every match compounds into the score.
 */
export const CODE_PATTERNS: readonly CodePattern[] = [
  {
    name: 'type-definition',
    pattern:
      /^\s*(export\s+)?(default\s+)?(abstract\s+|sealed\s+|data\s+)?(class|interface|enum|struct|trait|protocol)\s+\w+/m,
    multiplier: 1.8,
  },
  {
    name: 'function-definition',
    pattern: /^\s*(export\s+)?(default\s+)?(pub\s+)?(async\s+)?(def|function|func|fn|fun)\s+\w+/m,
    multiplier: 1.5,
  },
  {
    name: 'import',
    pattern: /^\s*(import\s|from\s+\S+\s+import\s|using\s+[\w.]+;|#include\s|require\s*\(|use\s+\w)/m,
    multiplier: 1.3,
  },
  {
    name: 'access-modifier',
    pattern: /^\s*(public|private|protected|internal)\s/m,
    multiplier: 1.2,
  },
  {
    name: 'version-bump',
    pattern: /\b(version|__version__)["']?\s*[:=]\s*["']?v?\d+\.\d+/im,
    multiplier: 1.4,
  },
  {
    name: 'dependency-change',
    pattern: /^\s*["']?[\w@./-]+["']?\s*[:=]{1,2}\s*["']?[~^>=<]*\d+\.\d+(\.\d+)?/m,
    multiplier: 1.3,
  },
  {
    name: 'control-flow',
    pattern: /^\s*(if|else\s+if|elif|for|while|switch|match)\b/m,
    multiplier: 1.2,
  },
  {
    name: 'exception-handling',
    pattern: /^\s*(try|catch|except|finally|raise|throw)\b/m,
    multiplier: 1.2,
  },
  {
    name: 'return-await',
    pattern: /\b(return|await|yield)\b/m,
    multiplier: 1.1,
  },
  {
    name: 'todo',
    pattern: /\b(TODO|TBD)\b/m,
    multiplier: 1.2,
  },
  {
    name: 'fixme',
    pattern: /\b(FIXME|HACK|XXX)\b/m,
    multiplier: 1.3,
  },
  {
    name: 'docstring',
    pattern: /("""|'''|\/\*\*|^\s*\*\s*@\w+)/m,
    multiplier: 1.1,
  },
  {
    name: 'test-definition',
    pattern: /(^\s*def\s+test_\w+|\b(it|test|describe)\s*\(\s*['"`])/m,
    multiplier: 1.1,
  },
  {
    name: 'assertion',
    pattern: /\b(assert\w*|expect)\s*\(|^\s*assert\s/m,
    multiplier: 1.0,
  },
];

/**
 * Multiplier when no code pattern matches
 */
export const NO_PATTERN_PENALTY = 0.9;

const CHANGE_KIND_FACTORS: Partial<Record<DiffSection['changeKind'], number>> = {
  add: 1.2,
  delete: 1.1,
};

let cachedTable: ImportanceTable | undefined;

/**
 * Load the importance table from data/file-importance.json (cached)
 */
export function loadImportanceTable(): ImportanceTable {
  if (!cachedTable) {
    const content = readFileSync(IMPORTANCE_TABLE_PATH, 'utf-8');
    cachedTable = importanceTableSchema.parse(JSON.parse(content));
  }
  return cachedTable;
}

/**
 * Extension of the last path segment, lower-cased (`.env` for dotfiles)
 */
function getExtension(path: string): string {
  const fileName = path.split('/').pop() ?? '';
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot).toLowerCase();
}

/**
 * Importance multiplier for a file path
 *
 * Special filenames (Dockerfile, package.json, ...) are matched first,
 * then the extension. Unknown files score 1.0.
 */
export function getExtensionScore(path: string, table: ImportanceTable = loadImportanceTable()): number {
  for (const [name, score] of Object.entries(table.filenames)) {
    if (path.includes(name)) {
      return score;
    }
  }

  const ext = getExtension(path);
  return (ext && table.extensions[ext]) || 1.0;
}

/**
 * Compound multiplier from code patterns found in added lines
 *
 * @param addedText - Added lines with their `+` prefix removed
 */
export function analyzeCodePatterns(addedText: string): number {
  let score = 1.0;
  let found = false;

  for (const { pattern, multiplier } of CODE_PATTERNS) {
    if (pattern.test(addedText)) {
      score *= multiplier;
      found = true;
    }
  }

  return found ? score : score * NO_PATTERN_PENALTY;
}

/**
 * Added lines of a section, without the `+` prefix
 */
export function extractAddedText(rawText: string): string {
  return rawText
    .split('\n')
    .filter((line) => line.startsWith('+') && !line.startsWith('+++'))
    .map((line) => line.slice(1))
    .join('\n');
}

/**
 * Volume bonus, capped at 2x
 */
export function volumeFactor(changes: number): number {
  return 1.0 + Math.min(1.0, 0.1 * (changes / 5));
}

/**
 * Score a single section
 *
 * score = extension × change kind × volume × code patterns
 */
export function scoreSection(section: DiffSection): number {
  let importance = 1.0;

  if (section.filePath) {
    importance *= getExtensionScore(section.filePath);
  }

  importance *= CHANGE_KIND_FACTORS[section.changeKind] ?? 1.0;
  importance *= volumeFactor(section.additions + section.deletions);
  importance *= analyzeCodePatterns(extractAddedText(section.rawText));

  return importance;
}

/**
 * Score sections, keeping their original order
 */
export function scoreSections(sections: readonly DiffSection[]): ScoredSection[] {
  return sections.map((section) => ({ section, score: scoreSection(section) }));
}
