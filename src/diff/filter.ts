/**
 * Diff section filter
 * Decides which file sections are noise that should not reach the prompt
 */

import { minimatch } from 'minimatch';
import { extractFilePath } from './splitter.js';
import type { ClassifierOptions, ExclusionReason } from './types.js';

/**
 * Markers of binary content in git output
 */
const BINARY_PATTERNS = [/Binary files .* differ/, /GIT binary patch/];

/**
 * Suffixes of minified or bundled assets
 */
const MINIFIED_EXTENSIONS = [
  '.min.js',
  '.min.css',
  '.bundle.js',
  '.bundle.css',
  '.compressed.js',
  '.compressed.css',
  '.opt.js',
  '.opt.css',
];

/**
 * Build output and vendored directories
 */
const BUILD_DIRECTORIES = [
  '/dist/',
  '/build/',
  '/vendor/',
  '/node_modules/',
  '/assets/vendor/',
  '/public/build/',
  '/static/dist/',
];

const LOCKFILE_PATTERNS = [
  /package-lock\.json$/,
  /yarn\.lock$/,
  /Pipfile\.lock$/,
  /poetry\.lock$/,
  /Gemfile\.lock$/,
  /pnpm-lock\.yaml$/,
  /composer\.lock$/,
  /Cargo\.lock$/,
  /\.sum$/, // Go module checksums
];

const GENERATED_PATTERNS = [
  /\.pb\.go$/, // Protobuf
  /\.g\.dart$/, // Dart codegen
  /autogen\./,
  /generated\./,
];

/**
 * Labels used when an excluded section is kept as a summary
 */
const SUMMARY_LABELS: Record<ExclusionReason, string> = {
  binary: '[Binary file change]',
  'minified-extension': '[Minified file change]',
  'minified-content': '[Minified file change]',
  'build-directory': '[Build output change]',
  lockfile: '[Lockfile/generated file change]',
  generated: '[Lockfile/generated file change]',
  'custom-pattern': '[Filtered file change]',
};

/**
 * Find the first reason a section should be excluded
 *
 * Checks run in a fixed order and the first match wins:
 * binary, minified extension, build directory, lockfile, generated,
 * custom patterns, minified content. Only the binary check applies when
 * no file path can be extracted.
 *
 * @param sectionText - One file's diff text
 * @returns The exclusion reason, or undefined if the section is kept
 */
export function classifySection(
  sectionText: string,
  options: ClassifierOptions = {}
): ExclusionReason | undefined {
  if (isBinarySection(sectionText)) {
    return 'binary';
  }

  const path = extractFilePath(sectionText);
  if (!path) {
    return undefined;
  }

  if (isMinifiedByExtension(path)) {
    return 'minified-extension';
  }

  if (isBuildDirectory(path)) {
    return 'build-directory';
  }

  if (isLockfile(path)) {
    return 'lockfile';
  }

  if (isGenerated(path)) {
    return 'generated';
  }

  if (matchesExcludePattern(path, options.excludePatterns)) {
    return 'custom-pattern';
  }

  if (isMinifiedContent(sectionText)) {
    return 'minified-content';
  }

  return undefined;
}

/**
 * Determine if a section should be dropped before scoring
 */
export function shouldExcludeSection(sectionText: string, options: ClassifierOptions = {}): boolean {
  return classifySection(sectionText, options) !== undefined;
}

function isBinarySection(sectionText: string): boolean {
  return BINARY_PATTERNS.some((pattern) => pattern.test(sectionText));
}

function isMinifiedByExtension(path: string): boolean {
  return MINIFIED_EXTENSIONS.some((ext) => path.endsWith(ext));
}

/**
 * Check if file lives in a build or vendor directory below the repository root
 */
function isBuildDirectory(path: string): boolean {
  return BUILD_DIRECTORIES.some((dir) => path.includes(dir));
}

function isLockfile(path: string): boolean {
  return LOCKFILE_PATTERNS.some((pattern) => pattern.test(path));
}

function isGenerated(path: string): boolean {
  return GENERATED_PATTERNS.some((pattern) => pattern.test(path));
}

/**
 * Check if a path looks like a lockfile or generated file
 */
export function isLockfileOrGenerated(path: string): boolean {
  return isLockfile(path) || isGenerated(path);
}

function matchesExcludePattern(path: string, patterns: readonly string[] | undefined): boolean {
  if (!patterns || patterns.length === 0) {
    return false;
  }
  return patterns.some((pattern) => minimatch(path, pattern, { dot: true, matchBase: true }));
}

/**
 * Heuristic check for minified content
 *
 * Minified if any of:
 * - fewer than 10 lines but more than 1000 characters
 * - a single line longer than 200 characters
 * - a line over 300 characters (trimmed) with fewer than length/20 spaces
 * - more than 20% of lines longer than 500 characters
 */
export function isMinifiedContent(content: string): boolean {
  if (!content) {
    return false;
  }

  const lines = content.split('\n');

  if (lines.length < 10 && content.length > 1000) {
    return true;
  }

  if (lines.length === 1 && content.length > 200) {
    return true;
  }

  const hasDenseLine = lines.some(
    (line) => line.trim().length > 300 && countSpaces(line) < line.length / 20
  );
  if (hasDenseLine) {
    return true;
  }

  const longLines = lines.filter((line) => line.length > 500).length;
  return longLines / lines.length > 0.2;
}

function countSpaces(line: string): number {
  let count = 0;
  for (const char of line) {
    if (char === ' ') {
      count++;
    }
  }
  return count;
}

/**
 * Reduce an excluded section to its header plus a one-line label
 *
 * Keeps the `diff --git`, `new file`, `deleted file` and `index` lines so
 * the change still shows up in the prompt without its content.
 */
export function summarizeExcludedSection(sectionText: string, reason: ExclusionReason): string {
  const kept: string[] = [];

  for (const line of sectionText.trim().split('\n')) {
    if (line.startsWith('diff --git')) {
      kept.push(line);
    } else if (line.startsWith('new file') || line.startsWith('deleted file')) {
      kept.push(line);
    } else if (line.startsWith('index ')) {
      kept.push(line);
    } else if (line.startsWith('@@')) {
      break;
    }
  }

  kept.push(SUMMARY_LABELS[reason]);
  return `${kept.join('\n')}\n`;
}
