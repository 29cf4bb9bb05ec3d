/**
 * Section Splitter
 *
 * Cuts a unified diff into per-file sections without interpreting it.
 */

import type { ChangeKind, DiffSection } from './types.js';

/**
 * Boundary that starts every file in `git diff` output
 */
export const SECTION_BOUNDARY = 'diff --git ';

const BOUNDARY_REGEX = /^diff --git /gm;
const HEADER_PATH_REGEX = /^diff --git a\/(.+?) b\/(.+)$/;
const TARGET_MARKER_REGEX = /^\+\+\+ b\/(.+)$/m;

/**
 * Split a diff into file sections.
 *
 * Boundaries are `diff --git ` at the start of a line. Anything before the
 * first boundary is kept as its own section, so joining the result gives back
 * the input exactly.
 *
 * @param diff - Raw diff text
 * @returns Sections in original order
 */
export function splitDiffSections(diff: string): string[] {
  if (!diff) {
    return [];
  }

  const starts: number[] = [];
  const regex = new RegExp(BOUNDARY_REGEX.source, BOUNDARY_REGEX.flags);
  let match: RegExpExecArray | null;
  while ((match = regex.exec(diff)) !== null) {
    starts.push(match.index);
  }

  if (starts.length === 0) {
    return [diff];
  }

  if (starts[0] !== 0) {
    starts.unshift(0);
  }

  return starts.map((start, i) => diff.slice(start, starts[i + 1]));
}

/**
 * Extract the target path of a section.
 *
 * Reads the `b/` side of the `diff --git` header and falls back to the
 * `+++ b/` marker.
 */
export function extractFilePath(sectionText: string): string | undefined {
  const newline = sectionText.indexOf('\n');
  const firstLine = (newline === -1 ? sectionText : sectionText.slice(0, newline)).trimEnd();

  const headerMatch = HEADER_PATH_REGEX.exec(firstLine);
  if (headerMatch?.[2]) {
    return headerMatch[2];
  }

  const markerMatch = TARGET_MARKER_REGEX.exec(sectionText);
  return markerMatch?.[1]?.trimEnd() || undefined;
}

function detectChangeKind(sectionText: string, hasHeader: boolean): ChangeKind {
  if (/^new file mode/m.test(sectionText)) {
    return 'add';
  }
  if (/^deleted file mode/m.test(sectionText)) {
    return 'delete';
  }
  if (/^rename (from|to) /m.test(sectionText)) {
    return 'rename';
  }
  return hasHeader ? 'modify' : 'unknown';
}

/**
 * Count added and removed lines, ignoring the `+++`/`---` file markers
 */
export function countChanges(sectionText: string): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;

  for (const line of sectionText.split('\n')) {
    if (line.startsWith('+') && !line.startsWith('+++')) {
      additions++;
    } else if (line.startsWith('-') && !line.startsWith('---')) {
      deletions++;
    }
  }

  return { additions, deletions };
}

/**
 * Build a read-only DiffSection from section text
 */
export function parseSection(sectionText: string): DiffSection {
  const filePath = extractFilePath(sectionText);
  const hasHeader = sectionText.startsWith(SECTION_BOUNDARY) && filePath !== undefined;
  const { additions, deletions } = countChanges(sectionText);

  return Object.freeze({
    rawText: sectionText,
    filePath,
    changeKind: detectChangeKind(sectionText, hasHeader),
    additions,
    deletions,
  });
}
