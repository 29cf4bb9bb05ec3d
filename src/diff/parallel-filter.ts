/**
 * Parallel Filter Runner
 *
 * Applies the section classifier to every section. Larger inputs go through
 * the `withConcurrency` promise pool: classification is synchronous, so the
 * workers interleave on the event loop rather than run on separate threads.
 */

import { cpus } from 'node:os';
import { withConcurrency } from '../utils/index.js';
import { classifySection, summarizeExcludedSection } from './filter.js';
import { extractFilePath } from './splitter.js';
import type { ClassifierOptions, ExclusionReason } from './types.js';

/**
 * Upper bound on pool size, regardless of CPU count
 */
export const MAX_FILTER_WORKERS = 4;

/**
 * Section counts up to this value are classified inline
 */
export const SEQUENTIAL_THRESHOLD = 3;

/**
 * Filter runner options
 */
export interface FilterOptions extends ClassifierOptions {
  /** Pool size override (default: min(cpu count, 4)) */
  maxWorkers?: number;
  /** Keep excluded sections as a header + label summary instead of dropping them */
  summarizeExcluded?: boolean;
  /** Called once per excluded section, in input order */
  onExcluded?: (reason: ExclusionReason, filePath: string | undefined) => void;
  /** Enable verbose logging */
  verbose?: boolean;
}

interface Classified {
  text: string;
  reason?: ExclusionReason;
}

/**
 * Default pool size for this machine
 */
export function defaultWorkerCount(): number {
  return Math.max(1, Math.min(cpus().length, MAX_FILTER_WORKERS));
}

/**
 * Classify sections and return the survivors in input order
 *
 * @param sections - Section texts from the splitter
 * @param options - Classifier and pool options
 * @returns Sections that were not excluded (or their summaries)
 */
export async function filterSections(
  sections: readonly string[],
  options: FilterOptions = {}
): Promise<string[]> {
  const classify = (text: string): Classified => ({
    text,
    reason: classifySection(text, options),
  });

  let classified: Classified[];
  if (sections.length <= SEQUENTIAL_THRESHOLD) {
    classified = sections.map(classify);
  } else {
    const workers = options.maxWorkers ?? defaultWorkerCount();
    classified = await withConcurrency(
      sections.map((text) => () => classify(text)),
      workers
    );
  }

  const survivors: string[] = [];
  for (const { text, reason } of classified) {
    if (!reason) {
      survivors.push(text);
      continue;
    }

    const filePath = extractFilePath(text);
    options.onExcluded?.(reason, filePath);
    if (options.verbose) {
      console.log(`[Filter] Excluded ${filePath ?? '(unknown path)'}: ${reason}`);
    }
    if (options.summarizeExcluded) {
      survivors.push(summarizeExcludedSection(text, reason));
    }
  }

  return survivors;
}
