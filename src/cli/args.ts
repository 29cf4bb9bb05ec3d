/**
 * CLI argument parsing
 */

import { ConfigError, settingsSchema, type SettingsLayer } from '../config/index.js';
import { formatIssues } from '../config/settings.js';

/**
 * Parsed command line
 */
export interface CliOptions {
  /** Print usage and exit */
  help: boolean;
  /** Diff file to read (stdin when absent) */
  file?: string;
  /** Explicit settings file */
  configPath?: string;
  /** Print statistics to stderr */
  stats: boolean;
  /** Keep ANSI color codes in the input */
  color: boolean;
  /** Settings given as flags */
  settings: SettingsLayer;
}

/**
 * Print usage information
 */
export function usage(): string {
  return `
Usage: diff-trim [file] [options]

Reads a unified diff from <file> (or stdin) and prints a version that fits
the token budget, with noise filtered out and the most important files first.

Options:
  --limit=<n>              Token budget (default: 6000)
  --model=<id>             Model used for token counting
                           (default: anthropic:claude-3-haiku-latest)
  --config=<path>          Settings file (default: ./.difftrim.yml)
  --exclude=<glob>         Extra pattern to exclude (repeatable)
  --workers=<n>            Filter pool size
  --summarize-excluded     Keep excluded files as one-line summaries
  --no-filter              Keep binary, minified, generated and lockfile changes
  --no-truncate            Print the filtered diff without enforcing the budget
  --stats                  Print token statistics to stderr
  --color                  Keep ANSI color codes from the input
  --verbose                Enable verbose output
  -h, --help               Show this help

Environment:
  DIFF_TRIM_TOKEN_LIMIT, DIFF_TRIM_MODEL, DIFF_TRIM_MAX_WORKERS,
  DIFF_TRIM_EXCLUDE (comma-separated), DIFF_TRIM_VERBOSE

Examples:
  git diff --staged | diff-trim --limit=4000
  diff-trim changes.diff --model=openai:gpt-4o --stats
`;
}

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} expects an integer, got "${value}"`, 'cli');
  }
  return parsed;
}

/**
 * Parse CLI arguments (without the node and script entries)
 *
 * @throws ConfigError on unknown flags or invalid values
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    stats: false,
    color: false,
    settings: {},
  };
  const raw: Record<string, unknown> = {};
  const exclude: string[] = [];

  for (const arg of args) {
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    if (!arg.startsWith('-') || arg === '-') {
      if (options.file !== undefined) {
        throw new ConfigError(`Unexpected argument "${arg}"`, 'cli');
      }
      options.file = arg === '-' ? undefined : arg;
      continue;
    }

    if (value === undefined) {
      switch (flag) {
        case '-h':
        case '--help':
          options.help = true;
          continue;
        case '--stats':
          options.stats = true;
          continue;
        case '--color':
          options.color = true;
          continue;
        case '--no-color':
          options.color = false;
          continue;
        case '--verbose':
          raw.verbose = true;
          continue;
        case '--summarize-excluded':
          raw.summarizeExcluded = true;
          continue;
        case '--filter':
          raw.filter = true;
          continue;
        case '--no-filter':
          raw.filter = false;
          continue;
        case '--truncate':
          raw.truncate = true;
          continue;
        case '--no-truncate':
          raw.truncate = false;
          continue;
      }
    } else {
      switch (flag) {
        case '--limit':
        case '--token-limit':
          raw.tokenLimit = parseInteger(flag, value);
          continue;
        case '--model':
          raw.model = value;
          continue;
        case '--workers':
          raw.maxWorkers = parseInteger(flag, value);
          continue;
        case '--exclude':
          exclude.push(value);
          continue;
        case '--config':
          options.configPath = value;
          continue;
      }
    }

    throw new ConfigError(`Unknown option "${arg}"`, 'cli');
  }

  if (exclude.length > 0) {
    raw.exclude = exclude;
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid option: ${formatIssues(parsed.error)}`, 'cli');
  }
  options.settings = parsed.data;

  return options;
}
