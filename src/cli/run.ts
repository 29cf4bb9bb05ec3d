/**
 * CLI command runner
 */

import { stripVTControlCharacters } from 'node:util';
import {
  ConfigError,
  loadEnvSettings,
  loadSettingsFile,
  resolveSettings,
  type DiffTrimSettings,
} from '../config/index.js';
import { preprocessDiff } from '../diff/index.js';
import type { TokenCounter } from '../tokenizer/index.js';
import { parseCliArgs, usage, type CliOptions } from './args.js';
import { StatsFormatter } from './output.js';

/**
 * Process access needed by the CLI
 */
export interface CliIO {
  readStdin: () => Promise<string>;
  readFile: (path: string) => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Whether stderr is a terminal (colors in statistics) */
  isTTY?: boolean;
  /** Token counter override */
  countTokens?: TokenCounter;
}

/**
 * Run diff-trim with the given arguments
 *
 * @returns Process exit code
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  let settings: DiffTrimSettings;
  try {
    options = parseCliArgs(args);
    if (options.help) {
      io.stdout(usage());
      return 0;
    }
    settings = resolveSettings({
      file: loadSettingsFile(options.configPath, io.cwd),
      env: loadEnvSettings(io.env),
      cli: options.settings,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`Error: ${error.message}\n`);
      io.stderr('Run "diff-trim --help" for usage.\n');
      return 1;
    }
    throw error;
  }

  let input: string;
  try {
    input = options.file ? await io.readFile(options.file) : await io.readStdin();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`Error: Failed to read diff: ${message}\n`);
    return 1;
  }

  if (!options.color) {
    input = stripVTControlCharacters(input);
  }

  if (!input.trim()) {
    io.stderr('Error: No changes to display.\n');
    return 1;
  }

  const result = await preprocessDiff(input, {
    tokenLimit: settings.tokenLimit,
    model: settings.model,
    maxWorkers: settings.maxWorkers,
    excludePatterns: settings.exclude,
    summarizeExcluded: settings.summarizeExcluded,
    filter: settings.filter,
    truncate: settings.truncate,
    verbose: settings.verbose,
    countTokens: io.countTokens,
  });

  if (result.stats.keptSectionCount === 0) {
    io.stderr('Error: No changes to display after filtering.\n');
    return 1;
  }

  io.stdout(result.processedDiff);

  if (options.stats) {
    io.stderr(new StatsFormatter({ colors: io.isTTY ?? false }).format(result));
  }

  return 0;
}
