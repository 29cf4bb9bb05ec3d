/**
 * Environment configuration for diff-trim
 *
 * Variables:
 * - DIFF_TRIM_TOKEN_LIMIT   Token budget for the output
 * - DIFF_TRIM_MODEL         Model identifier for token counting
 * - DIFF_TRIM_MAX_WORKERS   Filter pool size
 * - DIFF_TRIM_EXCLUDE       Comma-separated glob patterns to exclude
 * - DIFF_TRIM_VERBOSE       1/true to enable verbose logging
 */

import { z } from 'zod';
import { ConfigError, formatIssues, type SettingsLayer } from './settings.js';

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  DIFF_TRIM_TOKEN_LIMIT: z.coerce.number().int().nonnegative().optional(),
  DIFF_TRIM_MODEL: z.string().optional(),
  DIFF_TRIM_MAX_WORKERS: z.coerce.number().int().positive().optional(),
  DIFF_TRIM_EXCLUDE: z.string().optional(),
  DIFF_TRIM_VERBOSE: booleanFlag.optional(),
});

/**
 * Read the settings layer from environment variables
 *
 * Empty variables are treated as unset.
 *
 * @throws ConfigError if a variable holds an invalid value
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): SettingsLayer {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('DIFF_TRIM_') && value !== undefined && value.trim() !== ''
    )
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid environment configuration: ${formatIssues(parsed.error)}`,
      'env'
    );
  }

  const values = parsed.data;
  const layer: SettingsLayer = {};

  if (values.DIFF_TRIM_TOKEN_LIMIT !== undefined) {
    layer.tokenLimit = values.DIFF_TRIM_TOKEN_LIMIT;
  }
  if (values.DIFF_TRIM_MODEL) {
    layer.model = values.DIFF_TRIM_MODEL.trim();
  }
  if (values.DIFF_TRIM_MAX_WORKERS !== undefined) {
    layer.maxWorkers = values.DIFF_TRIM_MAX_WORKERS;
  }
  if (values.DIFF_TRIM_EXCLUDE) {
    layer.exclude = values.DIFF_TRIM_EXCLUDE.split(',')
      .map((pattern) => pattern.trim())
      .filter(Boolean);
  }
  if (values.DIFF_TRIM_VERBOSE !== undefined) {
    layer.verbose = values.DIFF_TRIM_VERBOSE;
  }

  return layer;
}
