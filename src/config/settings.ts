/**
 * Settings for diff-trim
 *
 * Priority order (highest to lowest):
 * 1. CLI flags
 * 2. Environment variables (DIFF_TRIM_*)
 * 3. Settings file (.difftrim.yml)
 * 4. Built-in defaults
 */

import { z } from 'zod';
import { DEFAULT_MODEL, DEFAULT_TOKEN_LIMIT } from '../diff/preprocessor.js';

/**
 * Raised when a settings layer holds invalid values
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const settingsSchema = z
  .object({
    tokenLimit: z.number().int().nonnegative(),
    model: z.string().min(1),
    maxWorkers: z.number().int().positive(),
    exclude: z.array(z.string().min(1)),
    summarizeExcluded: z.boolean(),
    filter: z.boolean(),
    truncate: z.boolean(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

/**
 * One layer of settings; every field optional
 */
export type SettingsLayer = z.infer<typeof settingsSchema>;

/**
 * Fully resolved settings
 */
export interface DiffTrimSettings {
  tokenLimit: number;
  model: string;
  maxWorkers?: number;
  exclude: string[];
  summarizeExcluded: boolean;
  filter: boolean;
  truncate: boolean;
  verbose: boolean;
}

export const DEFAULT_SETTINGS: DiffTrimSettings = {
  tokenLimit: DEFAULT_TOKEN_LIMIT,
  model: DEFAULT_MODEL,
  exclude: [],
  summarizeExcluded: false,
  filter: true,
  truncate: true,
  verbose: false,
};

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge settings layers over the defaults
 *
 * Scalar values from higher layers win. Exclude patterns from all layers
 * are combined.
 */
export function resolveSettings(layers: {
  file?: SettingsLayer;
  env?: SettingsLayer;
  cli?: SettingsLayer;
}): DiffTrimSettings {
  const ordered = [layers.file, layers.env, layers.cli].filter(
    (layer): layer is SettingsLayer => layer !== undefined
  );

  const settings: DiffTrimSettings = { ...DEFAULT_SETTINGS, exclude: [] };
  const exclude = new Set<string>();

  for (const layer of ordered) {
    settings.tokenLimit = layer.tokenLimit ?? settings.tokenLimit;
    settings.model = layer.model ?? settings.model;
    settings.maxWorkers = layer.maxWorkers ?? settings.maxWorkers;
    settings.summarizeExcluded = layer.summarizeExcluded ?? settings.summarizeExcluded;
    settings.filter = layer.filter ?? settings.filter;
    settings.truncate = layer.truncate ?? settings.truncate;
    settings.verbose = layer.verbose ?? settings.verbose;
    for (const pattern of layer.exclude ?? []) {
      exclude.add(pattern);
    }
  }

  settings.exclude = [...exclude];
  return settings;
}
