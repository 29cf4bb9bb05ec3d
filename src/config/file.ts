/**
 * Settings file loader
 *
 * Reads `.difftrim.yml` (or an explicit path) and validates it.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, formatIssues, settingsSchema, type SettingsLayer } from './settings.js';

/**
 * File names looked up in the working directory, in order
 */
export const SETTINGS_FILE_NAMES = ['.difftrim.yml', '.difftrim.yaml'];

/**
 * Find the default settings file in a directory
 */
export function findSettingsFile(cwd: string = process.cwd()): string | undefined {
  return SETTINGS_FILE_NAMES.map((name) => join(cwd, name)).find((path) => existsSync(path));
}

/**
 * Load the settings layer from a YAML file
 *
 * Without an explicit path the working directory is searched; a missing
 * default file yields an empty layer.
 *
 * @param filePath - Explicit settings file (must exist)
 * @param cwd - Directory searched for the default file
 * @throws ConfigError if the file is missing, unparsable or invalid
 */
export function loadSettingsFile(filePath?: string, cwd: string = process.cwd()): SettingsLayer {
  const path = filePath ? resolve(cwd, filePath) : findSettingsFile(cwd);
  if (!path) {
    return {};
  }
  if (!existsSync(path)) {
    throw new ConfigError(`Settings file not found: ${path}`, path);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse settings file ${path}: ${message}`, path);
  }

  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings in ${path}: ${formatIssues(parsed.error)}`, path);
  }
  return parsed.data;
}
