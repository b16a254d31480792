import { readFile } from 'fs/promises';
import { ConfigurationError } from '../errors';
import { DEFAULT_LAYOUT_CONFIG } from './defaults';
import { validateLayoutConfig, type LayoutConfig } from './LayoutConfig';
import type { LayoutConfigOverrides } from './schema';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively overlay `overrides` on `defaults`. Arrays and scalars replace,
 * objects merge, `undefined` keeps the default.
 */
export function mergeWithDefaults(defaults: unknown, overrides: unknown): unknown {
  if (overrides === undefined) {
    return defaults;
  }
  if (!isPlainObject(defaults) || !isPlainObject(overrides)) {
    return overrides;
  }
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    merged[key] = mergeWithDefaults(defaults[key], value);
  }
  return merged;
}

/**
 * Overlay `overrides` on DEFAULT_LAYOUT_CONFIG and validate the result.
 */
export function createLayoutConfig(overrides: LayoutConfigOverrides = {}): LayoutConfig {
  return validateLayoutConfig(mergeWithDefaults(DEFAULT_LAYOUT_CONFIG, overrides));
}

/**
 * Read a JSON configuration file, merge it over DEFAULT_LAYOUT_CONFIG and validate it.
 */
export async function loadLayoutConfig(path: string): Promise<LayoutConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${path}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON`, error);
  }

  return validateLayoutConfig(mergeWithDefaults(DEFAULT_LAYOUT_CONFIG, parsed));
}
