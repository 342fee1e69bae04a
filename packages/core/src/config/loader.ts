// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { EngineConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are skipped.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

export interface ConfigOverrides {
  engine?: Partial<EngineConfig['engine']>;
  advanced?: Partial<EngineConfig['advanced']>;
}

/**
 * Load config with precedence: overrides > .trialflow.yml > defaults.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): EngineConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = {
    engine: { ...DEFAULT_CONFIG.engine },
    advanced: { ...DEFAULT_CONFIG.advanced },
  };

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`);
    }
  }

  if (options?.overrides) {
    const overrides: Record<string, unknown> = {};
    if (options.overrides.engine) overrides.engine = { ...options.overrides.engine };
    if (options.overrides.advanced) overrides.advanced = { ...options.overrides.advanced };
    merged = deepMerge(merged, overrides);
  }

  return validateConfig(merged);
}

export { deepMerge };
