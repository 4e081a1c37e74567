// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { PipelineConfig, PipelineConfigOverrides } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.saucier.yml';

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
    const tgtVal = result[key];
    if (srcVal === undefined) {
      continue;
    }
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

function parseNumberEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`Environment variable ${name} must be a number, got "${raw}"`, name);
  }
  return value;
}

/** Overrides taken from SAUCIER_* environment variables. */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const logLevel = env.SAUCIER_LOG_LEVEL;
  if (logLevel) {
    overrides.advanced = { logLevel };
  }
  const threshold = parseNumberEnv('SAUCIER_QUALITY_THRESHOLD', env);
  const maxRegenerations = parseNumberEnv('SAUCIER_MAX_REGENERATIONS', env);
  if (threshold !== undefined || maxRegenerations !== undefined) {
    overrides.quality = { threshold, maxRegenerationAttempts: maxRegenerations };
  }
  return overrides;
}

/**
 * Load config with precedence: overrides > env > .saucier.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .saucier.yml from projectDir on top
 * 3. Merge SAUCIER_* environment overrides
 * 4. Merge programmatic overrides on top
 * 5. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: PipelineConfigOverrides;
  skipFile?: boolean;
  env?: NodeJS.ProcessEnv;
}): PipelineConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

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
    }
  }

  merged = deepMerge(merged, envOverrides(options?.env ?? process.env));

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

export { deepMerge };
