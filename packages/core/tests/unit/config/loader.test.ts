import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { CONFIG_FILENAME, deepMerge, envOverrides, loadConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

const TEST_DIR = join(tmpdir(), `saucier-test-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig({ projectDir: TEST_DIR, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('merges the config file over defaults', () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILENAME),
      'quality:\n  threshold: 0.7\nadvanced:\n  logLevel: debug\n',
      'utf-8',
    );
    const config = loadConfig({ projectDir: TEST_DIR, env: {} });
    expect(config.quality.threshold).toBe(0.7);
    expect(config.advanced.logLevel).toBe('debug');
    expect(config.quality.weights).toEqual(DEFAULT_CONFIG.quality.weights);
  });

  it('applies environment then programmatic overrides', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'quality:\n  threshold: 0.7\n', 'utf-8');
    const config = loadConfig({
      projectDir: TEST_DIR,
      env: { SAUCIER_QUALITY_THRESHOLD: '0.8', SAUCIER_MAX_REGENERATIONS: '1' },
      overrides: { quality: { maxRegenerationAttempts: 2 } },
    });
    expect(config.quality.threshold).toBe(0.8);
    expect(config.quality.maxRegenerationAttempts).toBe(2);
  });

  it('ignores the file when asked', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'quality:\n  threshold: 0.7\n', 'utf-8');
    expect(loadConfig({ projectDir: TEST_DIR, skipFile: true, env: {} }).quality.threshold).toBe(0.85);
  });

  it('throws ConfigError on invalid YAML', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'quality: [unclosed\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR, env: {} })).toThrow(ConfigError);
  });
});

describe('envOverrides', () => {
  it('reads SAUCIER_* variables', () => {
    expect(envOverrides({ SAUCIER_LOG_LEVEL: 'warn', SAUCIER_QUALITY_THRESHOLD: '0.9' })).toEqual({
      advanced: { logLevel: 'warn' },
      quality: { threshold: 0.9, maxRegenerationAttempts: undefined },
    });
  });

  it('rejects a non-numeric threshold', () => {
    expect(() => envOverrides({ SAUCIER_QUALITY_THRESHOLD: 'high' })).toThrow(ConfigError);
  });
});

describe('deepMerge', () => {
  it('merges nested objects, replaces arrays and skips undefined', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, d: undefined })).toEqual({
      a: { b: 1, c: [3] },
      d: 1,
    });
  });
});
