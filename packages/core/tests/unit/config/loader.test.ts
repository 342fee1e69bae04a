import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { deepMerge, loadConfig } from '../../../src/config/loader.js';

const TEST_DIR = join(tmpdir(), `trialflow-config-test-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig({ projectDir: TEST_DIR })).toEqual(DEFAULT_CONFIG);
  });

  it('merges .trialflow.yml over defaults', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), 'engine:\n  frameRate: 30\n', 'utf-8');
    const config = loadConfig({ projectDir: TEST_DIR });
    expect(config.engine.frameRate).toBe(30);
    // Defaults still present for unspecified fields
    expect(config.engine.maxRoutineDuration).toBe(DEFAULT_CONFIG.engine.maxRoutineDuration);
    expect(config.advanced.logLevel).toBe('info');
  });

  it('respects precedence: overrides > file > defaults', () => {
    writeFileSync(
      join(TEST_DIR, '.trialflow.yml'),
      'engine:\n  frameRate: 30\n  seed: 1\nadvanced:\n  logLevel: debug\n',
      'utf-8',
    );
    const config = loadConfig({
      projectDir: TEST_DIR,
      overrides: { engine: { seed: 9, frameRate: undefined }, advanced: { logLevel: 'warn' } },
    });
    expect(config.engine).toEqual({ frameRate: 30, maxRoutineDuration: 0, seed: 9 });
    expect(config.advanced.logLevel).toBe('warn');
  });

  it('skips the file when asked', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), 'engine:\n  frameRate: 30\n', 'utf-8');
    expect(loadConfig({ projectDir: TEST_DIR, skipFile: true }).engine.frameRate).toBe(60);
  });

  it('treats an empty file as no settings', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), '', 'utf-8');
    expect(loadConfig({ projectDir: TEST_DIR })).toEqual(DEFAULT_CONFIG);
  });

  it('throws ConfigError for invalid YAML', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), '{{invalid yaml', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow('Failed to parse .trialflow.yml');
  });

  it('rejects a file that is not a mapping', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), '- 1\n- 2\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow('.trialflow.yml must contain a mapping');
  });

  it('validates the merged config', () => {
    writeFileSync(join(TEST_DIR, '.trialflow.yml'), 'engine:\n  frameRate: -5\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow('Invalid configuration');
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] } }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] } });
  });

  it('skips undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined, b: 2 })).toEqual({ a: 1, b: 2 });
  });
});
