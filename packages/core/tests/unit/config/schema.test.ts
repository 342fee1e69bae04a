import { describe, expect, it } from 'vitest';
import { validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('validateConfig', () => {
  it('fills every default from an empty object', () => {
    expect(validateConfig({})).toEqual({
      engine: { frameRate: 60, maxRoutineDuration: 0, seed: null },
      advanced: { logLevel: 'info' },
    });
  });

  it('keeps valid values', () => {
    const config = validateConfig({ engine: { frameRate: 120, seed: 7 }, advanced: { logLevel: 'silent' } });
    expect(config.engine).toEqual({ frameRate: 120, maxRoutineDuration: 0, seed: 7 });
    expect(config.advanced.logLevel).toBe('silent');
  });

  it('rejects a non-positive frame rate with the field path', () => {
    let caught: unknown;
    try {
      validateConfig({ engine: { frameRate: 0 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ field: 'engine.frameRate' });
    expect(String(caught)).toContain('Invalid configuration: engine.frameRate:');
  });

  it('rejects fractional seeds and unknown log levels', () => {
    expect(() => validateConfig({ engine: { seed: 1.5 } })).toThrow('engine.seed');
    expect(() => validateConfig({ engine: { seed: 4294967296 } })).toThrow('engine.seed');
    expect(() => validateConfig({ engine: { seed: -1 } })).toThrow('engine.seed');
    expect(validateConfig({ engine: { seed: 4294967295 } }).engine.seed).toBe(4294967295);
    expect(() => validateConfig({ advanced: { logLevel: 'loud' } })).toThrow('advanced.logLevel');
  });
});
