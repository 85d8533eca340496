import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/ConfigError.js';
import { LogLevel } from '../types/log-types.js';
import { DEFAULT_ENGINE_CONFIG, applyConfigDefaults, validateEngineConfig } from './EngineConfig.js';

describe('EngineConfig', () => {
  it('fills every default', () => {
    expect(applyConfigDefaults()).toEqual({
      concurrency: 5,
      defaultTimeoutMs: 300_000,
      validateOutputs: true,
      historyLimit: 50,
      logLevel: LogLevel.INFO,
    });
    expect(Object.isFrozen(DEFAULT_ENGINE_CONFIG)).toBe(true);
  });

  it('keeps explicit values, including falsy ones', () => {
    expect(applyConfigDefaults({ validateOutputs: false, historyLimit: 0 })).toMatchObject({
      validateOutputs: false,
      historyLimit: 0,
      concurrency: 5,
    });
  });

  it('accepts a partial config and nothing at all', () => {
    expect(validateEngineConfig({ concurrency: 2, logLevel: 'debug' })).toEqual({
      concurrency: 2,
      logLevel: LogLevel.DEBUG,
    });
    expect(validateEngineConfig(undefined)).toEqual({});
  });

  it('lists every offending field', () => {
    try {
      validateEngineConfig({ concurrency: 0, defaultTimeoutMs: 'soon', logLevel: 'verbose' });
      expect.fail('expected ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.fields).toEqual(['concurrency', 'defaultTimeoutMs', 'logLevel']);
      }
    }
  });

  it('rejects unknown keys at the root', () => {
    expect(() => validateEngineConfig({ workers: 4 })).toThrow(
      "Invalid engine config: (root): Unrecognized key(s) in object: 'workers'"
    );
  });
});
