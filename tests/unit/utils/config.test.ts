/**
 * Configuration Unit Tests
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { ALERT_THRESHOLD_PROFILES, DEFAULT_ALERT_THRESHOLDS, validateConfig } from '../../../src/config.js';
import { parseAlertThresholds } from '../../../src/analysis/alerts.js';

describe('validateConfig', () => {
  it('should accept an empty environment', () => {
    expect(validateConfig({})).toEqual({ valid: true, errors: [] });
  });

  it('should report an unknown log level', () => {
    expect(validateConfig({ LOG_LEVEL: 'verbose' })).toEqual({
      valid: false,
      errors: ['LOG_LEVEL must be one of debug, info, warn, error (got "verbose")'],
    });
  });

  it('should report an unknown alert profile', () => {
    expect(validateConfig({ ALERT_PROFILE: 'arctic' }).errors).toEqual([
      'ALERT_PROFILE must be one of default, tropical, temperate (got "arctic")',
    ]);
  });
});

describe('alert threshold profiles', () => {
  it('should use the default profile for "default"', () => {
    expect(ALERT_THRESHOLD_PROFILES.default).toBe(DEFAULT_ALERT_THRESHOLDS);
  });

  it('should keep every profile internally consistent', () => {
    for (const profile of Object.values(ALERT_THRESHOLD_PROFILES)) {
      expect(() => parseAlertThresholds(profile)).not.toThrow();
    }
  });

  it('should freeze profiles', () => {
    expect(Object.isFrozen(DEFAULT_ALERT_THRESHOLDS)).toBe(true);
    expect(Object.isFrozen(ALERT_THRESHOLD_PROFILES.tropical)).toBe(true);
  });
});

describe('tsconfig.json', () => {
  it('should type-check test helpers along with the suites', () => {
    const tsconfig: unknown = JSON.parse(readFileSync(new URL('../../../tsconfig.json', import.meta.url), 'utf-8'));

    expect(tsconfig).toMatchObject({ include: expect.arrayContaining(['src/**/*.ts', 'tests/**/*.ts']) });
  });
});
