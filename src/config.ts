/**
 * Configuration for Weather Insights
 *
 * Process-level settings are read here once. Analysis functions never look at
 * the environment: callers pass these values in explicitly.
 */

import 'dotenv/config';
import { z } from 'zod';
import type { AlertThresholds, MetricName } from './core/types.js';

// =============================================================================
// LOGGING
// =============================================================================
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const LogLevelSchema = z.enum(LOG_LEVELS);

export const LOG_LEVEL = LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL ?? 'info');

// =============================================================================
// ALERT THRESHOLDS
// =============================================================================

// Default profile (°C, mm, km/h)
export const DEFAULT_ALERT_THRESHOLDS: Readonly<AlertThresholds> = Object.freeze({
  extremeHeat: 38,
  highHeat: 35,
  cold: 15,
  extremeCold: 5,
  heavyRain: 50,
  veryHeavyRain: 100,
  strongWind: 25,
  veryStrongWind: 40,
});

// Regional profiles can coexist; each is an independent frozen value
export const ALERT_THRESHOLD_PROFILES = {
  default: DEFAULT_ALERT_THRESHOLDS,
  tropical: Object.freeze({
    extremeHeat: 40,
    highHeat: 37,
    cold: 18,
    extremeCold: 10,
    heavyRain: 75,
    veryHeavyRain: 150,
    strongWind: 30,
    veryStrongWind: 50,
  }),
  temperate: Object.freeze({
    extremeHeat: 34,
    highHeat: 30,
    cold: 0,
    extremeCold: -10,
    heavyRain: 30,
    veryHeavyRain: 60,
    strongWind: 40,
    veryStrongWind: 60,
  }),
} as const satisfies Record<string, Readonly<AlertThresholds>>;

export type AlertProfileName = keyof typeof ALERT_THRESHOLD_PROFILES;

const AlertProfileSchema = z.enum(['default', 'tropical', 'temperate']);

export const ALERT_PROFILE: AlertProfileName = AlertProfileSchema
  .catch('default')
  .parse(process.env.ALERT_PROFILE ?? 'default');

// =============================================================================
// ANALYSIS DEFAULTS
// =============================================================================
export const ANALYSIS_DEFAULTS: Readonly<{
  metric: MetricName;
  anomalyThreshold: number;
  trendWindow: number;
}> = Object.freeze({
  metric: 'temp_mean',
  anomalyThreshold: 2.0,
  trendWindow: 7,
});

// =============================================================================
// REPORTS
// =============================================================================
export const REPORT_DATE_FORMAT = 'DD/MM/YYYY';
export const REPORT_TIME_FORMAT = 'HH:mm DD/MM/YYYY';

// =============================================================================
// VALIDATION
// =============================================================================
export function validateConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (env.LOG_LEVEL !== undefined && !LogLevelSchema.safeParse(env.LOG_LEVEL).success) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${env.LOG_LEVEL}")`);
  }

  if (env.ALERT_PROFILE !== undefined && !AlertProfileSchema.safeParse(env.ALERT_PROFILE).success) {
    errors.push(
      `ALERT_PROFILE must be one of ${Object.keys(ALERT_THRESHOLD_PROFILES).join(', ')} (got "${env.ALERT_PROFILE}")`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
