/**
 * Threshold-based weather alerts
 *
 * Categories are evaluated independently and each contributes at most one
 * alert, the most severe matching rule:
 * - Heat: extreme heat (danger) supersedes high heat (warning)
 * - Cold: danger when any day reaches extreme cold, otherwise info
 * - Precipitation / wind: danger above the "very" threshold, otherwise warning
 */

import { z } from 'zod';
import { TEMPERATURE_COLUMNS, WIND_COLUMNS, resolveColumn } from '../core/columns.js';
import { InvalidInputError } from '../core/errors.js';
import type { WeatherSeries } from '../core/series.js';
import type { AlertThresholds, MetricName, WeatherAlert } from '../core/types.js';
import { DEFAULT_ALERT_THRESHOLDS } from '../config.js';
import { formatDayCount } from '../utils/index.js';

// =============================================================================
// THRESHOLD PROFILES
// =============================================================================

const finite = z.number().finite();

const AlertThresholdsSchema = z
  .object({
    extremeHeat: finite,
    highHeat: finite,
    cold: finite,
    extremeCold: finite,
    heavyRain: finite.nonnegative(),
    veryHeavyRain: finite.nonnegative(),
    strongWind: finite.nonnegative(),
    veryStrongWind: finite.nonnegative(),
  })
  .refine(t => t.highHeat < t.extremeHeat, { message: 'highHeat must be below extremeHeat', path: ['highHeat'] })
  .refine(t => t.extremeCold < t.cold, { message: 'extremeCold must be below cold', path: ['extremeCold'] })
  .refine(t => t.heavyRain < t.veryHeavyRain, { message: 'heavyRain must be below veryHeavyRain', path: ['heavyRain'] })
  .refine(t => t.strongWind < t.veryStrongWind, { message: 'strongWind must be below veryStrongWind', path: ['strongWind'] });

/**
 * Validate a threshold profile and return a frozen copy
 */
export function parseAlertThresholds(input: unknown): Readonly<AlertThresholds> {
  const result = AlertThresholdsSchema.safeParse(input);
  if (!result.success) {
    throw InvalidInputError.fromZod('Invalid alert thresholds', result.error);
  }
  return Object.freeze(result.data);
}

// =============================================================================
// RULE EVALUATION
// =============================================================================

interface Matches {
  count: number;
  min: number;
  max: number;
}

function collectMatches(values: readonly number[], predicate: (value: number) => boolean): Matches | null {
  let count = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (!predicate(value)) continue;
    count++;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return count > 0 ? { count, min, max } : null;
}

function heatAlert(values: readonly number[], metric: MetricName, t: AlertThresholds): WeatherAlert | null {
  const extreme = collectMatches(values, v => v >= t.extremeHeat);
  if (extreme) {
    return {
      category: 'heat',
      severity: 'danger',
      title: '🔥 Extreme heat warning',
      message: `${formatDayCount(extreme.count)} with temperature ≥ ${t.extremeHeat}°C`,
      metric,
      value: extreme.max,
      count: extreme.count,
    };
  }

  const hot = collectMatches(values, v => v >= t.highHeat);
  if (hot) {
    return {
      category: 'heat',
      severity: 'warning',
      title: '🌡️ Heat warning',
      message: `${formatDayCount(hot.count)} with temperature ≥ ${t.highHeat}°C`,
      metric,
      value: hot.max,
      count: hot.count,
    };
  }

  return null;
}

function coldAlert(values: readonly number[], metric: MetricName, t: AlertThresholds): WeatherAlert | null {
  const cold = collectMatches(values, v => v <= t.cold);
  if (!cold) return null;

  return {
    category: 'cold',
    severity: cold.min <= t.extremeCold ? 'danger' : 'info',
    title: '❄️ Cold weather warning',
    message: `${formatDayCount(cold.count)} with temperature ≤ ${t.cold}°C`,
    metric,
    value: cold.min,
    count: cold.count,
  };
}

function rainAlert(values: readonly number[], t: AlertThresholds): WeatherAlert | null {
  const heavy = collectMatches(values, v => v >= t.heavyRain);
  if (!heavy) return null;

  return {
    category: 'precipitation',
    severity: heavy.max >= t.veryHeavyRain ? 'danger' : 'warning',
    title: '🌧️ Heavy rain warning',
    message: `${formatDayCount(heavy.count)} with rainfall ≥ ${t.heavyRain}mm`,
    metric: 'precipitation',
    value: heavy.max,
    count: heavy.count,
  };
}

function windAlert(values: readonly number[], metric: MetricName, t: AlertThresholds): WeatherAlert | null {
  const strong = collectMatches(values, v => v >= t.strongWind);
  if (!strong) return null;

  return {
    category: 'wind',
    severity: strong.max >= t.veryStrongWind ? 'danger' : 'warning',
    title: '💨 Strong wind warning',
    message: `${formatDayCount(strong.count)} with wind ≥ ${t.strongWind}km/h`,
    metric,
    value: strong.max,
    count: strong.count,
  };
}

// =============================================================================
// ALERT ENGINE
// =============================================================================

/**
 * Alerts in category order: heat, cold, precipitation, wind
 */
export function generateAlerts(
  series: WeatherSeries,
  thresholds: Readonly<AlertThresholds> = DEFAULT_ALERT_THRESHOLDS
): WeatherAlert[] {
  const t = thresholds === DEFAULT_ALERT_THRESHOLDS ? thresholds : parseAlertThresholds(thresholds);
  const alerts: WeatherAlert[] = [];

  if (series.isEmpty) return alerts;

  const temperatureColumn = resolveColumn(series, TEMPERATURE_COLUMNS);
  if (temperatureColumn) {
    const temps = series.values(temperatureColumn);
    const heat = heatAlert(temps, temperatureColumn, t);
    if (heat) alerts.push(heat);
    const cold = coldAlert(temps, temperatureColumn, t);
    if (cold) alerts.push(cold);
  }

  if (series.hasColumn('precipitation')) {
    const rain = rainAlert(series.values('precipitation'), t);
    if (rain) alerts.push(rain);
  }

  const windColumn = resolveColumn(series, WIND_COLUMNS);
  if (windColumn) {
    const wind = windAlert(series.values(windColumn), windColumn, t);
    if (wind) alerts.push(wind);
  }

  return alerts;
}
