/**
 * Descriptive statistics over a weather series
 *
 * Missing values are dropped before aggregating. A block is produced only when
 * its column has at least one present value; the standard deviation (n - 1)
 * is omitted when it is undefined.
 */

import { WIND_COLUMNS, resolveColumn } from '../core/columns.js';
import { parseMetricName, type WeatherSeries } from '../core/series.js';
import type { MetricName, WeatherStatistics } from '../core/types.js';
import { ANALYSIS_DEFAULTS } from '../config.js';
import { logger, roundTo } from '../utils/index.js';

// =============================================================================
// PRIMITIVES
// =============================================================================

export interface ValueSummary {
  count: number;
  sum: number;
  mean: number;
  min: number;
  max: number;
  std?: number;
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation; undefined below two values
 */
export function sampleStd(values: readonly number[]): number | undefined {
  if (values.length < 2) return undefined;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Unrounded summary of present values, null for an empty list
 */
export function summarize(values: readonly number[]): ValueSummary | null {
  if (values.length === 0) return null;

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const summary: ValueSummary = {
    count: values.length,
    sum,
    mean: sum / values.length,
    min,
    max,
  };
  const std = sampleStd(values);
  if (std !== undefined) summary.std = std;
  return summary;
}

// =============================================================================
// STATISTICS ENGINE
// =============================================================================

export function computeStatistics(
  series: WeatherSeries,
  metric: MetricName = ANALYSIS_DEFAULTS.metric
): WeatherStatistics {
  const temperatureColumn = parseMetricName(metric);
  const stats: WeatherStatistics = {};

  if (series.isEmpty) return stats;

  const temperature = summarize(series.values(temperatureColumn));
  if (temperature) {
    stats.temperature = {
      mean: roundTo(temperature.mean),
      min: roundTo(temperature.min),
      max: roundTo(temperature.max),
    };
    if (temperature.std !== undefined) stats.temperature.std = roundTo(temperature.std);
  } else {
    logger.debug(`No values for ${temperatureColumn}, skipping temperature statistics`);
  }

  const precipitationValues = series.values('precipitation');
  const precipitation = summarize(precipitationValues);
  if (precipitation) {
    stats.precipitation = {
      total: roundTo(precipitation.sum),
      mean: roundTo(precipitation.mean),
      max: roundTo(precipitation.max),
      rainyDays: precipitationValues.filter(v => v > 0).length,
    };
  }

  const windColumn = resolveColumn(series, WIND_COLUMNS);
  const wind = windColumn ? summarize(series.values(windColumn)) : null;
  if (wind) {
    stats.wind = {
      mean: roundTo(wind.mean),
      max: roundTo(wind.max),
    };
  }

  return stats;
}
