/**
 * Column resolution
 *
 * Feeds name the same quantity differently (daily "temp_max" vs current
 * "temperature"). Every component that needs "a temperature column" resolves
 * it through these ordered candidate lists.
 */

import type { MetricName } from './types.js';
import type { WeatherSeries } from './series.js';

export const TEMPERATURE_COLUMNS: readonly MetricName[] = ['temp_max', 'temp_mean', 'temperature'];

// Reports describe the typical day, so the mean comes first
export const MEAN_TEMPERATURE_COLUMNS: readonly MetricName[] = ['temp_mean', 'temperature'];

export const WIND_COLUMNS: readonly MetricName[] = ['wind_speed_max', 'wind_speed'];

/**
 * First candidate the series carries, or null when none is present
 */
export function resolveColumn(
  series: WeatherSeries,
  candidates: readonly MetricName[]
): MetricName | null {
  for (const candidate of candidates) {
    if (series.hasColumn(candidate)) return candidate;
  }
  return null;
}

/**
 * First candidate present in every series
 */
export function resolveSharedColumn(
  seriesList: readonly WeatherSeries[],
  candidates: readonly MetricName[]
): MetricName | null {
  for (const candidate of candidates) {
    if (seriesList.every(series => series.hasColumn(candidate))) return candidate;
  }
  return null;
}

/**
 * First candidate with a present value on the given row
 */
export function resolveRowValue(
  row: Readonly<Partial<Record<MetricName, number | null>>>,
  candidates: readonly MetricName[]
): number | null {
  for (const candidate of candidates) {
    const value = row[candidate];
    if (value !== null && value !== undefined) return value;
  }
  return null;
}
