/**
 * Trend Analyzer
 *
 * Two separate classifications live here and use different thresholds:
 * - per-point: the day-over-day delta, ±0.5 units
 * - whole-series: the least-squares slope, ±0.2 units per day
 */

import { InvalidInputError } from '../core/errors.js';
import { parseMetricName, type WeatherSeries } from '../core/series.js';
import type { MetricName, TrendLabel, TrendRecord } from '../core/types.js';
import { ANALYSIS_DEFAULTS } from '../config.js';
import { logger } from '../utils/index.js';
import { mean } from './statistics.js';

const DELTA_THRESHOLD = 0.5;
const SLOPE_THRESHOLD = 0.2;

export function classifyDelta(delta: number): TrendLabel {
  if (delta > DELTA_THRESHOLD) return 'increasing';
  if (delta < -DELTA_THRESHOLD) return 'decreasing';
  return 'stable';
}

export function classifySlope(slope: number): TrendLabel {
  if (slope > SLOPE_THRESHOLD) return 'increasing';
  if (slope < -SLOPE_THRESHOLD) return 'decreasing';
  return 'stable';
}

/**
 * Ordinary least-squares slope of values against their 0-based index
 * (units per day for a daily series)
 */
export function fitLinearTrend(values: readonly number[]): number {
  if (values.length < 2) {
    throw new InvalidInputError(`Linear trend needs at least 2 values (got ${values.length})`);
  }
  if (values.some(v => !Number.isFinite(v))) {
    throw new InvalidInputError('Linear trend values must be finite numbers');
  }

  const meanX = (values.length - 1) / 2;
  const meanY = mean(values);

  let numerator = 0;
  let denominator = 0;
  values.forEach((y, x) => {
    const dx = x - meanX;
    numerator += dx * (y - meanY);
    denominator += dx * dx;
  });

  return numerator / denominator;
}

/**
 * Centred rolling mean. The window spans `before` rows back and `after` rows
 * ahead; it must fit in the series and hold no missing value.
 */
function centeredMean(
  values: ReadonlyArray<number | null>,
  index: number,
  before: number,
  after: number
): number | undefined {
  const start = index - before;
  const end = index + after;
  if (start < 0 || end >= values.length) return undefined;

  let sum = 0;
  for (let i = start; i <= end; i++) {
    const value = values[i];
    if (value === null) return undefined;
    sum += value;
  }
  return sum / (end - start + 1);
}

/**
 * Rows sorted by date, each with a centred moving average, the delta from the
 * previous row and the delta's trend label
 */
export function computeTrend(
  series: WeatherSeries,
  metric: MetricName = ANALYSIS_DEFAULTS.metric,
  window: number = ANALYSIS_DEFAULTS.trendWindow
): TrendRecord[] {
  const column = parseMetricName(metric);
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidInputError(`Trend window must be a positive integer (got ${window})`);
  }

  const sorted = series.sortedByDate();
  if (!sorted.hasColumn(column)) {
    logger.debug(`Trend skipped: no ${column} column`);
    return sorted.rows.map((row): TrendRecord => ({ ...row, trendLabel: 'stable' }));
  }

  const values = sorted.column(column);
  const after = Math.floor((window - 1) / 2);
  const before = window - 1 - after;

  return sorted.rows.map((row, i) => {
    const record: TrendRecord = { ...row, trendLabel: 'stable' };

    const movingAverage = centeredMean(values, i, before, after);
    if (movingAverage !== undefined) record.movingAverage = movingAverage;

    const current = values[i];
    const previous = i > 0 ? values[i - 1] : null;
    if (current !== null && previous !== null) {
      record.delta = current - previous;
      record.trendLabel = classifyDelta(record.delta);
    }

    return record;
  });
}
