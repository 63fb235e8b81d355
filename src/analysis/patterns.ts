/**
 * Pattern Detector
 *
 * Streak-based patterns (heat waves, dry and wet spells) and calendar-season
 * buckets. A streak counts the days that are the Nth-or-later of their run:
 * a 5-day run above 35°C contributes 3 heat-wave days, not 5.
 */

import dayjs from 'dayjs';
import { TEMPERATURE_COLUMNS, resolveColumn } from '../core/columns.js';
import { parseMetricName, type WeatherSeries } from '../core/series.js';
import type {
  MetricName,
  PrecipitationPattern,
  Season,
  SeasonalMean,
  TemperaturePattern,
  WeatherPatterns,
} from '../core/types.js';
import { logger, roundTo } from '../utils/index.js';
import { mean, sampleStd } from './statistics.js';
import { classifySlope, fitLinearTrend } from './trends.js';

export const MIN_PATTERN_ROWS = 7;

const HEAT_WAVE_TEMP = 35;
const HEAT_WAVE_MIN_RUN = 3;
const DRY_SPELL_MIN_RUN = 5;
const WET_SPELL_MIN_RUN = 3;
const HIGH_VOLATILITY_STD = 5;
const CONSISTENT_RAIN_STD = 10;

// =============================================================================
// STREAKS
// =============================================================================

/**
 * Number of values that sit at position `minRun` or later inside a run of
 * consecutive values matching the predicate
 */
export function countStreakDays(
  values: readonly number[],
  predicate: (value: number) => boolean,
  minRun: number
): number {
  let days = 0;
  let streak = 0;
  for (const value of values) {
    if (predicate(value)) {
      streak++;
      if (streak >= minRun) days++;
    } else {
      streak = 0;
    }
  }
  return days;
}

function detectTemperaturePattern(values: readonly number[]): TemperaturePattern {
  const slope = fitLinearTrend(values);
  const std = sampleStd(values) ?? 0;

  return {
    trend: classifySlope(slope),
    trendSlope: roundTo(slope, 3),
    heatWaveDays: countStreakDays(values, v => v > HEAT_WAVE_TEMP, HEAT_WAVE_MIN_RUN),
    volatility: std > HIGH_VOLATILITY_STD ? 'high' : 'low',
  };
}

function detectPrecipitationPattern(values: readonly number[]): PrecipitationPattern {
  const std = sampleStd(values) ?? 0;

  return {
    drySpellDays: countStreakDays(values, v => v === 0, DRY_SPELL_MIN_RUN),
    wetSpellDays: countStreakDays(values, v => v > 0, WET_SPELL_MIN_RUN),
    consistency: std < CONSISTENT_RAIN_STD ? 'consistent' : 'inconsistent',
  };
}

/**
 * Streaks run over present values in date order; a missing day is skipped
 * rather than breaking or extending a run
 */
export function detectPatterns(series: WeatherSeries): WeatherPatterns {
  const patterns: WeatherPatterns = {};

  if (series.length < MIN_PATTERN_ROWS) {
    logger.debug(`Pattern detection skipped: ${series.length} rows, need ${MIN_PATTERN_ROWS}`);
    return patterns;
  }

  const sorted = series.sortedByDate();

  const temperatureColumn = resolveColumn(sorted, TEMPERATURE_COLUMNS);
  if (temperatureColumn) {
    const temps = sorted.values(temperatureColumn);
    if (temps.length >= MIN_PATTERN_ROWS) {
      patterns.temperature = detectTemperaturePattern(temps);
    }
  }

  const rain = sorted.values('precipitation');
  if (rain.length >= MIN_PATTERN_ROWS) {
    patterns.precipitation = detectPrecipitationPattern(rain);
  }

  return patterns;
}

// =============================================================================
// SEASONS
// =============================================================================

export const SEASON_ORDER: readonly Season[] = ['winter', 'spring', 'summer', 'autumn'];

/**
 * Meteorological season of a YYYY-MM-DD date (winter = Dec-Feb)
 */
export function seasonOf(date: string): Season {
  const month = dayjs(date).month() + 1;
  if (month === 12 || month <= 2) return 'winter';
  if (month <= 5) return 'spring';
  if (month <= 8) return 'summer';
  return 'autumn';
}

/**
 * Mean of the metric per season, in calendar order, for seasons with data
 */
export function seasonalMeans(series: WeatherSeries, metric: MetricName): SeasonalMean[] {
  const column = parseMetricName(metric);
  const buckets = new Map<Season, number[]>();

  for (const row of series.rows) {
    const value = row[column];
    if (value === null || value === undefined) continue;
    const season = seasonOf(row.date);
    const bucket = buckets.get(season) ?? [];
    bucket.push(value);
    buckets.set(season, bucket);
  }

  const result: SeasonalMean[] = [];
  for (const season of SEASON_ORDER) {
    const values = buckets.get(season);
    if (values && values.length > 0) {
      result.push({ season, mean: mean(values), days: values.length });
    }
  }
  return result;
}
