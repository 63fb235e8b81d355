/**
 * Climate Index Calculator
 *
 * Composite indices from one or more metrics: temperature indices,
 * precipitation indices and a temperature/humidity comfort score.
 */

import { TEMPERATURE_COLUMNS, resolveColumn } from '../core/columns.js';
import type { WeatherSeries } from '../core/series.js';
import type {
  ClimateIndices,
  ComfortIndex,
  ComfortLevel,
  MetricName,
  PrecipitationIndices,
  TemperatureIndices,
} from '../core/types.js';
import { logger, roundTo } from '../utils/index.js';
import { mean, summarize } from './statistics.js';

const HOT_DAY_TEMP = 30;
const COOL_DAY_TEMP = 20;
const HIGH_INTENSITY_MEAN_RAIN = 5;   // mm per day, all days

// =============================================================================
// COMFORT
// =============================================================================

/**
 * 100 inside the ideal band, 75 inside the acceptable band, else 50
 */
export function scoreComfort(temp: number, humidity: number): 100 | 75 | 50 {
  if (temp >= 18 && temp <= 26 && humidity >= 40 && humidity <= 60) return 100;
  if (temp >= 15 && temp <= 30 && humidity >= 30 && humidity <= 70) return 75;
  return 50;
}

export function comfortLevelFor(score: number): ComfortLevel {
  if (score >= 90) return 'very comfortable';
  if (score >= 75) return 'comfortable';
  if (score >= 60) return 'fairly comfortable';
  if (score >= 40) return 'uncomfortable';
  return 'very uncomfortable';
}

/**
 * Days need both temperature and humidity; a day missing either is skipped
 */
function computeComfort(series: WeatherSeries, temperatureColumn: MetricName): ComfortIndex | undefined {
  const scores: number[] = [];
  for (const row of series.rows) {
    const temp = row[temperatureColumn];
    const humidity = row.humidity;
    if (temp === null || temp === undefined || humidity === null || humidity === undefined) continue;
    scores.push(scoreComfort(temp, humidity));
  }

  if (scores.length === 0) return undefined;

  const average = mean(scores);
  return {
    comfortScore: roundTo(average),
    comfortLevel: comfortLevelFor(average),
    comfortableDays: scores.filter(s => s === 100).length,
  };
}

// =============================================================================
// TEMPERATURE & PRECIPITATION
// =============================================================================

function computeTemperatureIndices(values: readonly number[]): TemperatureIndices | undefined {
  const summary = summarize(values);
  if (!summary) return undefined;

  const indices: TemperatureIndices = {
    meanTemp: roundTo(summary.mean),
    tempRange: roundTo(summary.max - summary.min),
    hotDays: values.filter(v => v > HOT_DAY_TEMP).length,
    coolDays: values.filter(v => v < COOL_DAY_TEMP).length,
  };
  if (summary.std !== undefined) indices.tempVariability = roundTo(summary.std);
  return indices;
}

function computePrecipitationIndices(values: readonly number[]): PrecipitationIndices | undefined {
  const summary = summarize(values);
  if (!summary) return undefined;

  const rainy = values.filter(v => v > 0);
  return {
    totalPrecipitation: roundTo(summary.sum),
    rainyDays: rainy.length,
    dryDays: values.filter(v => v === 0).length,
    averageRainPerRainyDay: rainy.length > 0 ? roundTo(mean(rainy)) : 0,
    maxDailyRain: roundTo(summary.max),
    intensity: summary.mean > HIGH_INTENSITY_MEAN_RAIN ? 'high' : 'low',
  };
}

// =============================================================================
// CALCULATOR
// =============================================================================

export function computeIndices(series: WeatherSeries): ClimateIndices {
  const indices: ClimateIndices = {};
  if (series.isEmpty) return indices;

  const temperatureColumn = resolveColumn(series, TEMPERATURE_COLUMNS);
  if (temperatureColumn) {
    const temperature = computeTemperatureIndices(series.values(temperatureColumn));
    if (temperature) indices.temperature = temperature;
  } else {
    logger.debug('Climate indices: no temperature column');
  }

  const precipitation = computePrecipitationIndices(series.values('precipitation'));
  if (precipitation) indices.precipitation = precipitation;

  if (temperatureColumn && series.hasColumn('humidity')) {
    const comfort = computeComfort(series, temperatureColumn);
    if (comfort) indices.comfort = comfort;
  }

  return indices;
}
