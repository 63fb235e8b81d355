/**
 * Plain-text summary and structured overview of a weather series
 */

import type { WeatherSeries } from '../core/series.js';
import type { AlertThresholds, MetricName, WeatherOverview } from '../core/types.js';
import { ANALYSIS_DEFAULTS, DEFAULT_ALERT_THRESHOLDS } from '../config.js';
import { cleanLocationName, formatDayCount } from '../utils/index.js';
import { generateAlerts } from '../analysis/alerts.js';
import { computeIndices } from '../analysis/climate-indices.js';
import { computeStatistics, summarize } from '../analysis/statistics.js';

export const NO_DATA_SUMMARY = 'No data available for analysis.';

// =============================================================================
// SUMMARY
// =============================================================================

/**
 * One paragraph: temperature, rainfall, danger alerts, comfort
 */
export function summarizeWeather(
  series: WeatherSeries,
  locationName?: string,
  thresholds: Readonly<AlertThresholds> = DEFAULT_ALERT_THRESHOLDS
): string {
  if (series.isEmpty) return NO_DATA_SUMMARY;

  const place = locationName ? cleanLocationName(locationName) : 'this area';
  const { temperature, precipitation, comfort } = computeIndices(series);
  const parts: string[] = [];

  if (temperature) {
    parts.push(
      `The average temperature in ${place} is ${temperature.meanTemp.toFixed(1)}°C, ` +
        `with a range of ${temperature.tempRange.toFixed(1)}°C.`
    );
    if (temperature.hotDays > 0) {
      parts.push(`Hot days (>30°C): ${temperature.hotDays}.`);
    }
  }

  if (precipitation) {
    parts.push(
      `Total rainfall was ${precipitation.totalPrecipitation.toFixed(1)}mm ` +
        `over ${formatDayCount(precipitation.rainyDays)} of rain.`
    );
  }

  const danger = generateAlerts(series, thresholds).filter(a => a.severity === 'danger');
  if (danger.length > 0) {
    parts.push(`⚠️ Attention needed: ${danger.map(a => a.title).join(', ')}.`);
  }

  if (comfort) {
    parts.push(`Comfort level: ${comfort.comfortLevel} (${comfort.comfortScore.toFixed(1)}/100).`);
  }

  return parts.length > 0 ? parts.join(' ') : NO_DATA_SUMMARY;
}

// =============================================================================
// OVERVIEW
// =============================================================================

const HIGHLIGHT_HOT = 35;
const HIGHLIGHT_COLD = 15;
const HIGHLIGHT_RAIN_TOTAL = 100;

export function getWeatherOverview(
  series: WeatherSeries,
  locationName?: string,
  metric: MetricName = ANALYSIS_DEFAULTS.metric
): WeatherOverview {
  const range = series.dateRange();
  const statistics = computeStatistics(series, metric);
  const highlights: string[] = [];

  // Thresholds apply to unrounded values; the text prints the rounded ones
  const temps = summarize(series.values(metric));
  const rain = summarize(series.values('precipitation'));
  const { temperature, precipitation } = statistics;
  if (temperature && temps && temps.max > HIGHLIGHT_HOT) {
    highlights.push(`Hottest day reached ${temperature.max.toFixed(1)}°C`);
  }
  if (temperature && temps && temps.min < HIGHLIGHT_COLD) {
    highlights.push(`Coldest day fell to ${temperature.min.toFixed(1)}°C`);
  }
  if (precipitation && rain && rain.sum > HIGHLIGHT_RAIN_TOTAL) {
    highlights.push(
      `Total rainfall ${precipitation.total.toFixed(1)}mm over ${formatDayCount(precipitation.rainyDays)}`
    );
  }

  return {
    location: cleanLocationName(locationName),
    period: {
      start: range?.start ?? null,
      end: range?.end ?? null,
      totalDays: series.length,
    },
    statistics,
    highlights,
  };
}
