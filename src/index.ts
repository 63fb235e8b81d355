/**
 * Weather Insights
 *
 * Daily weather series analysis: statistics, anomalies, trends, alerts,
 * climate indices, patterns and Markdown reports.
 *
 * Usage:
 *   import { WeatherSeries, analyzeSeries } from 'weather-insights';
 *   const series = WeatherSeries.from(records);
 *   const { report } = analyzeSeries(series, { locationName: 'Hanoi', reportType: 'weekly' });
 */

export * from './core/index.js';
export * from './analysis/index.js';
export * from './output/index.js';
export { analyzeSeries, type AnalysisOptions, type WeatherAnalysis } from './pipeline.js';

export {
  LOG_LEVEL,
  DEFAULT_ALERT_THRESHOLDS,
  ALERT_THRESHOLD_PROFILES,
  ALERT_PROFILE,
  ANALYSIS_DEFAULTS,
  REPORT_DATE_FORMAT,
  REPORT_TIME_FORMAT,
  validateConfig,
  type AlertProfileName,
} from './config.js';

export {
  logger,
  roundTo,
  formatNumber,
  formatTemperature,
  formatPrecipitation,
  formatWindSpeed,
  formatDayCount,
  windDirectionText,
  describeWeather,
  cleanLocationName,
} from './utils/index.js';
