/**
 * Weather Analysis Pipeline
 *
 * Runs every analysis component over one series:
 * 1. Descriptive statistics
 * 2. Anomalies
 * 3. Trend
 * 4. Alerts
 * 5. Climate indices
 * 6. Patterns
 * 7. Monthly aggregates
 * 8. Summary and report
 */

import type { WeatherSeries } from './core/series.js';
import type {
  AlertThresholds,
  AnomalyRecord,
  ClimateIndices,
  MetricName,
  MonthlyAggregate,
  ReportType,
  TrendRecord,
  WeatherAlert,
  WeatherPatterns,
  WeatherStatistics,
} from './core/types.js';
import { ANALYSIS_DEFAULTS, DEFAULT_ALERT_THRESHOLDS } from './config.js';
import { cleanLocationName, logger } from './utils/index.js';
import {
  computeStatistics,
  detectAnomalies,
  computeTrend,
  generateAlerts,
  computeIndices,
  detectPatterns,
  computeMonthlyAggregates,
} from './analysis/index.js';
import { generateReport, resolveReportType, summarizeWeather } from './output/index.js';

// =============================================================================
// OPTIONS & RESULT
// =============================================================================

export interface AnalysisOptions {
  locationName?: string;
  metric?: MetricName;
  reportType?: string;
  thresholds?: Readonly<AlertThresholds>;
  anomalyThreshold?: number;
  trendWindow?: number;
  generatedAt?: Date;
}

export interface WeatherAnalysis {
  location: string;
  metric: MetricName;
  reportType: ReportType;
  days: number;
  statistics: WeatherStatistics;
  anomalies: AnomalyRecord[];
  trend: TrendRecord[];
  alerts: WeatherAlert[];
  indices: ClimateIndices;
  patterns: WeatherPatterns;
  monthly: MonthlyAggregate[];
  summary: string;
  report: string;
}

// =============================================================================
// PIPELINE
// =============================================================================

export function analyzeSeries(series: WeatherSeries, options: AnalysisOptions = {}): WeatherAnalysis {
  const metric = options.metric ?? ANALYSIS_DEFAULTS.metric;
  const thresholds = options.thresholds ?? DEFAULT_ALERT_THRESHOLDS;
  const reportType = resolveReportType(options.reportType);
  const location = cleanLocationName(options.locationName);

  logger.debug(`Analyzing ${series.length} days for ${location} (metric ${metric})`);

  const statistics = computeStatistics(series, metric);
  const anomalies = detectAnomalies(series, metric, options.anomalyThreshold ?? ANALYSIS_DEFAULTS.anomalyThreshold);
  const trend = computeTrend(series, metric, options.trendWindow ?? ANALYSIS_DEFAULTS.trendWindow);
  const alerts = generateAlerts(series, thresholds);
  const indices = computeIndices(series);
  const patterns = detectPatterns(series);
  const monthly = computeMonthlyAggregates(series);

  const summary = summarizeWeather(series, options.locationName, thresholds);
  const report = generateReport(series, location, reportType, {
    thresholds,
    generatedAt: options.generatedAt,
  });

  logger.debug(`Analysis done: ${alerts.length} alerts, ${anomalies.length} anomalies`);

  return {
    location,
    metric,
    reportType,
    days: series.length,
    statistics,
    anomalies,
    trend,
    alerts,
    indices,
    patterns,
    monthly,
    summary,
    report,
  };
}
