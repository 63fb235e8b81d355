/**
 * Analysis module exports
 */

export { mean, sampleStd, summarize, computeStatistics, type ValueSummary } from './statistics.js';

export { MIN_ANOMALY_SAMPLE, detectAnomalies } from './anomalies.js';

export { classifyDelta, classifySlope, fitLinearTrend, computeTrend } from './trends.js';

export { parseAlertThresholds, generateAlerts } from './alerts.js';

export { scoreComfort, comfortLevelFor, computeIndices } from './climate-indices.js';

export {
  MIN_PATTERN_ROWS,
  SEASON_ORDER,
  countStreakDays,
  detectPatterns,
  seasonOf,
  seasonalMeans,
} from './patterns.js';

export { computeMonthlyAggregates, comparePeriods } from './aggregates.js';
