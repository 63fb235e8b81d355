/**
 * Z-score anomaly detection
 *
 * A row is anomalous when |value - mean| / std exceeds the threshold, with the
 * mean and sample std taken over the present values of the metric.
 */

import { InvalidInputError } from '../core/errors.js';
import { parseMetricName, type WeatherSeries } from '../core/series.js';
import type { AnomalyRecord, MetricName } from '../core/types.js';
import { ANALYSIS_DEFAULTS } from '../config.js';
import { logger } from '../utils/index.js';
import { mean, sampleStd } from './statistics.js';

// Below this many present values the z-score is not meaningful
export const MIN_ANOMALY_SAMPLE = 10;

export function detectAnomalies(
  series: WeatherSeries,
  metric: MetricName = ANALYSIS_DEFAULTS.metric,
  thresholdZ: number = ANALYSIS_DEFAULTS.anomalyThreshold
): AnomalyRecord[] {
  const column = parseMetricName(metric);
  if (!Number.isFinite(thresholdZ) || thresholdZ <= 0) {
    throw new InvalidInputError(`Anomaly threshold must be a positive number (got ${thresholdZ})`);
  }

  const values = series.values(column);
  if (values.length < MIN_ANOMALY_SAMPLE) {
    logger.debug(`Anomaly detection skipped: ${values.length} values for ${column}, need ${MIN_ANOMALY_SAMPLE}`);
    return [];
  }

  const avg = mean(values);
  const std = sampleStd(values);
  if (std === undefined || std === 0) {
    logger.debug(`Anomaly detection skipped: ${column} has zero variance`);
    return [];
  }

  const anomalies: AnomalyRecord[] = [];
  for (const row of series.rows) {
    const value = row[column];
    if (value === null || value === undefined) continue;

    const zScore = Math.abs(value - avg) / std;
    if (zScore > thresholdZ) {
      anomalies.push({ ...row, zScore });
    }
  }

  if (anomalies.length > 0) {
    logger.info(`Found ${anomalies.length} anomalies in ${column}`);
  }

  return anomalies;
}
