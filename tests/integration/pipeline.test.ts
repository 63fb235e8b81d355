/**
 * Analysis Pipeline Integration Tests
 *
 * Runs every component over one month of data and checks that the pipeline
 * output agrees with the components called on their own.
 */

import { describe, it, expect } from 'vitest';
import { analyzeSeries } from '../../src/pipeline.js';
import { computeStatistics } from '../../src/analysis/statistics.js';
import { detectAnomalies } from '../../src/analysis/anomalies.js';
import { generateAlerts } from '../../src/analysis/alerts.js';
import { generateReport } from '../../src/output/reports.js';
import { ALERT_THRESHOLD_PROFILES } from '../../src/config.js';
import { WeatherSeries } from '../../src/core/series.js';
import { buildSeries } from '../helpers.js';

function month(): WeatherSeries {
  return buildSeries(
    {
      temp_max: Array.from({ length: 30 }, (_, i) => (i === 15 ? 39 : 30 + (i % 3))),
      temp_min: Array.from({ length: 30 }, (_, i) => 22 + (i % 2)),
      temp_mean: Array.from({ length: 30 }, (_, i) => (i === 15 ? 34 : 26 + (i % 3))),
      precipitation: Array.from({ length: 30 }, (_, i) => (i % 4 === 0 ? 6 : i === 9 ? null : 0)),
      humidity: Array.from({ length: 30 }, (_, i) => 55 + (i % 5) * 5),
      wind_speed_max: Array.from({ length: 30 }, (_, i) => 10 + (i % 7)),
    },
    '2024-06-01'
  );
}

describe('analyzeSeries', () => {
  it('should agree with the individual components', () => {
    const series = month();

    const analysis = analyzeSeries(series, { locationName: 'Hanoi', reportType: 'monthly' });

    expect(analysis.location).toBe('Hanoi');
    expect(analysis.reportType).toBe('monthly');
    expect(analysis.days).toBe(30);
    expect(analysis.statistics).toEqual(computeStatistics(series, 'temp_mean'));
    expect(analysis.anomalies).toEqual(detectAnomalies(series));
    expect(analysis.alerts).toEqual(generateAlerts(series));
    expect(analysis.report).toBe(generateReport(series, 'Hanoi', 'monthly'));
    expect(analysis.trend).toHaveLength(30);
    expect(analysis.monthly).toHaveLength(1);
  });

  it('should find the hot day as an anomaly and an alert', () => {
    const analysis = analyzeSeries(month());

    expect(analysis.anomalies.map(a => a.date)).toEqual(['2024-06-16']);
    expect(analysis.alerts[0]).toMatchObject({ category: 'heat', severity: 'danger', value: 39, count: 1 });
  });

  it('should be deterministic and leave the series untouched', () => {
    const series = month();
    const before = series.rows.map(row => ({ ...row }));

    const first = analyzeSeries(series);
    const second = analyzeSeries(series);

    expect(first).toEqual(second);
    expect(series.rows).toEqual(before);
  });

  it('should pass thresholds and metric options through', () => {
    const analysis = analyzeSeries(month(), {
      metric: 'temp_max',
      thresholds: ALERT_THRESHOLD_PROFILES.tropical,
      trendWindow: 3,
    });

    expect(analysis.metric).toBe('temp_max');
    expect(analysis.statistics.temperature?.max).toBe(39);
    expect(analysis.alerts[0]?.severity).toBe('warning');
    expect(analysis.trend[1]?.movingAverage).toBe(31);
  });

  it('should fall back to a weekly report for an unknown type', () => {
    expect(analyzeSeries(month(), { reportType: 'yearly' }).reportType).toBe('weekly');
  });

  it('should handle an empty series', () => {
    const analysis = analyzeSeries(WeatherSeries.empty());

    expect(analysis.statistics).toEqual({});
    expect(analysis.alerts).toEqual([]);
    expect(analysis.report).toBe('No data available to generate a report.');
  });
});
