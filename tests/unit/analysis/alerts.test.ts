/**
 * Alert Engine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { generateAlerts, parseAlertThresholds } from '../../../src/analysis/alerts.js';
import { ALERT_THRESHOLD_PROFILES, DEFAULT_ALERT_THRESHOLDS } from '../../../src/config.js';
import { InvalidInputError } from '../../../src/core/errors.js';
import { WeatherSeries } from '../../../src/core/series.js';
import { buildSeries } from '../../helpers.js';

describe('generateAlerts', () => {
  describe('heat', () => {
    it('should raise a single danger alert for extreme heat', () => {
      const series = buildSeries({ temp_max: [39] });

      expect(generateAlerts(series)).toEqual([
        {
          category: 'heat',
          severity: 'danger',
          title: '🔥 Extreme heat warning',
          message: '1 day with temperature ≥ 38°C',
          metric: 'temp_max',
          value: 39,
          count: 1,
        },
      ]);
    });

    it('should fall back to a warning for high heat', () => {
      const series = buildSeries({ temp_max: [36, 35, 30] });

      const [alert] = generateAlerts(series);

      expect(alert?.severity).toBe('warning');
      expect(alert?.title).toBe('🌡️ Heat warning');
      expect(alert?.message).toBe('2 days with temperature ≥ 35°C');
      expect(alert?.value).toBe(36);
    });

    it('should prefer temp_max over temp_mean', () => {
      const series = WeatherSeries.from([{ date: '2024-07-01', temp_max: 39, temp_mean: 30 }]);

      expect(generateAlerts(series)[0]?.metric).toBe('temp_max');
    });
  });

  describe('cold', () => {
    it('should raise an info alert for cool days', () => {
      const series = buildSeries({ temp_mean: [12, 14, 20] });

      const [alert] = generateAlerts(series);

      expect(alert).toMatchObject({
        category: 'cold',
        severity: 'info',
        message: '2 days with temperature ≤ 15°C',
        value: 12,
        count: 2,
      });
    });

    it('should escalate to danger at extreme cold', () => {
      const series = buildSeries({ temp_mean: [4, 14] });

      expect(generateAlerts(series)[0]?.severity).toBe('danger');
    });
  });

  describe('precipitation and wind', () => {
    it('should warn on heavy rain and escalate on very heavy rain', () => {
      expect(generateAlerts(buildSeries({ precipitation: [60, 0] }))[0]?.severity).toBe('warning');

      const [alert] = generateAlerts(buildSeries({ precipitation: [120, 55, 3] }));
      expect(alert).toMatchObject({
        category: 'precipitation',
        severity: 'danger',
        message: '2 days with rainfall ≥ 50mm',
        value: 120,
        count: 2,
      });
    });

    it('should read wind from the observation column', () => {
      const [alert] = generateAlerts(buildSeries({ wind_speed: [30, 10] }));

      expect(alert).toMatchObject({
        category: 'wind',
        severity: 'warning',
        message: '1 day with wind ≥ 25km/h',
        metric: 'wind_speed',
      });
    });
  });

  it('should order alerts heat, cold, precipitation, wind', () => {
    const series = buildSeries({
      temp_max: [39, 3],
      precipitation: [0, 110],
      wind_speed_max: [45, 5],
    });

    expect(generateAlerts(series).map(a => a.category)).toEqual(['heat', 'cold', 'precipitation', 'wind']);
  });

  it('should return nothing for an empty series or calm weather', () => {
    expect(generateAlerts(WeatherSeries.empty())).toEqual([]);
    expect(generateAlerts(buildSeries({ temp_max: [25], precipitation: [2] }))).toEqual([]);
  });

  it('should apply a regional profile', () => {
    const series = buildSeries({ temp_max: [39] });

    const [alert] = generateAlerts(series, ALERT_THRESHOLD_PROFILES.tropical);

    expect(alert?.severity).toBe('warning');
    expect(alert?.message).toBe('1 day with temperature ≥ 37°C');
  });
});

describe('parseAlertThresholds', () => {
  it('should return a frozen copy', () => {
    const thresholds = parseAlertThresholds({ ...DEFAULT_ALERT_THRESHOLDS });

    expect(thresholds).toEqual(DEFAULT_ALERT_THRESHOLDS);
    expect(Object.isFrozen(thresholds)).toBe(true);
  });

  it('should reject inverted levels', () => {
    expect(() => parseAlertThresholds({ ...DEFAULT_ALERT_THRESHOLDS, highHeat: 40 })).toThrow(
      'highHeat must be below extremeHeat'
    );
  });

  it('should reject missing fields', () => {
    expect(() => parseAlertThresholds({ extremeHeat: 38 })).toThrow(InvalidInputError);
  });

  it('should validate thresholds passed to generateAlerts', () => {
    const series = buildSeries({ temp_max: [39] });

    expect(() => generateAlerts(series, { ...DEFAULT_ALERT_THRESHOLDS, heavyRain: 200 })).toThrow(InvalidInputError);
  });
});
