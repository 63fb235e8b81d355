/**
 * Pattern Detector Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { countStreakDays, detectPatterns, seasonOf, seasonalMeans } from '../../../src/analysis/patterns.js';
import { WeatherSeries } from '../../../src/core/series.js';
import { buildSeries } from '../../helpers.js';

describe('countStreakDays', () => {
  const isDry = (v: number) => v === 0;
  const isHot = (v: number) => v > 35;

  it('should count a five-day dry run as one day', () => {
    expect(countStreakDays([0, 0, 0, 0, 0], isDry, 5)).toBe(1);
  });

  it('should count a six-day dry run as two days', () => {
    expect(countStreakDays([0, 0, 0, 0, 0, 0], isDry, 5)).toBe(2);
  });

  it('should count a three-day heat run as one day', () => {
    expect(countStreakDays([36, 36, 36, 30], isHot, 3)).toBe(1);
  });

  it('should reset on a break', () => {
    expect(countStreakDays([36, 36, 30, 36, 36], isHot, 3)).toBe(0);
  });
});

describe('detectPatterns', () => {
  it('should need at least seven rows', () => {
    const series = buildSeries({ temp_max: [30, 31, 32, 33, 34, 35] });

    expect(detectPatterns(series)).toEqual({});
  });

  it('should describe temperature and precipitation patterns', () => {
    const series = buildSeries({
      temp_max: [30, 31, 32, 33, 34, 35, 36],
      precipitation: [0, 0, 0, 0, 0, 0, 1],
    });

    expect(detectPatterns(series)).toEqual({
      temperature: { trend: 'increasing', trendSlope: 1, heatWaveDays: 0, volatility: 'low' },
      precipitation: { drySpellDays: 2, wetSpellDays: 0, consistency: 'consistent' },
    });
  });

  it('should skip missing days inside a streak', () => {
    const series = buildSeries({ temp_max: [36, 36, null, 36, 20, 20, 20, 20] });

    expect(detectPatterns(series).temperature?.heatWaveDays).toBe(1);
  });

  it('should follow date order rather than row order', () => {
    const series = WeatherSeries.from(
      [10, 11, 12, 13, 14, 15, 16].map((temp, i) => ({ date: `2024-07-0${7 - i}`, temp_max: temp }))
    );

    expect(detectPatterns(series).temperature?.trend).toBe('decreasing');
  });

  it('should flag high volatility', () => {
    const series = buildSeries({ temp_max: [10, 30, 10, 30, 10, 30, 10] });

    expect(detectPatterns(series).temperature?.volatility).toBe('high');
  });

  it('should omit precipitation without the column', () => {
    const series = buildSeries({ temp_max: [20, 20, 20, 20, 20, 20, 20] });

    expect(detectPatterns(series)).not.toHaveProperty('precipitation');
  });
});

describe('seasons', () => {
  it('should map months to meteorological seasons', () => {
    expect(seasonOf('2024-01-15')).toBe('winter');
    expect(seasonOf('2024-12-01')).toBe('winter');
    expect(seasonOf('2024-03-01')).toBe('spring');
    expect(seasonOf('2024-06-30')).toBe('summer');
    expect(seasonOf('2024-11-30')).toBe('autumn');
  });

  it('should list seasonal means in calendar order', () => {
    const series = WeatherSeries.from([
      { date: '2024-07-01', temp_mean: 30 },
      { date: '2024-07-02', temp_mean: 32 },
      { date: '2024-01-10', temp_mean: 10 },
      { date: '2024-04-10', temp_mean: null },
    ]);

    expect(seasonalMeans(series, 'temp_mean')).toEqual([
      { season: 'winter', mean: 10, days: 1 },
      { season: 'summer', mean: 31, days: 2 },
    ]);
  });
});
