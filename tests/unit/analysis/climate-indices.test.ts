/**
 * Climate Index Calculator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { comfortLevelFor, computeIndices, scoreComfort } from '../../../src/analysis/climate-indices.js';
import { WeatherSeries } from '../../../src/core/series.js';
import { buildSeries } from '../../helpers.js';

describe('scoreComfort', () => {
  it('should score the ideal band 100', () => {
    expect(scoreComfort(22, 50)).toBe(100);
  });

  it('should score the acceptable band 75', () => {
    expect(scoreComfort(17, 35)).toBe(75);
  });

  it('should score everything else 50', () => {
    expect(scoreComfort(5, 90)).toBe(50);
  });
});

describe('comfortLevelFor', () => {
  it('should map scores to levels', () => {
    expect(comfortLevelFor(100)).toBe('very comfortable');
    expect(comfortLevelFor(75)).toBe('comfortable');
    expect(comfortLevelFor(60)).toBe('fairly comfortable');
    expect(comfortLevelFor(50)).toBe('uncomfortable');
    expect(comfortLevelFor(39)).toBe('very uncomfortable');
  });
});

describe('computeIndices', () => {
  it('should compute all three index groups', () => {
    const series = buildSeries({
      temp_max: [22, 17, 5],
      humidity: [50, 35, 90],
      precipitation: [0, 4, 12],
    });

    expect(computeIndices(series)).toEqual({
      temperature: { meanTemp: 14.7, tempRange: 17, hotDays: 0, coolDays: 2, tempVariability: 8.7 },
      precipitation: {
        totalPrecipitation: 16,
        rainyDays: 2,
        dryDays: 1,
        averageRainPerRainyDay: 8,
        maxDailyRain: 12,
        intensity: 'high',
      },
      comfort: { comfortScore: 75, comfortLevel: 'comfortable', comfortableDays: 1 },
    });
  });

  it('should pair temperature and humidity by day', () => {
    const series = buildSeries({ temp_max: [22, 30], humidity: [50, null] });

    expect(computeIndices(series).comfort).toEqual({
      comfortScore: 100,
      comfortLevel: 'very comfortable',
      comfortableDays: 1,
    });
  });

  it('should omit comfort without humidity', () => {
    const series = buildSeries({ temp_max: [22, 30] });

    expect(computeIndices(series)).not.toHaveProperty('comfort');
  });

  it('should omit temperature-based groups without a temperature column', () => {
    const series = buildSeries({ humidity: [50], precipitation: [0] });

    const indices = computeIndices(series);

    expect(indices).not.toHaveProperty('temperature');
    expect(indices).not.toHaveProperty('comfort');
    expect(indices.precipitation?.intensity).toBe('low');
  });

  it('should return an empty object for an empty series', () => {
    expect(computeIndices(WeatherSeries.empty())).toEqual({});
  });
});
