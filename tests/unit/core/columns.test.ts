/**
 * Column Resolution Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  TEMPERATURE_COLUMNS,
  WIND_COLUMNS,
  resolveColumn,
  resolveRowValue,
  resolveSharedColumn,
} from '../../../src/core/columns.js';
import { WeatherSeries } from '../../../src/core/series.js';

describe('resolveColumn', () => {
  it('should prefer the first candidate present', () => {
    const series = WeatherSeries.from([{ date: '2024-07-01', temp_mean: 25, temp_max: 30 }]);
    expect(resolveColumn(series, TEMPERATURE_COLUMNS)).toBe('temp_max');
  });

  it('should fall back to observation-style columns', () => {
    const series = WeatherSeries.from([{ date: '2024-07-01', wind_speed: 12 }]);
    expect(resolveColumn(series, WIND_COLUMNS)).toBe('wind_speed');
  });

  it('should return null when no candidate is present', () => {
    const series = WeatherSeries.from([{ date: '2024-07-01', humidity: 60 }]);
    expect(resolveColumn(series, TEMPERATURE_COLUMNS)).toBeNull();
  });
});

describe('resolveSharedColumn', () => {
  it('should pick a column every series carries', () => {
    const a = WeatherSeries.from([{ date: '2024-07-01', temp_max: 30, temp_mean: 25 }]);
    const b = WeatherSeries.from([{ date: '2024-08-01', temp_mean: 26 }]);

    expect(resolveSharedColumn([a, b], TEMPERATURE_COLUMNS)).toBe('temp_mean');
  });
});

describe('resolveRowValue', () => {
  it('should skip candidates missing on the row', () => {
    expect(resolveRowValue({ temp_max: null, temp_mean: 24 }, TEMPERATURE_COLUMNS)).toBe(24);
    expect(resolveRowValue({ humidity: 60 }, TEMPERATURE_COLUMNS)).toBeNull();
  });
});
