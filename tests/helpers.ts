/**
 * Fixture builders for weather series tests
 */

import dayjs from 'dayjs';
import { WeatherSeries } from '../src/core/series.js';
import type { MetricName } from '../src/core/types.js';

export function dateAt(offset: number, start: string = '2024-07-01'): string {
  return dayjs(start).add(offset, 'day').format('YYYY-MM-DD');
}

/**
 * Consecutive days starting at `start`, one column per metric
 */
export function buildSeries(
  columns: Partial<Record<MetricName, Array<number | null>>>,
  start: string = '2024-07-01'
): WeatherSeries {
  const length = Math.max(0, ...Object.values(columns).map(values => values?.length ?? 0));
  const records = Array.from({ length }, (_, i) => {
    const record: Record<string, string | number | null> = { date: dateAt(i, start) };
    for (const [metric, values] of Object.entries(columns)) {
      const value = values?.[i];
      if (value !== undefined) record[metric] = value;
    }
    return record;
  });
  return WeatherSeries.from(records);
}
