/**
 * Monthly aggregates and period comparison
 */

import dayjs from 'dayjs';
import { TEMPERATURE_COLUMNS, resolveSharedColumn } from '../core/columns.js';
import type { WeatherSeries } from '../core/series.js';
import type { DailyRecord, MetricDifference, MonthlyAggregate, PeriodComparison } from '../core/types.js';
import { roundTo } from '../utils/index.js';
import { mean } from './statistics.js';

// =============================================================================
// MONTHLY AGGREGATES
// =============================================================================

function present(values: ReadonlyArray<number | null | undefined>): number[] {
  return values.filter((v): v is number => v !== null && v !== undefined);
}

/**
 * Daily mean temperature: temp_mean when the series has it, otherwise the
 * midpoint of temp_max and temp_min on days that have both
 */
function dailyMeanTemperature(row: Readonly<DailyRecord>, hasMeanColumn: boolean): number | null {
  if (hasMeanColumn) return row.temp_mean ?? null;
  const { temp_max: high, temp_min: low } = row;
  if (high === null || high === undefined || low === null || low === undefined) return null;
  return (high + low) / 2;
}

/**
 * One entry per calendar month (YYYY-MM), ascending. A field is left out when
 * the month has no value for its source column.
 */
export function computeMonthlyAggregates(series: WeatherSeries): MonthlyAggregate[] {
  if (series.isEmpty) return [];

  const hasMeanColumn = series.hasColumn('temp_mean');
  const months = new Map<string, Readonly<DailyRecord>[]>();
  for (const row of series.sortedByDate().rows) {
    const month = dayjs(row.date).format('YYYY-MM');
    const rows = months.get(month) ?? [];
    rows.push(row);
    months.set(month, rows);
  }

  const aggregates: MonthlyAggregate[] = [];
  for (const [month, rows] of months) {
    const aggregate: MonthlyAggregate = { month };

    const means = present(rows.map(r => dailyMeanTemperature(r, hasMeanColumn)));
    if (means.length > 0) aggregate.tempMean = roundTo(mean(means));

    const highs = present(rows.map(r => r.temp_max));
    if (highs.length > 0) aggregate.tempMax = roundTo(Math.max(...highs));

    const lows = present(rows.map(r => r.temp_min));
    if (lows.length > 0) aggregate.tempMin = roundTo(Math.min(...lows));

    const rain = present(rows.map(r => r.precipitation));
    if (rain.length > 0) {
      aggregate.precipitationSum = roundTo(rain.reduce((sum, v) => sum + v, 0));
      aggregate.rainyDays = rain.filter(v => v > 0).length;
    }

    const wind = present(rows.map(r => r.wind_speed_max));
    if (wind.length > 0) aggregate.windSpeedMean = roundTo(mean(wind));

    aggregates.push(aggregate);
  }

  return aggregates;
}

// =============================================================================
// PERIOD COMPARISON
// =============================================================================

function describeChange(difference: number, unit: string): string {
  const rounded = roundTo(difference);
  if (rounded > 0) return `Up ${rounded.toFixed(1)}${unit}`;
  if (rounded < 0) return `Down ${Math.abs(rounded).toFixed(1)}${unit}`;
  return 'No change';
}

function difference(first: number, second: number, unit: string): MetricDifference {
  const diff = second - first;
  return {
    first: roundTo(first),
    second: roundTo(second),
    difference: roundTo(diff),
    changeDescription: describeChange(diff, unit),
  };
}

/**
 * Compare mean temperature and total precipitation of two periods
 * (second minus first)
 */
export function comparePeriods(
  first: WeatherSeries,
  second: WeatherSeries,
  firstName: string,
  secondName: string
): PeriodComparison {
  const comparison: PeriodComparison = { firstPeriod: firstName, secondPeriod: secondName };

  const temperatureColumn = resolveSharedColumn([first, second], TEMPERATURE_COLUMNS);
  if (temperatureColumn) {
    const a = first.values(temperatureColumn);
    const b = second.values(temperatureColumn);
    if (a.length > 0 && b.length > 0) {
      comparison.temperature = difference(mean(a), mean(b), '°C');
    }
  }

  const rainA = first.values('precipitation');
  const rainB = second.values('precipitation');
  if (rainA.length > 0 && rainB.length > 0) {
    const total = (values: number[]) => values.reduce((sum, v) => sum + v, 0);
    comparison.precipitation = difference(total(rainA), total(rainB), 'mm');
  }

  return comparison;
}
