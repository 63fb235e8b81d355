/**
 * Weather Series Store
 *
 * Immutable, date-unique table of daily weather records. Built once per
 * analysis from caller-supplied records; every analysis component reads it
 * and none of them mutates it.
 */

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { METRIC_NAMES, type DailyRecord, type DateRange, type MetricName } from './types.js';

dayjs.extend(customParseFormat);

// =============================================================================
// DATES
// =============================================================================

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';

// Accepted input formats, tried in order with strict parsing
export const INPUT_DATE_FORMATS = ['YYYY-MM-DD', 'DD/MM/YYYY', 'DD-MM-YYYY', 'YYYY/MM/DD'];

/**
 * Normalise a caller date to YYYY-MM-DD. Throws on anything that is not a
 * real calendar date in one of the accepted formats.
 */
export function normalizeDate(input: string | Date): string {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidInputError('Invalid Date object');
    }
    return dayjs(input).format(ISO_DATE_FORMAT);
  }

  const parsed = dayjs(input.trim(), INPUT_DATE_FORMATS, true);
  if (!parsed.isValid()) {
    throw new InvalidInputError(`Malformed date "${input}"`, [
      `expected one of ${INPUT_DATE_FORMATS.join(', ')}`,
    ]);
  }
  return parsed.format(ISO_DATE_FORMAT);
}

// =============================================================================
// INPUT VALIDATION
// =============================================================================

// NaN from numeric pipelines is treated as a missing value
const MetricValueSchema = z.preprocess(
  value => (typeof value === 'number' && Number.isNaN(value) ? null : value),
  z.number().finite().nullable().optional()
);

const DailyRecordInputSchema = z.object({
  date: z.union([z.string().min(1), z.date()]),
  temp_max: MetricValueSchema,
  temp_min: MetricValueSchema,
  temp_mean: MetricValueSchema,
  precipitation: MetricValueSchema,
  wind_speed_max: MetricValueSchema,
  humidity: MetricValueSchema,
  pressure: MetricValueSchema,
  temperature: MetricValueSchema,
  wind_speed: MetricValueSchema,
});

export type DailyRecordInput = z.input<typeof DailyRecordInputSchema>;

const SeriesInputSchema = z.array(DailyRecordInputSchema);

function toDailyRecord(input: z.output<typeof DailyRecordInputSchema>): DailyRecord {
  const { date, ...metrics } = input;
  const record: DailyRecord = { date: normalizeDate(date) };

  for (const [key, value] of Object.entries(metrics)) {
    if (value === undefined) continue;
    const metric = MetricNameSchema.parse(key);
    record[metric] = value;
  }

  return record;
}

// =============================================================================
// METRIC NAMES
// =============================================================================

export const MetricNameSchema = z.enum(METRIC_NAMES);

/**
 * Validate a metric name coming from outside the type system (CLI, JSON)
 */
export function parseMetricName(name: string): MetricName {
  const result = MetricNameSchema.safeParse(name);
  if (!result.success) {
    throw new InvalidInputError(`Unknown metric "${name}"`, [
      `expected one of ${MetricNameSchema.options.join(', ')}`,
    ]);
  }
  return result.data;
}

// =============================================================================
// SERIES
// =============================================================================

function compareDates(a: DailyRecord, b: DailyRecord): number {
  if (a.date < b.date) return -1;
  if (a.date > b.date) return 1;
  return 0;
}

export class WeatherSeries {
  readonly rows: readonly Readonly<DailyRecord>[];

  private constructor(rows: DailyRecord[]) {
    this.rows = Object.freeze(rows.map(row => Object.freeze({ ...row })));
  }

  /**
   * Build a series from untrusted records. Row order is kept as given.
   */
  static from(input: unknown): WeatherSeries {
    const parsed = SeriesInputSchema.safeParse(input);
    if (!parsed.success) {
      throw InvalidInputError.fromZod('Invalid weather records', parsed.error);
    }

    const rows = parsed.data.map(toDailyRecord);

    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const row of rows) {
      if (seen.has(row.date)) duplicates.add(row.date);
      seen.add(row.date);
    }
    if (duplicates.size > 0) {
      throw new InvalidInputError('Duplicate dates in weather records', [...duplicates]);
    }

    return new WeatherSeries(rows);
  }

  static empty(): WeatherSeries {
    return new WeatherSeries([]);
  }

  get length(): number {
    return this.rows.length;
  }

  get isEmpty(): boolean {
    return this.rows.length === 0;
  }

  /**
   * True when any row carries the column, even if every value is missing
   */
  hasColumn(metric: MetricName): boolean {
    return this.rows.some(row => row[metric] !== undefined);
  }

  /**
   * Values aligned with rows; missing values are null
   */
  column(metric: MetricName): Array<number | null> {
    return this.rows.map(row => row[metric] ?? null);
  }

  /**
   * Present values only, in row order
   */
  values(metric: MetricName): number[] {
    const values: number[] = [];
    for (const row of this.rows) {
      const value = row[metric];
      if (value !== null && value !== undefined) values.push(value);
    }
    return values;
  }

  sortedByDate(): WeatherSeries {
    return new WeatherSeries([...this.rows].sort(compareDates));
  }

  /**
   * Rows whose date falls in [start, end], inclusive, in current order
   */
  between(start: string | Date, end: string | Date): WeatherSeries {
    const from = normalizeDate(start);
    const to = normalizeDate(end);
    if (from > to) {
      throw new InvalidInputError(`Date range start ${from} is after end ${to}`);
    }
    return new WeatherSeries(this.rows.filter(row => row.date >= from && row.date <= to));
  }

  dateRange(): DateRange | null {
    if (this.rows.length === 0) return null;
    let start = this.rows[0].date;
    let end = start;
    for (const row of this.rows) {
      if (row.date < start) start = row.date;
      if (row.date > end) end = row.date;
    }
    return { start, end };
  }

  latest(): Readonly<DailyRecord> | null {
    let latest: Readonly<DailyRecord> | null = null;
    for (const row of this.rows) {
      if (latest === null || row.date > latest.date) latest = row;
    }
    return latest;
  }
}
