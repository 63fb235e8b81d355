/**
 * Core module exports: shared types, the series store, column resolution
 */

export * from './types.js';

export { InvalidInputError } from './errors.js';

export {
  ISO_DATE_FORMAT,
  INPUT_DATE_FORMATS,
  MetricNameSchema,
  WeatherSeries,
  normalizeDate,
  parseMetricName,
  type DailyRecordInput,
} from './series.js';

export {
  TEMPERATURE_COLUMNS,
  MEAN_TEMPERATURE_COLUMNS,
  WIND_COLUMNS,
  resolveColumn,
  resolveSharedColumn,
  resolveRowValue,
} from './columns.js';
