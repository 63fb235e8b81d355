/**
 * Output module exports
 */

export {
  NO_DATA_MESSAGE,
  REPORT_TEMPLATES,
  resolveReportType,
  generateReport,
  type ReportOptions,
} from './reports.js';

export { NO_DATA_SUMMARY, summarizeWeather, getWeatherOverview } from './summary.js';
