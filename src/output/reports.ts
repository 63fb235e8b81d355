/**
 * Narrative Report Generator
 *
 * Markdown reports built from the analysis components. Each report type maps
 * to one template function; unknown types fall back to the weekly report.
 * A block whose source column is absent is left out of the report entirely.
 */

import dayjs from 'dayjs';
import { z } from 'zod';
import { MEAN_TEMPERATURE_COLUMNS, WIND_COLUMNS, resolveColumn, resolveRowValue } from '../core/columns.js';
import type { WeatherSeries } from '../core/series.js';
import {
  REPORT_TYPES,
  type AlertThresholds,
  type MetricName,
  type ReportType,
  type WeatherAlert,
} from '../core/types.js';
import { DEFAULT_ALERT_THRESHOLDS, REPORT_DATE_FORMAT, REPORT_TIME_FORMAT } from '../config.js';
import {
  cleanLocationName,
  formatDayCount,
  formatPrecipitation,
  formatTemperature,
  formatWindSpeed,
  logger,
} from '../utils/index.js';
import { generateAlerts } from '../analysis/alerts.js';
import { computeIndices } from '../analysis/climate-indices.js';
import { detectPatterns, seasonalMeans } from '../analysis/patterns.js';
import { computeStatistics, summarize, type ValueSummary } from '../analysis/statistics.js';
import { fitLinearTrend } from '../analysis/trends.js';

export const NO_DATA_MESSAGE = 'No data available to generate a report.';

export interface ReportOptions {
  thresholds?: Readonly<AlertThresholds>;
  /** Appends a generation-time footer; omit for reproducible output */
  generatedAt?: Date;
}

interface ReportContext {
  series: WeatherSeries;           // Sorted by date, never empty
  location: string;
  thresholds: Readonly<AlertThresholds>;
}

type ReportTemplate = (context: ReportContext) => string[];

// =============================================================================
// SHARED BLOCKS
// =============================================================================

function formatDate(date: string): string {
  return dayjs(date).format(REPORT_DATE_FORMAT);
}

function periodLine(series: WeatherSeries): string {
  const range = series.dateRange();
  return range ? `**Period:** ${formatDate(range.start)} - ${formatDate(range.end)}` : '**Period:** N/A';
}

function formatAlertLine(alert: WeatherAlert): string {
  return `- **${alert.title}** (${alert.severity}): ${alert.message}`;
}

function pushSection(lines: string[], title: string, body: string[]): void {
  if (body.length === 0) return;
  lines.push('', `## ${title}`, '', ...body);
}

function pushAlerts(lines: string[], context: ReportContext): void {
  const alerts = generateAlerts(context.series, context.thresholds);
  pushSection(lines, '⚠️ Alerts', alerts.map(formatAlertLine));
}

interface BandInputs {
  temp: ValueSummary | null;
  rain: ValueSummary | null;
}

/**
 * Unrounded summaries for the commentary bands; printed figures come from
 * computeStatistics and are rounded
 */
function bandInputs(series: WeatherSeries, temperatureColumn: MetricName | null): BandInputs {
  return {
    temp: temperatureColumn ? summarize(series.values(temperatureColumn)) : null,
    rain: summarize(series.values('precipitation')),
  };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// =============================================================================
// TEMPLATES
// =============================================================================

const dailyTemplate: ReportTemplate = ({ series, location }) => {
  const lines = [`# 🌤️ Daily weather report - ${location}`];

  const latest = series.latest();
  if (!latest) return lines;
  lines.push('', `**Date:** ${formatDate(latest.date)}`);

  const temp = resolveRowValue(latest, MEAN_TEMPERATURE_COLUMNS);
  const humidity = latest.humidity ?? null;
  const precipitation = latest.precipitation ?? null;
  const wind = resolveRowValue(latest, WIND_COLUMNS);

  const readings: string[] = [];
  if (temp !== null) readings.push(`- **🌡️ Temperature:** ${formatTemperature(temp)}`);
  if (humidity !== null) readings.push(`- **💧 Humidity:** ${humidity.toFixed(0)}%`);
  if (precipitation !== null) readings.push(`- **🌧️ Precipitation:** ${formatPrecipitation(precipitation)}`);
  if (wind !== null) readings.push(`- **💨 Wind speed:** ${formatWindSpeed(wind)}`);
  pushSection(lines, '📊 Key readings', readings);

  const commentary: string[] = [];
  if (temp !== null) {
    if (temp >= 35) {
      commentary.push('⚠️ **Heat warning** - Very high temperature, limit time outdoors around midday.');
    } else if (temp <= 15) {
      commentary.push('❄️ **Cold weather** - Dress warmly when going out.');
    } else {
      commentary.push('😊 **Pleasant weather** - Good conditions for outdoor activities.');
    }
  }
  if (precipitation !== null && precipitation > 10) {
    commentary.push('🌧️ **Rain** - Take an umbrella when going out.');
  }
  pushSection(lines, '🔍 Commentary', commentary);

  return lines;
};

const weeklyTemplate: ReportTemplate = context => {
  const { series, location } = context;
  const lines = [`# 📈 Weekly weather report - ${location}`, '', periodLine(series)];

  const temperatureColumn = resolveColumn(series, MEAN_TEMPERATURE_COLUMNS);
  const stats = computeStatistics(series, temperatureColumn ?? 'temp_mean');
  const temp = temperatureColumn ? stats.temperature : undefined;
  const rain = stats.precipitation;
  const bands = bandInputs(series, temperatureColumn);

  if (temp || rain) lines.push('', '## 📊 Summary statistics');
  if (temp) {
    lines.push(
      '',
      '### 🌡️ Temperature',
      `- **Mean:** ${formatTemperature(temp.mean)}`,
      `- **Highest:** ${formatTemperature(temp.max)}`,
      `- **Lowest:** ${formatTemperature(temp.min)}`
    );
  }
  if (rain) {
    lines.push(
      '',
      '### 🌧️ Precipitation',
      `- **Total:** ${rain.total.toFixed(1)}mm`,
      `- **Rainy days:** ${formatDayCount(rain.rainyDays)}`
    );
  }

  const commentary: string[] = [];
  if (bands.temp) {
    if (bands.temp.mean > 30) commentary.push('🔥 **Hot week** - High average temperature.');
    else if (bands.temp.mean < 20) commentary.push('❄️ **Cold week** - Low average temperature.');
    else commentary.push('😊 **Mild weather** - Comfortable temperatures.');
  }
  if (bands.rain) {
    if (bands.rain.sum > 50) commentary.push('🌧️ **Wet week** - High rainfall.');
    else if (bands.rain.sum === 0) commentary.push('☀️ **Dry week** - No rain recorded.');
  }
  if (bands.temp && bands.temp.max - bands.temp.min > 15) {
    commentary.push('📊 **Large temperature swing** - Wide gap between the warmest and coolest days.');
  }
  pushSection(lines, '🔍 Trend analysis', commentary);

  pushAlerts(lines, context);
  return lines;
};

const monthlyTemplate: ReportTemplate = context => {
  const { series, location } = context;
  const lines = [`# 📅 Monthly weather report - ${location}`, '', periodLine(series)];

  const temperatureColumn = resolveColumn(series, MEAN_TEMPERATURE_COLUMNS);
  const stats = computeStatistics(series, temperatureColumn ?? 'temp_mean');
  const temp = temperatureColumn ? stats.temperature : undefined;
  const rain = stats.precipitation;
  const bands = bandInputs(series, temperatureColumn);
  const temps = temperatureColumn ? series.values(temperatureColumn) : [];
  const hotDays = temps.filter(v => v > 30).length;
  const coolDays = temps.filter(v => v < 20).length;

  if (temp || rain) lines.push('', '## 📊 Detailed statistics');
  if (temp) {
    lines.push(
      '',
      '### 🌡️ Temperature',
      `- **Monthly mean:** ${formatTemperature(temp.mean)}`,
      `- **Highest:** ${formatTemperature(temp.max)}`,
      `- **Lowest:** ${formatTemperature(temp.min)}`,
      `- **Hot days (>30°C):** ${formatDayCount(hotDays)}`,
      `- **Cool days (<20°C):** ${formatDayCount(coolDays)}`
    );
  }
  if (rain) {
    lines.push(
      '',
      '### 🌧️ Precipitation',
      `- **Total:** ${rain.total.toFixed(1)}mm`,
      `- **Rainy days:** ${formatDayCount(rain.rainyDays)}`,
      `- **Wettest day:** ${rain.max.toFixed(1)}mm`
    );
  }

  const commentary: string[] = [];
  if (rain) {
    const rainyRatio = rain.rainyDays / series.length;
    if (rainyRatio > 0.5) commentary.push('🌧️ **Rainy month** - More than half of the days had rain.');
    else if (rainyRatio < 0.1) commentary.push('☀️ **Dry month** - Few rainy days.');
  }
  if (bands.temp) {
    if (bands.temp.mean > 28) commentary.push('🔥 **Hot month** - High average temperature.');
    else if (bands.temp.mean < 18) commentary.push('❄️ **Cold month** - Low average temperature.');
  }
  if (hotDays > 10) {
    commentary.push('⚠️ **Heat warning** - Many hot days this month.');
  }
  pushSection(lines, '🔍 Overall assessment', commentary);

  const patterns = detectPatterns(series);
  const highlights: string[] = [];
  if (patterns.temperature) {
    const { trend, trendSlope, heatWaveDays } = patterns.temperature;
    highlights.push(`- **Temperature trend:** ${trend} (${trendSlope.toFixed(3)}°C/day)`);
    if (heatWaveDays > 0) highlights.push(`- **Heat-wave days:** ${formatDayCount(heatWaveDays)}`);
  }
  if (patterns.precipitation) {
    const { drySpellDays, wetSpellDays } = patterns.precipitation;
    if (drySpellDays > 0) highlights.push(`- **Dry-spell days:** ${formatDayCount(drySpellDays)}`);
    if (wetSpellDays > 0) highlights.push(`- **Wet-spell days:** ${formatDayCount(wetSpellDays)}`);
  }
  pushSection(lines, '🧭 Patterns', highlights);

  pushAlerts(lines, context);
  return lines;
};

// Seasonal means need a quarter of data; the trend needs more than a year
const SEASONAL_MIN_ROWS = 90;
const TREND_MIN_ROWS = 365;
const TREND_MIN_VALUES = 100;
const TREND_REPORT_THRESHOLD = 0.1;   // °C per year

const climateTemplate: ReportTemplate = ({ series, location }) => {
  const lines = [`# 🌍 Long-term climate report - ${location}`, '', periodLine(series)];

  const temperatureColumn = resolveColumn(series, MEAN_TEMPERATURE_COLUMNS);
  const stats = computeStatistics(series, temperatureColumn ?? 'temp_mean');
  const temp = temperatureColumn ? stats.temperature : undefined;
  const rain = stats.precipitation;
  const bands = bandInputs(series, temperatureColumn);
  const temps = temperatureColumn ? series.values(temperatureColumn) : [];
  const rainValues = series.values('precipitation');

  if (temp || rain) lines.push('', '## 📊 Climate characteristics');
  if (temp) {
    lines.push('', '### 🌡️ Temperature', `- **Mean temperature:** ${formatTemperature(temp.mean)}`);
    if (temp.std !== undefined) lines.push(`- **Variability:** ${formatTemperature(temp.std)}`);
    lines.push(
      `- **Extremely hot days (>35°C):** ${formatDayCount(temps.filter(v => v > 35).length)}`,
      `- **Extremely cold days (<10°C):** ${formatDayCount(temps.filter(v => v < 10).length)}`
    );
  }
  if (rain) {
    lines.push(
      '',
      '### 🌧️ Precipitation',
      `- **Total precipitation:** ${rain.total.toFixed(0)}mm`,
      `- **Dry days:** ${formatDayCount(rainValues.filter(v => v === 0).length)}`,
      `- **Heavy-rain days (>50mm):** ${formatDayCount(rainValues.filter(v => v > 50).length)}`
    );
  }

  if (temperatureColumn && series.length > SEASONAL_MIN_ROWS) {
    const seasons = seasonalMeans(series, temperatureColumn);
    if (seasons.length > 0) {
      lines.push('', '### 🍂 Seasonal analysis');
      for (const { season, mean } of seasons) {
        lines.push(`- **${capitalize(season)}:** ${formatTemperature(mean)}`);
      }
    }
  }

  const comfort = computeIndices(series).comfort;
  if (comfort) {
    lines.push(
      '',
      '### 😊 Comfort',
      `- **Comfort level:** ${comfort.comfortLevel} (${comfort.comfortScore.toFixed(1)}/100)`,
      `- **Comfortable days:** ${formatDayCount(comfort.comfortableDays)}`
    );
  }

  const profile: string[] = [];
  if (bands.temp && bands.rain) {
    const { mean } = bands.temp;
    const total = bands.rain.sum;
    if (mean > 26 && total > 1500) {
      profile.push('🏝️ **Tropical humid climate** - Hot and humid all year round.');
    } else if (mean > 26 && total < 1000) {
      profile.push('🌵 **Tropical dry climate** - Hot with little rain.');
    } else if (mean > 20 && mean <= 26) {
      profile.push('🌸 **Subtropical climate** - Mild with distinct seasons.');
    } else {
      profile.push('🍃 **Temperate climate** - Cool with seasonal variation.');
    }
  }

  if (series.length > TREND_MIN_ROWS && temps.length > TREND_MIN_VALUES) {
    const perYear = fitLinearTrend(temps) * 365;
    if (Math.abs(perYear) > TREND_REPORT_THRESHOLD) {
      const direction = perYear > 0 ? 'rising' : 'falling';
      profile.push(`📈 **Temperature trend:** ${direction} ${Math.abs(perYear).toFixed(1)}°C/year.`);
    }
  }
  pushSection(lines, '🔍 Climate profile', profile);

  return lines;
};

// =============================================================================
// DISPATCH
// =============================================================================

export const REPORT_TEMPLATES: Readonly<Record<ReportType, ReportTemplate>> = Object.freeze({
  daily: dailyTemplate,
  weekly: weeklyTemplate,
  monthly: monthlyTemplate,
  climate: climateTemplate,
});

const ReportTypeSchema = z.enum(REPORT_TYPES);

/**
 * Known report types pass through; anything else becomes 'weekly'
 */
export function resolveReportType(input: string | undefined): ReportType {
  const result = ReportTypeSchema.safeParse(input);
  if (result.success) return result.data;
  logger.debug(`Unknown report type "${input}", using weekly`);
  return 'weekly';
}

export function generateReport(
  series: WeatherSeries,
  locationName: string,
  reportType: string = 'weekly',
  options: ReportOptions = {}
): string {
  if (series.isEmpty) return NO_DATA_MESSAGE;

  const template = REPORT_TEMPLATES[resolveReportType(reportType)];
  const lines = template({
    series: series.sortedByDate(),
    location: cleanLocationName(locationName),
    thresholds: options.thresholds ?? DEFAULT_ALERT_THRESHOLDS,
  });

  if (options.generatedAt) {
    lines.push('', `*Report generated automatically at ${dayjs(options.generatedAt).format(REPORT_TIME_FORMAT)}*`);
  }

  return lines.join('\n');
}
