/**
 * Core Types for Weather Insights
 *
 * Shared type definitions for the series store and every analysis component.
 * Metric keys keep the column names of the upstream weather feed; derived
 * results use camelCase fields.
 */

// =============================================================================
// METRIC VOCABULARY
// =============================================================================

export const DAILY_METRICS = [
  'temp_max',
  'temp_min',
  'temp_mean',
  'precipitation',
  'wind_speed_max',
  'humidity',
  'pressure',
] as const;

/** Observation-style columns probed by column resolution */
export const OBSERVATION_METRICS = ['temperature', 'wind_speed'] as const;

export const METRIC_NAMES = [...DAILY_METRICS, ...OBSERVATION_METRICS] as const;

export type DailyMetric = (typeof DAILY_METRICS)[number];
export type ObservationMetric = (typeof OBSERVATION_METRICS)[number];
export type MetricName = (typeof METRIC_NAMES)[number];

// =============================================================================
// RECORDS
// =============================================================================

/** Missing values are `null` or an absent key, never zero. */
export type MetricValues = {
  [K in MetricName]?: number | null;
};

export interface DailyRecord extends MetricValues {
  date: string;              // YYYY-MM-DD
}

export interface DateRange {
  start: string;
  end: string;
}

// =============================================================================
// STATISTICS
// =============================================================================

export interface TemperatureStatistics {
  mean: number;
  min: number;
  max: number;
  std?: number;              // Omitted for a single value
}

export interface PrecipitationStatistics {
  total: number;
  mean: number;
  max: number;
  rainyDays: number;
}

export interface WindStatistics {
  mean: number;
  max: number;
}

export interface WeatherStatistics {
  temperature?: TemperatureStatistics;
  precipitation?: PrecipitationStatistics;
  wind?: WindStatistics;
}

// =============================================================================
// ANOMALIES & TRENDS
// =============================================================================

export type AnomalyRecord = DailyRecord & { zScore: number };

export type TrendLabel = 'increasing' | 'decreasing' | 'stable';

export type TrendRecord = DailyRecord & {
  movingAverage?: number;
  delta?: number;
  trendLabel: TrendLabel;
};

// =============================================================================
// ALERTS
// =============================================================================

export type AlertSeverity = 'info' | 'warning' | 'danger';
export type AlertCategory = 'heat' | 'cold' | 'precipitation' | 'wind';

export interface WeatherAlert {
  category: AlertCategory;
  severity: AlertSeverity;
  title: string;
  message: string;
  metric: MetricName;        // Column the rule was evaluated against
  value: number;             // Extreme value among triggering days
  count: number;             // Number of triggering days
}

export interface AlertThresholds {
  extremeHeat: number;       // °C, danger
  highHeat: number;          // °C, warning
  cold: number;              // °C
  extremeCold: number;       // °C, escalates cold to danger
  heavyRain: number;         // mm
  veryHeavyRain: number;     // mm, escalates rain to danger
  strongWind: number;        // km/h
  veryStrongWind: number;    // km/h, escalates wind to danger
}

// =============================================================================
// CLIMATE INDICES
// =============================================================================

export interface TemperatureIndices {
  meanTemp: number;
  tempRange: number;
  hotDays: number;           // > 30°C
  coolDays: number;          // < 20°C
  tempVariability?: number;
}

export type PrecipitationIntensity = 'high' | 'low';

export interface PrecipitationIndices {
  totalPrecipitation: number;
  rainyDays: number;
  dryDays: number;
  averageRainPerRainyDay: number;
  maxDailyRain: number;
  intensity: PrecipitationIntensity;
}

export type ComfortLevel =
  | 'very comfortable'
  | 'comfortable'
  | 'fairly comfortable'
  | 'uncomfortable'
  | 'very uncomfortable';

export interface ComfortIndex {
  comfortScore: number;
  comfortLevel: ComfortLevel;
  comfortableDays: number;
}

export interface ClimateIndices {
  temperature?: TemperatureIndices;
  precipitation?: PrecipitationIndices;
  comfort?: ComfortIndex;
}

// =============================================================================
// PATTERNS
// =============================================================================

export interface TemperaturePattern {
  trend: TrendLabel;
  trendSlope: number;
  heatWaveDays: number;
  volatility: 'high' | 'low';
}

export interface PrecipitationPattern {
  drySpellDays: number;
  wetSpellDays: number;
  consistency: 'consistent' | 'inconsistent';
}

export interface WeatherPatterns {
  temperature?: TemperaturePattern;
  precipitation?: PrecipitationPattern;
}

export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export interface SeasonalMean {
  season: Season;
  mean: number;
  days: number;
}

// =============================================================================
// AGGREGATES & COMPARISONS
// =============================================================================

export interface MonthlyAggregate {
  month: string;             // YYYY-MM
  tempMean?: number;
  tempMax?: number;
  tempMin?: number;
  precipitationSum?: number;
  rainyDays?: number;
  windSpeedMean?: number;
}

export interface MetricDifference {
  first: number;
  second: number;
  difference: number;
  changeDescription: string;
}

export interface PeriodComparison {
  firstPeriod: string;
  secondPeriod: string;
  temperature?: MetricDifference;     // Mean of the shared temperature column
  precipitation?: MetricDifference;   // Totals
}

// =============================================================================
// REPORTS
// =============================================================================

export const REPORT_TYPES = ['daily', 'weekly', 'monthly', 'climate'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export interface WeatherOverview {
  location: string;
  period: {
    start: string | null;
    end: string | null;
    totalDays: number;
  };
  statistics: WeatherStatistics;
  highlights: string[];
}
