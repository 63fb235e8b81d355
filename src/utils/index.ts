/**
 * Utility functions for Weather Insights
 */

export { logger } from './logger.js';

/**
 * Round to a fixed number of decimals, halves toward +Infinity (roundTo(12.25) -> 12.3)
 */
export function roundTo(value: number, decimals: number = 1): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Format number with fixed decimals, "N/A" for missing values
 */
export function formatNumber(value: number | null | undefined, decimals: number = 1): string {
  if (value === null || value === undefined || Number.isNaN(value)) return 'N/A';
  return value.toFixed(decimals);
}

export function formatTemperature(temp: number | null | undefined, unit: string = '°C'): string {
  if (temp === null || temp === undefined || Number.isNaN(temp)) return 'N/A';
  return `${temp.toFixed(1)}${unit}`;
}

/**
 * Missing and zero precipitation both read as a dry day
 */
export function formatPrecipitation(precip: number | null | undefined, unit: string = 'mm'): string {
  if (precip === null || precip === undefined || Number.isNaN(precip) || precip === 0) {
    return `0${unit}`;
  }
  return `${precip.toFixed(1)}${unit}`;
}

export function formatWindSpeed(speed: number | null | undefined, unit: string = 'km/h'): string {
  if (speed === null || speed === undefined || Number.isNaN(speed)) return 'N/A';
  return `${speed.toFixed(1)}${unit}`;
}

/**
 * "1 day" / "3 days"
 */
export function formatDayCount(count: number): string {
  return `${count} ${count === 1 ? 'day' : 'days'}`;
}

const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE',
  'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW',
  'W', 'WNW', 'NW', 'NNW',
];

/**
 * Convert a wind bearing in degrees to a 16-point compass label
 */
export function windDirectionText(degrees: number | null | undefined): string {
  if (degrees === null || degrees === undefined || Number.isNaN(degrees)) return 'N/A';
  const index = ((Math.round(degrees / 22.5) % 16) + 16) % 16;
  return COMPASS_POINTS[index] ?? 'N/A';
}

/**
 * Short plain-language description, e.g. "Warm, light rain, moderate wind"
 */
export function describeWeather(temp: number, precipitation: number = 0, windSpeed: number = 0): string {
  const parts: string[] = [];

  if (temp < 15) parts.push('cold');
  else if (temp < 25) parts.push('cool');
  else if (temp < 30) parts.push('warm');
  else if (temp < 35) parts.push('hot');
  else parts.push('very hot');

  if (precipitation > 50) parts.push('heavy rain');
  else if (precipitation > 10) parts.push('moderate rain');
  else if (precipitation > 0) parts.push('light rain');

  if (windSpeed > 25) parts.push('strong wind');
  else if (windSpeed > 15) parts.push('moderate wind');

  const text = parts.join(', ');
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Strip punctuation and collapse whitespace in a location name
 */
export function cleanLocationName(name: string | null | undefined): string {
  if (!name) return 'Unknown';
  const cleaned = name
    .replace(/[^\p{L}\p{N}\s\-.]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || 'Unknown';
}
