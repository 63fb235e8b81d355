#!/usr/bin/env node
/**
 * Weather Insights CLI
 *
 * Analyze a JSON array of daily weather records and print a report.
 *
 * Usage:
 *   weather-insights data.json                          # Weekly report
 *   weather-insights data.json --report climate --location "Da Nang"
 *   weather-insights data.json --metric temp_max --json # Structured output
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { parseMetricName, WeatherSeries } from './core/series.js';
import type { MetricName } from './core/types.js';
import { ALERT_PROFILE, ALERT_THRESHOLD_PROFILES, ANALYSIS_DEFAULTS, validateConfig } from './config.js';
import { analyzeSeries } from './pipeline.js';
import { logger } from './utils/index.js';

// =============================================================================
// CLI PARSING
// =============================================================================

interface CliArgs {
  file: string | undefined;
  report: string;
  location: string | undefined;
  metric: MetricName;
  json: boolean;
  help: boolean;
}

function optionValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && args[idx + 1]) {
    return args[idx + 1];
  }
  return undefined;
}

function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const valueFlags = ['--report', '--location', '--metric'];
  const positional = argv.filter((arg, i) => !arg.startsWith('--') && !valueFlags.includes(argv[i - 1] ?? ''));
  const metric = optionValue(argv, '--metric');

  return {
    file: positional[0],
    report: optionValue(argv, '--report') ?? 'weekly',
    location: optionValue(argv, '--location'),
    metric: metric ? parseMetricName(metric) : ANALYSIS_DEFAULTS.metric,
    json: argv.includes('--json'),
    help: argv.includes('--help') || argv.includes('-h'),
  };
}

function printUsage(): void {
  console.log(`Usage: weather-insights <file.json> [--report daily|weekly|monthly|climate] [--location name] [--metric name] [--json]`);
}

// =============================================================================
// MAIN
// =============================================================================

function main(): void {
  const configCheck = validateConfig();
  if (!configCheck.valid) {
    for (const error of configCheck.errors) {
      logger.warn(`Configuration: ${error}`);
    }
  }

  const args = parseArgs();
  if (args.help || !args.file) {
    printUsage();
    process.exit(args.help ? 0 : 1);
  }

  logger.debug(`Loading records from ${args.file}`);
  const records: unknown = JSON.parse(readFileSync(args.file, 'utf-8'));
  const series = WeatherSeries.from(records);

  const analysis = analyzeSeries(series, {
    locationName: args.location ?? 'Unknown',
    metric: args.metric,
    reportType: args.report,
    thresholds: ALERT_THRESHOLD_PROFILES[ALERT_PROFILE],
  });

  if (args.json) {
    console.log(JSON.stringify(analysis, null, 2));
    return;
  }

  console.log(analysis.report);
}

// Run
try {
  main();
} catch (error) {
  logger.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}
