/**
 * Logger utility for Weather Insights
 */

import chalk from 'chalk';
import dayjs from 'dayjs';
import { LOG_LEVEL, type LOG_LEVELS } from '../config.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function formatTimestamp(): string {
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[LOG_LEVEL];
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.log(
        chalk.gray(`${formatTimestamp()} - DEBUG - ${message}`),
        ...args
      );
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(
        chalk.blue(`${formatTimestamp()} - INFO - ${message}`),
        ...args
      );
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.log(
        chalk.yellow(`${formatTimestamp()} - WARN - ${message}`),
        ...args
      );
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(
        chalk.red(`${formatTimestamp()} - ERROR - ${message}`),
        ...args
      );
    }
  },
};
