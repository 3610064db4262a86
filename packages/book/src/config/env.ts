import { isLogLevel } from '@salesbook/core';
import type { SalesBookConfig } from './defaults';
import { configError } from './validator';

export const ENV_KEYS = {
  locale: 'SALESBOOK_LOCALE',
  currency: 'SALESBOOK_CURRENCY',
  statisticsMonths: 'SALESBOOK_STATS_MONTHS',
  logLevel: 'SALESBOOK_LOG_LEVEL',
} as const;

/**
 * Configuration overrides from environment variables. Unset or empty
 * variables are left out.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SalesBookConfig> {
  const config: Partial<SalesBookConfig> = {};

  const locale = env[ENV_KEYS.locale]?.trim();
  if (locale) {
    config.locale = locale;
  }

  const currency = env[ENV_KEYS.currency]?.trim();
  if (currency) {
    config.currency = currency.toUpperCase();
  }

  const months = env[ENV_KEYS.statisticsMonths]?.trim();
  if (months) {
    config.statisticsMonths = /^\d+$/.test(months) ? Number(months) : Number.NaN;
  }

  const logLevel = env[ENV_KEYS.logLevel]?.trim().toLowerCase();
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw configError('logLevel', `Unknown log level in ${ENV_KEYS.logLevel}: ${logLevel}`);
    }
    config.logLevel = logLevel;
  }

  return config;
}
