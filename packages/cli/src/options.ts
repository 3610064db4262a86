import { configError, configFromEnv, type SalesBookConfig } from '@salesbook/book';
import { isLogLevel } from '@salesbook/core';

/** Raw command line options, as commander hands them over */
export type CliOptions = {
  logLevel?: string;
  locale?: string;
  currency?: string;
  months?: string;
};

/**
 * Configuration from command line flags. Flags win over environment
 * variables; validation happens when the configuration is merged.
 */
export function configFromOptions(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): Partial<SalesBookConfig> {
  const config: Partial<SalesBookConfig> = configFromEnv(env);

  if (options.logLevel !== undefined) {
    const level = options.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw configError('logLevel', `Unknown log level: ${options.logLevel}`);
    }
    config.logLevel = level;
  }
  if (options.locale !== undefined) {
    config.locale = options.locale;
  }
  if (options.currency !== undefined) {
    config.currency = options.currency.toUpperCase();
  }
  if (options.months !== undefined) {
    config.statisticsMonths = /^\d+$/.test(options.months) ? Number(options.months) : Number.NaN;
  }

  return config;
}
