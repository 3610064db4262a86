/**
 * @fileoverview Default configuration values for SalesBook
 */

import { LogLevel } from '@salesbook/core';
import { validateConfig } from './validator';

export interface SalesBookConfig {
  /** BCP 47 locale for prices */
  locale: string;
  /** ISO 4217 currency code */
  currency: string;
  /** Months covered by `stats` when the command names none */
  statisticsMonths: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<SalesBookConfig> = {
  locale: 'en-US',
  currency: 'USD',
  statisticsMonths: 6,
  logLevel: LogLevel.Warn,
};

/**
 * Merge user configuration with defaults. Throws the first validation error.
 */
export function mergeConfig(userConfig: Partial<SalesBookConfig> = {}): SalesBookConfig {
  const merged: SalesBookConfig = { ...DEFAULT_CONFIG };

  for (const [key, value] of Object.entries(userConfig)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const { errors } = validateConfig(merged);
  if (errors.length > 0) {
    throw errors[0];
  }

  return merged;
}
