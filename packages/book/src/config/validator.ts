/**
 * @fileoverview Configuration validation
 */

import { AddressBookErrorCode, ValidationError, isLogLevel } from '@salesbook/core';
import type { SalesBookConfig } from './defaults';

/** Bounds for the number of months a statistics report covers */
export const STATISTICS_MONTHS = {
  min: 1,
  max: 24,
} as const;

export function configError(field: string, details: string): ValidationError {
  return new ValidationError(AddressBookErrorCode.InvalidConfig, details, { field });
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export function isValidLocale(locale: string): boolean {
  try {
    return Intl.getCanonicalLocales(locale).length === 1;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

export function isValidCurrency(currency: string): boolean {
  return /^[A-Z]{3}$/.test(currency);
}

export function isValidStatisticsMonths(months: number): boolean {
  return Number.isInteger(months) && months >= STATISTICS_MONTHS.min && months <= STATISTICS_MONTHS.max;
}

/**
 * Check every field and collect all problems
 */
export function validateConfig(config: SalesBookConfig): ConfigValidationResult {
  const errors: ValidationError[] = [];

  if (!isValidLocale(config.locale)) {
    errors.push(configError('locale', `Invalid locale: ${config.locale}`));
  }

  if (!isValidCurrency(config.currency)) {
    errors.push(configError('currency', `Currency should be a three-letter ISO 4217 code, got: ${config.currency}`));
  }

  if (!isValidStatisticsMonths(config.statisticsMonths)) {
    errors.push(configError(
      'statisticsMonths',
      `Statistics months should be a whole number from ${STATISTICS_MONTHS.min} to ${STATISTICS_MONTHS.max}`
    ));
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(configError('logLevel', `Unknown log level: ${String(config.logLevel)}`));
  }

  return { isValid: errors.length === 0, errors };
}
