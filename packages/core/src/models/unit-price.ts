/**
 * @fileoverview Unit price value object
 *
 * Prices are written as `DOLLARS.CENTS` with exactly two cent digits and must
 * be greater than zero. The amount is kept in integer cents so that display
 * formatting never loses the cents.
 */

import { AddressBookErrorCode } from '../errors/codes';
import { type Cents, isCents, toBranded } from '../types/branded';
import { rejectValue } from './string-value';

const PRICE_PATTERN = /^(\d{1,9})\.(\d{2})$/;

export interface PriceFormatOptions {
  locale?: string;
  currency?: string;
}

export class UnitPrice {
  static readonly MESSAGE_CONSTRAINTS =
    'Unit prices should be in the form "DOLLARS.CENTS", where DOLLARS is a whole number of at most 9 digits '
    + 'and CENTS is exactly 2 digits. The unit price should be greater than zero';

  private constructor(public readonly cents: Cents) {}

  static isValid(test: string): boolean {
    const match = PRICE_PATTERN.exec(test);
    if (!match) {
      return false;
    }
    return Number(match[1]) * 100 + Number(match[2]) > 0;
  }

  static of(raw: string): UnitPrice {
    const trimmed = raw.trim();
    if (!UnitPrice.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidUnitPrice, UnitPrice.MESSAGE_CONSTRAINTS, 'unit price');
    }
    const [dollars, cents] = trimmed.split('.');
    return new UnitPrice(toBranded(Number(dollars) * 100 + Number(cents), isCents));
  }

  /**
   * `DOLLARS.CENTS`, accepted back by `of`
   */
  toPlainString(): string {
    const dollars = Math.floor(this.cents / 100);
    const cents = this.cents % 100;
    return `${dollars}.${String(cents).padStart(2, '0')}`;
  }

  format(options: PriceFormatOptions = {}): string {
    return formatCents(this.cents, options);
  }

  equals(other: unknown): boolean {
    return other instanceof UnitPrice && other.cents === this.cents;
  }

  hashKey(): string {
    return this.toPlainString();
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.toPlainString();
  }
}

/**
 * Locale-aware currency string for an amount in cents. The cents are
 * spliced in from the integer amount, so large totals keep them exactly.
 */
export function formatCents(cents: number | bigint, options: PriceFormatOptions = {}): string {
  const { locale = 'en-US', currency = 'USD' } = options;
  const formatter = new Intl.NumberFormat(locale, {
    style: 'currency',
    currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  const amount = BigInt(cents);
  const fraction = String(amount % 100n).padStart(2, '0');
  return formatter
    .formatToParts(amount / 100n)
    .map((part) => (part.type === 'fraction' ? fraction : part.value))
    .join('');
}
