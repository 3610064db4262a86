/**
 * @fileoverview Month-based statistics value objects
 */

import { AddressBookErrorCode } from '../errors/codes';
import { rejectValue } from './string-value';

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export class MonthAndYear {
  static readonly MESSAGE_CONSTRAINTS = 'Month should be from 1 to 12 and year should be at least 1';

  private constructor(public readonly month: number, public readonly year: number) {}

  static of(month: number, year: number): MonthAndYear {
    if (!Number.isInteger(month) || month < 1 || month > 12 || !Number.isInteger(year) || year < 1) {
      rejectValue(AddressBookErrorCode.InvalidMonthAndYear, MonthAndYear.MESSAGE_CONSTRAINTS, 'month');
    }
    return new MonthAndYear(month, year);
  }

  previous(): MonthAndYear {
    return this.month === 1
      ? MonthAndYear.of(12, this.year - 1)
      : MonthAndYear.of(this.month - 1, this.year);
  }

  compare(other: MonthAndYear): number {
    return this.year !== other.year ? this.year - other.year : this.month - other.month;
  }

  equals(other: unknown): boolean {
    return other instanceof MonthAndYear && other.month === this.month && other.year === this.year;
  }

  hashKey(): string {
    return `${this.year}-${String(this.month).padStart(2, '0')}`;
  }

  toString(): string {
    return `${MONTH_NAMES[this.month - 1]} ${this.year}`;
  }
}

export class MonthlyCountData {
  constructor(public readonly monthAndYear: MonthAndYear, public readonly count: number) {
    if (!Number.isInteger(count) || count < 0) {
      rejectValue(AddressBookErrorCode.InvalidCount, 'Count should be a non-negative whole number', 'count');
    }
  }

  equals(other: unknown): boolean {
    return other instanceof MonthlyCountData
      && other.monthAndYear.equals(this.monthAndYear)
      && other.count === this.count;
  }

  toString(): string {
    return `${this.monthAndYear.toString()}: ${this.count}`;
  }
}

/**
 * Consecutive months ending at (and including) `last`, oldest first
 */
export function monthsEndingAt(last: MonthAndYear, count: number): MonthAndYear[] {
  const months: MonthAndYear[] = [];
  let current = last;
  for (let i = 0; i < count; i++) {
    months.unshift(current);
    current = current.previous();
  }
  return months;
}
