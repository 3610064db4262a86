/**
 * @fileoverview Date and time value object
 *
 * A wall-clock date and time without a time zone, written `yyyy-MM-dd HH:mm`
 * or `yyyy-MM-dd` (midnight). Instances always denote a real calendar date.
 */

import { AddressBookErrorCode } from '../errors/codes';
import { type EpochMinutes, isEpochMinutes, toBranded } from '../types/branded';
import { rejectValue } from './string-value';
import { MonthAndYear } from './statistics';

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2}))?$/;
const MS_PER_MINUTE = 60_000;

export interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  const days = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return days[month - 1];
}

function isValidParts({ year, month, day, hour, minute }: DateTimeParts): boolean {
  return [year, month, day, hour, minute].every(Number.isInteger)
    && year >= 1 && year <= 9999
    && month >= 1 && month <= 12
    && day >= 1 && day <= daysInMonth(year, month)
    && hour >= 0 && hour <= 23
    && minute >= 0 && minute <= 59;
}

export class DateTime {
  static readonly MESSAGE_CONSTRAINTS =
    'Date and time should be a valid date in the format yyyy-MM-dd HH:mm, or yyyy-MM-dd for midnight';

  readonly epochMinutes: EpochMinutes;

  private constructor(private readonly parts: Readonly<DateTimeParts>) {
    const date = new Date(Date.UTC(2000, parts.month - 1, parts.day, parts.hour, parts.minute));
    date.setUTCFullYear(parts.year);
    this.epochMinutes = toBranded(Math.round(date.getTime() / MS_PER_MINUTE), isEpochMinutes);
  }

  static isValid(test: string): boolean {
    const parts = DateTime.match(test);
    return parts !== undefined && isValidParts(parts);
  }

  static of(raw: string): DateTime {
    const parts = DateTime.match(raw.trim());
    if (!parts || !isValidParts(parts)) {
      rejectValue(AddressBookErrorCode.InvalidDateTime, DateTime.MESSAGE_CONSTRAINTS, 'date');
    }
    return new DateTime(parts);
  }

  static fromParts(parts: DateTimeParts): DateTime {
    if (!isValidParts(parts)) {
      rejectValue(AddressBookErrorCode.InvalidDateTime, DateTime.MESSAGE_CONSTRAINTS, 'date');
    }
    return new DateTime({ ...parts });
  }

  /**
   * Wall-clock reading of a Date in the local time zone
   */
  static fromDate(date: Date): DateTime {
    return DateTime.fromParts({
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      day: date.getDate(),
      hour: date.getHours(),
      minute: date.getMinutes(),
    });
  }

  private static match(text: string): DateTimeParts | undefined {
    const match = DATE_TIME_PATTERN.exec(text);
    if (!match) {
      return undefined;
    }
    const [, year, month, day, hour = '0', minute = '0'] = match;
    return {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
    };
  }

  get year(): number {
    return this.parts.year;
  }

  get month(): number {
    return this.parts.month;
  }

  get day(): number {
    return this.parts.day;
  }

  get hour(): number {
    return this.parts.hour;
  }

  get minute(): number {
    return this.parts.minute;
  }

  get monthAndYear(): MonthAndYear {
    return MonthAndYear.of(this.parts.month, this.parts.year);
  }

  compare(other: DateTime): number {
    return this.epochMinutes - other.epochMinutes;
  }

  isBefore(other: DateTime): boolean {
    return this.compare(other) < 0;
  }

  equals(other: unknown): boolean {
    return other instanceof DateTime && other.epochMinutes === this.epochMinutes;
  }

  hashKey(): string {
    return this.toString();
  }

  toString(): string {
    const { year, month, day, hour, minute } = this.parts;
    return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
