import { describe, it, expect } from '@jest/globals';
import { DateTime } from '../date-time';
import { MonthAndYear, MonthlyCountData, monthsEndingAt } from '../statistics';
import { ValidationError } from '../../errors/addressbook-error';

describe('DateTime', () => {
  it('reads a bare date as midnight', () => {
    expect(DateTime.of('2023-08-01').toString()).toBe('2023-08-01 00:00');
    expect(DateTime.of('2023-08-01 09:30').toString()).toBe('2023-08-01 09:30');
  });

  it.each(['2023-02-29', '2023-13-01', '2023-04-31', '2023-08-01 24:00', '2023-08-01 12:60', '01-08-2023', '2023-8-1'])(
    'rejects %s',
    (raw) => {
      expect(() => DateTime.of(raw)).toThrow(ValidationError);
    }
  );

  it('accepts leap days', () => {
    expect(DateTime.isValid('2024-02-29 23:59')).toBe(true);
    expect(DateTime.isValid('1900-02-29')).toBe(false);
    expect(DateTime.isValid('2000-02-29')).toBe(true);
  });

  it('counts minutes from the epoch', () => {
    expect(DateTime.of('1970-01-01 00:01').epochMinutes).toBe(1);
    expect(DateTime.of('1970-01-02').epochMinutes).toBe(1440);
  });

  it('orders chronologically', () => {
    const earlier = DateTime.of('2023-08-01 09:00');
    const later = DateTime.of('2023-08-01 10:00');

    expect(earlier.isBefore(later)).toBe(true);
    expect(later.compare(earlier)).toBe(60);
    expect(earlier.equals(DateTime.of('2023-08-01 09:00'))).toBe(true);
  });

  it('reads the local wall clock of a Date', () => {
    expect(DateTime.fromDate(new Date(2023, 7, 1, 9, 30)).toString()).toBe('2023-08-01 09:30');
  });

  it('knows its month', () => {
    expect(DateTime.of('2023-08-15 10:00').monthAndYear.toString()).toBe('Aug 2023');
  });
});

describe('MonthAndYear', () => {
  it('steps back across a year boundary', () => {
    expect(MonthAndYear.of(1, 2023).previous().equals(MonthAndYear.of(12, 2022))).toBe(true);
  });

  it('rejects months outside 1 to 12', () => {
    expect(() => MonthAndYear.of(13, 2023)).toThrow(ValidationError);
  });

  it('lists consecutive months oldest first', () => {
    const months = monthsEndingAt(MonthAndYear.of(2, 2023), 3).map((month) => month.toString());
    expect(months).toEqual(['Dec 2022', 'Jan 2023', 'Feb 2023']);
  });
});

describe('MonthlyCountData', () => {
  it('rejects negative counts', () => {
    expect(() => new MonthlyCountData(MonthAndYear.of(1, 2023), -1)).toThrow(ValidationError);
    expect(new MonthlyCountData(MonthAndYear.of(1, 2023), 2).toString()).toBe('Jan 2023: 2');
  });
});
