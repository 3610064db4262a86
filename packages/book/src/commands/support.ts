import {
  AddressBookErrorCode,
  CommandError,
  type DateTime,
  type Index,
  type MonthAndYear,
  MonthlyCountData,
  monthsEndingAt,
} from '@salesbook/core';
import type { ReadOnlyView } from '../model/views';
import { invalidIndex } from './messages';

/**
 * Item at a displayed position, or a CommandError naming the list
 */
export function resolveIndex<T>(view: ReadOnlyView<T>, index: Index, noun: string): T {
  const item = view.get(index.zeroBased);
  if (item === undefined) {
    throw new CommandError(AddressBookErrorCode.IndexOutOfRange, invalidIndex(noun), {
      field: 'index',
      context: { metadata: { index: index.oneBased, size: view.size } },
    });
  }
  return item;
}

/**
 * Count items per month over the `months` months ending at `last`
 */
export function monthlyCounts<T>(
  items: Iterable<T>,
  dateOf: (item: T) => DateTime,
  last: MonthAndYear,
  months: number
): MonthlyCountData[] {
  const range = monthsEndingAt(last, months);
  const counts = new Map(range.map((month) => [month.hashKey(), 0]));
  for (const item of items) {
    const key = dateOf(item).monthAndYear.hashKey();
    const count = counts.get(key);
    if (count !== undefined) {
      counts.set(key, count + 1);
    }
  }
  return range.map((month) => new MonthlyCountData(month, counts.get(month.hashKey()) ?? 0));
}

export function formatStatistics(title: string, rows: readonly MonthlyCountData[]): string {
  return [title, ...rows.map((row) => row.toString())].join('\n');
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
