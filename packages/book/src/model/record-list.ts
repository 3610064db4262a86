/**
 * @fileoverview Canonical ordered collection of records
 *
 * The address book owns one RecordList per record kind and tag namespace.
 * Lists are replaced wholesale on commit, so every listener sees a state in
 * which all lists are consistent with each other.
 */

import { EventEmitter } from 'eventemitter3';
import type { ReadOnlyView, ViewEvents } from './views';

/**
 * First item whose key was already seen, if any
 */
export function findDuplicate<T>(items: readonly T[], keyOf: (item: T) => string): T | undefined {
  const seen = new Set<string>();
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      return item;
    }
    seen.add(key);
  }
  return undefined;
}

export class RecordList<T> extends EventEmitter<ViewEvents> implements ReadOnlyView<T> {
  private items: readonly T[] = [];

  constructor(private readonly keyOf: (item: T) => string) {
    super();
  }

  get size(): number {
    return this.items.length;
  }

  get(index: number): T | undefined {
    return Number.isInteger(index) && index >= 0 && index < this.items.length ? this.items[index] : undefined;
  }

  toArray(): readonly T[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  contains(item: T): boolean {
    return this.indexOf(item) !== -1;
  }

  indexOf(item: T): number {
    const key = this.keyOf(item);
    return this.items.findIndex((own) => this.keyOf(own) === key);
  }

  subscribe(listener: () => void): () => void {
    this.on('changed', listener);
    return () => {
      this.off('changed', listener);
    };
  }

  /**
   * Replace the contents. Emits `changed` unless the same array is set again.
   * Throws RangeError when the items are not unique.
   */
  setAll(items: readonly T[]): void {
    if (items === this.items) {
      return;
    }
    if (findDuplicate(items, this.keyOf) !== undefined) {
      throw new RangeError('Record list items must be unique');
    }
    this.items = items;
    this.emit('changed');
  }
}
