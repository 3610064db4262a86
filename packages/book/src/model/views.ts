/**
 * @fileoverview Live read-only views over record collections
 *
 * A view keeps references to its source records, never copies of them. It
 * listens to its source and recomputes lazily: a change only drops the cached
 * projection, and the next read rebuilds it. Views compose, so a sorted view
 * can sit on top of a filtered one.
 */

import { EventEmitter } from 'eventemitter3';

export interface ViewEvents {
  changed: () => void;
}

export interface ReadOnlyView<T> extends Iterable<T> {
  readonly size: number;
  get(index: number): T | undefined;
  toArray(): readonly T[];
  /**
   * Listen for changes; returns the function that stops listening
   */
  subscribe(listener: () => void): () => void;
}

export type Predicate<T> = (item: T) => boolean;
export type Comparator<T> = (a: T, b: T) => number;

export const showAll = (): boolean => true;

/**
 * Shared plumbing for views that derive their items from a source
 */
export abstract class DerivedView<T> extends EventEmitter<ViewEvents> implements ReadOnlyView<T> {
  private cache: readonly T[] | undefined;

  protected constructor(protected readonly source: ReadOnlyView<T>) {
    super();
    source.subscribe(() => this.invalidate());
  }

  protected abstract compute(items: readonly T[]): readonly T[];

  get size(): number {
    return this.toArray().length;
  }

  get(index: number): T | undefined {
    const items = this.toArray();
    return Number.isInteger(index) && index >= 0 && index < items.length ? items[index] : undefined;
  }

  toArray(): readonly T[] {
    if (this.cache === undefined) {
      this.cache = this.compute(this.source.toArray());
    }
    return this.cache;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  subscribe(listener: () => void): () => void {
    this.on('changed', listener);
    return () => {
      this.off('changed', listener);
    };
  }

  protected invalidate(): void {
    this.cache = undefined;
    this.emit('changed');
  }
}

export class FilteredView<T> extends DerivedView<T> {
  constructor(source: ReadOnlyView<T>, private predicate: Predicate<T> = showAll) {
    super(source);
  }

  setPredicate(predicate: Predicate<T>): void {
    this.predicate = predicate;
    this.invalidate();
  }

  protected compute(items: readonly T[]): readonly T[] {
    return items.filter((item) => this.predicate(item));
  }
}

/**
 * Stable sort of its source; items that compare equal keep source order
 */
export class SortedView<T> extends DerivedView<T> {
  constructor(source: ReadOnlyView<T>, private comparator: Comparator<T>) {
    super(source);
  }

  setComparator(comparator: Comparator<T>): void {
    this.comparator = comparator;
    this.invalidate();
  }

  protected compute(items: readonly T[]): readonly T[] {
    return [...items].sort(this.comparator);
  }
}

export function reversed<T>(comparator: Comparator<T>): Comparator<T> {
  return (a, b) => comparator(b, a);
}
