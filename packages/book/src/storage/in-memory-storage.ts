import type { StorageSnapshot } from './snapshot';
import type { StoragePort } from './storage-port';

/**
 * Keeps the last snapshot in memory. Snapshots are copied on the way in and
 * out, so callers cannot change what is stored.
 */
export class InMemoryStorage implements StoragePort {
  private snapshot: StorageSnapshot | undefined;
  private saves = 0;

  constructor(initial?: StorageSnapshot) {
    this.snapshot = initial ? structuredClone(initial) : undefined;
  }

  async load(): Promise<StorageSnapshot | undefined> {
    return this.snapshot ? structuredClone(this.snapshot) : undefined;
  }

  async save(snapshot: StorageSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    this.saves += 1;
  }

  /** Number of completed saves */
  get saveCount(): number {
    return this.saves;
  }
}
