import type { StorageSnapshot } from './snapshot';

/**
 * Where snapshots live. The file format and location belong to the
 * implementation; the core only loads and saves whole snapshots.
 */
export interface StoragePort {
  /** The last saved snapshot, or undefined when nothing was saved yet */
  load(): Promise<StorageSnapshot | undefined>;
  save(snapshot: StorageSnapshot): Promise<void>;
}
