import { DateTime, type Logger } from '@salesbook/core';
import type { SalesBookConfig } from '../config/defaults';
import type { RecordStore } from '../model/record-store';

/** Source of the current wall-clock time */
export interface Clock {
  now(): DateTime;
}

export const systemClock: Clock = {
  now: () => DateTime.fromDate(new Date()),
};

export function fixedClock(at: DateTime): Clock {
  return { now: () => at };
}

/**
 * Everything a command may touch while it runs
 */
export interface CommandContext {
  readonly store: RecordStore;
  readonly clock: Clock;
  readonly config: SalesBookConfig;
  readonly logger: Logger;
}
