/**
 * @fileoverview Command pipeline entry point
 *
 * LogicManager owns the record store and runs every command text through
 * parse, execute and save. Commands run one at a time in submission order;
 * a second `execute` call waits for the first to settle.
 */

import {
  AddressBookErrorCode,
  type Logger,
  StorageError,
  createLogger,
  isAddressBookError,
  toFeedback,
  wrapError,
} from '@salesbook/core';
import { type Clock, type CommandContext, systemClock } from '../commands/context';
import { executeCommand } from '../commands/execute';
import type { CommandResult } from '../commands/types';
import { type SalesBookConfig, mergeConfig } from '../config/defaults';
import { DEFAULT_PREFERENCES, RecordStore, type UserPreferences } from '../model/record-store';
import type { ReadOnlyView } from '../model/views';
import type { Meeting } from '../model/meeting';
import type { Person } from '../model/person';
import type { Reminder } from '../model/reminder';
import type { Sale } from '../model/sale';
import { parseCommand } from '../parser/parse-command';
import { type CommandParserRegistry, createDefaultRegistry } from '../parser/registry';
import { fromSnapshot, toSnapshot } from '../storage/snapshot';
import type { StoragePort } from '../storage/storage-port';

export interface LogicManagerOptions {
  /** Where snapshots are loaded from and saved to; nothing is persisted when absent */
  storage?: StoragePort;
  config?: Partial<SalesBookConfig>;
  clock?: Clock;
  logger?: Logger;
  registry?: CommandParserRegistry;
}

const noop = (): void => undefined;

export class LogicManager {
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly store: RecordStore,
    private readonly context: CommandContext,
    private readonly registry: CommandParserRegistry,
    private readonly storage: StoragePort | undefined
  ) {}

  /**
   * Load the stored snapshot, if any, and build a manager around it.
   * Preferences come from the defaults, then the snapshot, then `config`.
   */
  static async create(options: LogicManagerOptions = {}): Promise<LogicManager> {
    const config = mergeConfig(options.config);
    const logger = options.logger ?? createLogger('logic');
    const storage = options.storage;

    let loaded: ReturnType<typeof fromSnapshot> | undefined;
    if (storage) {
      let raw: unknown;
      try {
        raw = await storage.load();
      } catch (error: unknown) {
        throw storageFailure(error, AddressBookErrorCode.StorageLoadFailed, 'Could not load the address book', 'load');
      }
      if (raw !== undefined) {
        loaded = fromSnapshot(raw);
      }
    }

    const preferences: UserPreferences = {
      ...DEFAULT_PREFERENCES,
      ...loaded?.preferences,
      ...explicitPreferences(options.config),
    };
    const store = new RecordStore({ state: loaded?.state, preferences, logger: logger.child('store') });
    const context: CommandContext = {
      store,
      clock: options.clock ?? systemClock,
      config,
      logger,
    };

    logger.debug(loaded ? 'Loaded stored address book' : 'Starting with an empty address book');
    return new LogicManager(store, context, options.registry ?? createDefaultRegistry(), storage);
  }

  /**
   * Parse and run one command, then save. Rejects with the error of the
   * failing stage; the store is unchanged when parsing or execution fails.
   */
  execute(commandText: string): Promise<CommandResult> {
    const run = this.queue.then(() => this.run(commandText));
    this.queue = run.then(noop, noop);
    return run;
  }

  get config(): Readonly<SalesBookConfig> {
    return this.context.config;
  }

  get preferences(): UserPreferences {
    return this.store.preferences;
  }

  get recordStore(): RecordStore {
    return this.store;
  }

  get persons(): ReadOnlyView<Person> {
    return this.store.sortedPersons;
  }

  get meetings(): ReadOnlyView<Meeting> {
    return this.store.sortedMeetings;
  }

  get reminders(): ReadOnlyView<Reminder> {
    return this.store.sortedReminders;
  }

  get sales(): ReadOnlyView<Sale> {
    return this.store.sortedSales;
  }

  private async run(commandText: string): Promise<CommandResult> {
    const { logger } = this.context;
    logger.info(`Command: ${commandText}`);

    let result: CommandResult;
    try {
      const command = parseCommand(commandText, this.registry);
      result = executeCommand(command, this.context);
    } catch (error: unknown) {
      if (isAddressBookError(error)) {
        logger.info(`Command failed: ${toFeedback(error)}`);
        logger.debug(error.getDescription());
        throw error;
      }
      logger.error('Command failed unexpectedly', error);
      throw wrapError(error, AddressBookErrorCode.InternalError, 'Something went wrong while running the command', {
        operation: 'execute',
        commandText,
      });
    }

    await this.save();
    return result;
  }

  private async save(): Promise<void> {
    if (!this.storage) {
      return;
    }
    const { state, preferences } = this.store.snapshot();
    try {
      await this.storage.save(toSnapshot(state, preferences));
    } catch (error: unknown) {
      const failure = storageFailure(error, AddressBookErrorCode.StorageSaveFailed, 'Could not save the address book', 'save');
      this.context.logger.error(failure.message, error);
      throw failure;
    }
  }
}

function storageFailure(
  error: unknown,
  code: AddressBookErrorCode,
  details: string,
  operation: string
): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(code, details, {
    cause: error instanceof Error ? error : new Error(String(error)),
    context: { operation },
  });
}

function explicitPreferences(config: Partial<SalesBookConfig> = {}): Partial<UserPreferences> {
  const preferences: { locale?: string; currency?: string } = {};
  if (config.locale !== undefined) {
    preferences.locale = config.locale;
  }
  if (config.currency !== undefined) {
    preferences.currency = config.currency;
  }
  return preferences;
}
