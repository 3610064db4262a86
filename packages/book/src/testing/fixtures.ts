/**
 * Shared fixtures: a small typical address book and a command context over it
 */

import { DateTime, Logger, LogLevel, TagName } from '@salesbook/core';
import { type Clock, type CommandContext, fixedClock } from '../commands/context';
import { executeCommand } from '../commands/execute';
import type { CommandResult } from '../commands/types';
import { DEFAULT_CONFIG } from '../config/defaults';
import type { AddressBookState } from '../model/address-book';
import { RecordStore, type UserPreferences } from '../model/record-store';
import { parseCommand } from '../parser/parse-command';
import { createDefaultRegistry } from '../parser/registry';
import { MeetingBuilder, PersonBuilder, ReminderBuilder, SaleBuilder } from './builders';

export const ALICE = PersonBuilder.create()
  .withName('Alice Pauline')
  .withPhone('94351253')
  .withEmail('alice@example.com')
  .withAddress('123, Jurong West Ave 6, #08-111')
  .withTags('friends')
  .build();

export const BENSON = PersonBuilder.create()
  .withName('Benson Meier')
  .withPhone('98765432')
  .withEmail('johnd@example.com')
  .withAddress('311, Clementi Ave 2, #02-25')
  .withRemark('Prefers calls after 5pm')
  .withTags('owesMoney', 'friends')
  .build();

export const CARL = PersonBuilder.create()
  .withName('Carl Kurz')
  .withPhone('95352563')
  .withEmail('heinz@example.com')
  .withAddress('wall street')
  .build();

export const DEMO_MEETING = MeetingBuilder.with(ALICE)
  .withMessage('Product demo')
  .at('2023-08-01 10:00')
  .lasting(45)
  .build();

export const FOLLOW_UP_REMINDER = ReminderBuilder.for(BENSON)
  .withMessage('Send quote')
  .at('2023-07-20 09:00')
  .build();

export const LAMP_SALE = SaleBuilder.to(ALICE)
  .withItem('Desk lamp')
  .at('2023-07-03 14:30')
  .withUnitPrice('19.90')
  .withQuantity(2)
  .withTags('retail')
  .build();

export const CHAIR_SALE = SaleBuilder.to(BENSON)
  .withItem('Office chair')
  .at('2023-08-15 11:00')
  .withUnitPrice('149.00')
  .withQuantity(1)
  .build();

/** Wall-clock time the fixture clock reports */
export const FIXTURE_NOW = DateTime.of('2023-08-20 12:00');

export function typicalState(): AddressBookState {
  return {
    records: {
      person: [ALICE, BENSON, CARL],
      meeting: [DEMO_MEETING],
      reminder: [FOLLOW_UP_REMINDER],
      sale: [LAMP_SALE, CHAIR_SALE],
    },
    tags: {
      contact: [TagName.of('friends'), TagName.of('owesMoney')],
      sale: [TagName.of('retail')],
    },
  };
}

export function silentLogger(): Logger {
  return new Logger({ level: LogLevel.Silent });
}

export interface TestContextOptions {
  state?: AddressBookState;
  preferences?: Partial<UserPreferences>;
  clock?: Clock;
}

export function createTestContext(options: TestContextOptions = {}): CommandContext {
  const logger = silentLogger();
  return {
    store: new RecordStore({ state: options.state, preferences: options.preferences, logger }),
    clock: options.clock ?? fixedClock(FIXTURE_NOW),
    config: { ...DEFAULT_CONFIG },
    logger,
  };
}

const registry = createDefaultRegistry();

/** Parse and execute one command line against a context */
export function runCommand(context: CommandContext, text: string): CommandResult {
  return executeCommand(parseCommand(text, registry), context);
}
