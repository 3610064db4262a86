import type { Command, ReminderChanges } from '../commands/types';
import { tokenize } from './argument-tokenizer';
import { Prefix } from './cli-syntax';
import {
  optional,
  parseDateTime,
  parseIndex,
  parseIndexArgument,
  parseIndexPreamble,
  parseMessage,
  requireEmptyPreamble,
  requirePrefixes,
  requireSomeChange,
  requireValue,
} from './parser-util';
import type { ParserEntry } from './types';

export const ADD_REMINDER_USAGE = 'reminder add: Adds a reminder about a contact.\n'
  + 'Parameters: i/CONTACT_INDEX m/MESSAGE d/DATE\n'
  + 'Example: reminder add i/2 m/Call Amy d/2023-08-01';

export const EDIT_REMINDER_USAGE = 'reminder edit: Edits the reminder at the index shown in the reminder list.\n'
  + 'Parameters: INDEX [i/CONTACT_INDEX] [m/MESSAGE] [d/DATE]\n'
  + 'Example: reminder edit 1 d/2023-08-03 09:00';

export const DELETE_REMINDER_USAGE = 'reminder delete: Deletes the reminder at the index shown in the reminder list.\n'
  + 'Parameters: INDEX\n'
  + 'Example: reminder delete 1';

const REMINDER_PREFIXES = [Prefix.ContactIndex, Prefix.Message, Prefix.Date];

export function parseAddReminder(args: string): Command {
  const map = tokenize(args, ...REMINDER_PREFIXES);
  requirePrefixes(map, ADD_REMINDER_USAGE, ...REMINDER_PREFIXES);
  requireEmptyPreamble(map, ADD_REMINDER_USAGE);
  map.verifyNoDuplicatePrefixesFor(ADD_REMINDER_USAGE, ...REMINDER_PREFIXES);

  return {
    group: 'reminder',
    kind: 'add',
    contactIndex: parseIndex(requireValue(map, Prefix.ContactIndex, ADD_REMINDER_USAGE)),
    message: parseMessage(requireValue(map, Prefix.Message, ADD_REMINDER_USAGE)),
    scheduledAt: parseDateTime(requireValue(map, Prefix.Date, ADD_REMINDER_USAGE)),
  };
}

export function parseEditReminder(args: string): Command {
  const map = tokenize(args, ...REMINDER_PREFIXES);
  const index = parseIndexPreamble(map.getPreamble(), EDIT_REMINDER_USAGE);
  map.verifyNoDuplicatePrefixesFor(EDIT_REMINDER_USAGE, ...REMINDER_PREFIXES);

  const changes: ReminderChanges = {
    contactIndex: optional(map, Prefix.ContactIndex, parseIndex),
    message: optional(map, Prefix.Message, parseMessage),
    scheduledAt: optional(map, Prefix.Date, parseDateTime),
  };
  requireSomeChange(changes, EDIT_REMINDER_USAGE);
  return { group: 'reminder', kind: 'edit', index, changes };
}

export function parseDeleteReminder(args: string): Command {
  return { group: 'reminder', kind: 'delete', index: parseIndexArgument(args, DELETE_REMINDER_USAGE) };
}

export const REMINDER_PARSERS: readonly ParserEntry[] = [
  ['add', parseAddReminder],
  ['edit', parseEditReminder],
  ['delete', parseDeleteReminder],
  ['list', () => ({ group: 'reminder', kind: 'list' })],
];
