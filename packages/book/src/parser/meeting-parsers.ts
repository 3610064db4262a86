import { Duration } from '@salesbook/core';
import type { Command, MeetingChanges } from '../commands/types';
import { tokenize } from './argument-tokenizer';
import { Prefix } from './cli-syntax';
import {
  optional,
  parseDateTime,
  parseDuration,
  parseIndex,
  parseIndexArgument,
  parseIndexPreamble,
  parseMessage,
  parseMonths,
  requireEmptyPreamble,
  requirePrefixes,
  requireSomeChange,
  requireValue,
} from './parser-util';
import type { ParserEntry } from './types';

export const DEFAULT_MEETING_MINUTES = 60;

export const ADD_MEETING_USAGE = 'meeting add: Adds a meeting with a contact.\n'
  + 'Parameters: i/CONTACT_INDEX m/MESSAGE d/START [du/MINUTES]\n'
  + 'Example: meeting add i/1 m/Product demo d/2023-08-01 14:00 du/90';

export const EDIT_MEETING_USAGE = 'meeting edit: Edits the meeting at the index shown in the meeting list.\n'
  + 'Parameters: INDEX [i/CONTACT_INDEX] [m/MESSAGE] [d/START] [du/MINUTES]\n'
  + 'Example: meeting edit 1 d/2023-08-02 10:00';

export const DELETE_MEETING_USAGE = 'meeting delete: Deletes the meeting at the index shown in the meeting list.\n'
  + 'Parameters: INDEX\n'
  + 'Example: meeting delete 1';

export const MEETING_STATS_USAGE = 'meeting stats: Counts meetings per month.\n'
  + 'Parameters: [mo/MONTHS]\n'
  + 'Example: meeting stats mo/3';

const MEETING_PREFIXES = [Prefix.ContactIndex, Prefix.Message, Prefix.Date, Prefix.Duration];

export function parseAddMeeting(args: string): Command {
  const map = tokenize(args, ...MEETING_PREFIXES);
  requirePrefixes(map, ADD_MEETING_USAGE, Prefix.ContactIndex, Prefix.Message, Prefix.Date);
  requireEmptyPreamble(map, ADD_MEETING_USAGE);
  map.verifyNoDuplicatePrefixesFor(ADD_MEETING_USAGE, ...MEETING_PREFIXES);

  return {
    group: 'meeting',
    kind: 'add',
    contactIndex: parseIndex(requireValue(map, Prefix.ContactIndex, ADD_MEETING_USAGE)),
    message: parseMessage(requireValue(map, Prefix.Message, ADD_MEETING_USAGE)),
    start: parseDateTime(requireValue(map, Prefix.Date, ADD_MEETING_USAGE)),
    duration: optional(map, Prefix.Duration, parseDuration) ?? Duration.of(DEFAULT_MEETING_MINUTES),
  };
}

export function parseEditMeeting(args: string): Command {
  const map = tokenize(args, ...MEETING_PREFIXES);
  const index = parseIndexPreamble(map.getPreamble(), EDIT_MEETING_USAGE);
  map.verifyNoDuplicatePrefixesFor(EDIT_MEETING_USAGE, ...MEETING_PREFIXES);

  const changes: MeetingChanges = {
    contactIndex: optional(map, Prefix.ContactIndex, parseIndex),
    message: optional(map, Prefix.Message, parseMessage),
    start: optional(map, Prefix.Date, parseDateTime),
    duration: optional(map, Prefix.Duration, parseDuration),
  };
  requireSomeChange(changes, EDIT_MEETING_USAGE);
  return { group: 'meeting', kind: 'edit', index, changes };
}

export function parseDeleteMeeting(args: string): Command {
  return { group: 'meeting', kind: 'delete', index: parseIndexArgument(args, DELETE_MEETING_USAGE) };
}

export function parseMeetingStats(args: string): Command {
  const map = tokenize(args, Prefix.Months);
  requireEmptyPreamble(map, MEETING_STATS_USAGE);
  map.verifyNoDuplicatePrefixesFor(MEETING_STATS_USAGE, Prefix.Months);
  return { group: 'meeting', kind: 'stats', months: optional(map, Prefix.Months, parseMonths) };
}

export const MEETING_PARSERS: readonly ParserEntry[] = [
  ['add', parseAddMeeting],
  ['edit', parseEditMeeting],
  ['delete', parseDeleteMeeting],
  ['list', () => ({ group: 'meeting', kind: 'list' })],
  ['stats', parseMeetingStats],
];
