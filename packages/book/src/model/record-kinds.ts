import type { TagName } from '@salesbook/core';
import { type Meeting, meetingKey } from './meeting';
import { type Person, personKey } from './person';
import { type Reminder, reminderKey } from './reminder';
import { type Sale, saleKey } from './sale';

export interface RecordTypes {
  person: Person;
  meeting: Meeting;
  reminder: Reminder;
  sale: Sale;
}

export type RecordKind = keyof RecordTypes;

export const RECORD_KINDS: readonly RecordKind[] = ['person', 'meeting', 'reminder', 'sale'];

/** Tag namespaces; contact and sale tags never mix */
export type TagNamespace = 'contact' | 'sale';

export const TAG_NAMESPACES: readonly TagNamespace[] = ['contact', 'sale'];

export type RecordKeyFunctions = { readonly [K in RecordKind]: (record: RecordTypes[K]) => string };

export const RECORD_KEYS: RecordKeyFunctions = {
  person: personKey,
  meeting: meetingKey,
  reminder: reminderKey,
  sale: saleKey,
};

export const tagKey = (tag: TagName): string => tag.hashKey();

/** Noun used in user feedback */
export const RECORD_NOUNS: Readonly<Record<RecordKind, string>> = {
  person: 'contact',
  meeting: 'meeting',
  reminder: 'reminder',
  sale: 'sale',
};
