/**
 * @fileoverview Snapshot codec
 *
 * A snapshot is plain JSON: one section per data group plus a preferences
 * section. Records refer to their contact by embedding it; on load every
 * embedded contact must match one in the persons section. Loading checks the
 * shape with zod, then rebuilds every value object, so a snapshot that loads
 * is as valid as one built by commands.
 */

import {
  Address,
  AddressBookErrorCode,
  DateTime,
  Duration,
  Email,
  ItemName,
  Message,
  Name,
  Phone,
  Quantity,
  Remark,
  StorageError,
  TagName,
  UnitPrice,
  isAddressBookError,
} from '@salesbook/core';
import { z } from 'zod';
import { isValidCurrency, isValidLocale } from '../config/validator';
import { type AddressBookState, AddressBook } from '../model/address-book';
import { type Meeting, createMeeting } from '../model/meeting';
import { type Person, createPerson, personKey } from '../model/person';
import type { UserPreferences } from '../model/record-store';
import { type Reminder, createReminder } from '../model/reminder';
import { type Sale, createSale } from '../model/sale';

export const SNAPSHOT_VERSION = 1;

const personSchema = z.object({
  name: z.string(),
  phone: z.string(),
  email: z.string(),
  address: z.string(),
  remark: z.string().default(''),
  tags: z.array(z.string()).default([]),
});

const meetingSchema = z.object({
  person: personSchema,
  message: z.string(),
  start: z.string(),
  durationMinutes: z.number().int(),
});

const reminderSchema = z.object({
  person: personSchema,
  message: z.string(),
  scheduledAt: z.string(),
});

const saleSchema = z.object({
  buyer: personSchema,
  itemName: z.string(),
  datetime: z.string(),
  unitPrice: z.string(),
  quantity: z.number().int(),
  tags: z.array(z.string()).default([]),
});

const preferencesSchema = z.object({
  locale: z.string().refine(isValidLocale, { message: 'Invalid locale' }),
  currency: z.string().refine(isValidCurrency, { message: 'Currency should be a three-letter ISO 4217 code' }),
});

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  persons: z.array(personSchema),
  meetings: z.array(meetingSchema),
  reminders: z.array(reminderSchema),
  sales: z.array(saleSchema),
  tags: z.object({
    contact: z.array(z.string()),
    sale: z.array(z.string()),
  }),
  preferences: preferencesSchema,
});

export type StorageSnapshot = z.infer<typeof snapshotSchema>;
type PersonJson = z.infer<typeof personSchema>;

export interface DecodedSnapshot {
  state: AddressBookState;
  preferences: UserPreferences;
}

function personToJson(person: Person): PersonJson {
  return {
    name: person.name.value,
    phone: person.phone.value,
    email: person.email.value,
    address: person.address.value,
    remark: person.remark.value,
    tags: person.tags.map((tag) => tag.value),
  };
}

export function toSnapshot(state: AddressBookState, preferences: UserPreferences): StorageSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    persons: state.records.person.map(personToJson),
    meetings: state.records.meeting.map((meeting) => ({
      person: personToJson(meeting.person),
      message: meeting.message.value,
      start: meeting.start.toString(),
      durationMinutes: meeting.duration.minutes,
    })),
    reminders: state.records.reminder.map((reminder) => ({
      person: personToJson(reminder.person),
      message: reminder.message.value,
      scheduledAt: reminder.scheduledAt.toString(),
    })),
    sales: state.records.sale.map((sale) => ({
      buyer: personToJson(sale.buyer),
      itemName: sale.itemName.value,
      datetime: sale.datetime.toString(),
      unitPrice: sale.unitPrice.toPlainString(),
      quantity: sale.quantity.value,
      tags: sale.tags.map((tag) => tag.value),
    })),
    tags: {
      contact: state.tags.contact.map((tag) => tag.value),
      sale: state.tags.sale.map((tag) => tag.value),
    },
    preferences: { locale: preferences.locale, currency: preferences.currency },
  };
}

function corrupted(details: string, cause?: Error): StorageError {
  return new StorageError(AddressBookErrorCode.SnapshotCorrupted, `Snapshot is corrupted: ${details}`, {
    cause,
    context: { operation: 'fromSnapshot' },
  });
}

function personFromJson(json: PersonJson): Person {
  return createPerson({
    name: Name.of(json.name),
    phone: Phone.of(json.phone),
    email: Email.of(json.email),
    address: Address.of(json.address),
    remark: Remark.of(json.remark),
    tags: json.tags.map((tag) => TagName.of(tag)),
  });
}

function decodeState(snapshot: StorageSnapshot): AddressBookState {
  const persons = snapshot.persons.map(personFromJson);
  const byKey = new Map(persons.map((person) => [personKey(person), person]));
  const contactOf = (json: PersonJson): Person => {
    const person = byKey.get(personKey(personFromJson(json)));
    if (!person) {
      throw corrupted(`no contact named ${json.name} in the persons section`);
    }
    return person;
  };

  const meetings: Meeting[] = snapshot.meetings.map((json) => createMeeting({
    person: contactOf(json.person),
    message: Message.of(json.message),
    start: DateTime.of(json.start),
    duration: Duration.of(json.durationMinutes),
  }));
  const reminders: Reminder[] = snapshot.reminders.map((json) => createReminder({
    person: contactOf(json.person),
    message: Message.of(json.message),
    scheduledAt: DateTime.of(json.scheduledAt),
  }));
  const sales: Sale[] = snapshot.sales.map((json) => createSale({
    buyer: contactOf(json.buyer),
    itemName: ItemName.of(json.itemName),
    datetime: DateTime.of(json.datetime),
    unitPrice: UnitPrice.of(json.unitPrice),
    quantity: Quantity.of(json.quantity),
    tags: json.tags.map((tag) => TagName.of(tag)),
  }));

  return {
    records: { person: persons, meeting: meetings, reminder: reminders, sale: sales },
    tags: {
      contact: snapshot.tags.contact.map((tag) => TagName.of(tag)),
      sale: snapshot.tags.sale.map((tag) => TagName.of(tag)),
    },
  };
}

/**
 * Decode untrusted snapshot data. Throws StorageError (SnapshotCorrupted)
 * when the data is malformed or would not form a valid address book.
 */
export function fromSnapshot(raw: unknown): DecodedSnapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw corrupted(`${path}: ${issue.message}`, parsed.error);
  }

  try {
    const state = decodeState(parsed.data);
    // Replays the address book checks: unique records, known contacts
    const book = new AddressBook(state);
    return { state: book.toState(), preferences: parsed.data.preferences };
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    if (isAddressBookError(error)) {
      throw corrupted(error.message, error);
    }
    throw error;
  }
}
