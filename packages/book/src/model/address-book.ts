/**
 * @fileoverview Address book: the canonical owner of every record and tag
 *
 * Each mutation builds the complete next state (including cascades to
 * dependent records), checks it, and only then commits every list at once.
 * A failed check throws before anything is published, so callers never see
 * a partial mutation.
 */

import {
  AddressBookErrorCode,
  CommandError,
  NotFoundError,
  type TagName,
  normalizeTags,
  sameTags,
} from '@salesbook/core';
import { createMeeting } from './meeting';
import { type Person, personHasTag, personKey, withPersonTags } from './person';
import {
  RECORD_KEYS,
  RECORD_KINDS,
  RECORD_NOUNS,
  type RecordKind,
  type RecordTypes,
  TAG_NAMESPACES,
  type TagNamespace,
  tagKey,
} from './record-kinds';
import { RecordList, findDuplicate } from './record-list';
import { createReminder } from './reminder';
import { createSale, saleHasTag, withSaleTags } from './sale';
import type { ReadOnlyView } from './views';

export type RecordState = { readonly [K in RecordKind]: readonly RecordTypes[K][] };
export type TagState = { readonly [N in TagNamespace]: readonly TagName[] };

export interface AddressBookState {
  readonly records: RecordState;
  readonly tags: TagState;
}

export const EMPTY_STATE: AddressBookState = {
  records: { person: [], meeting: [], reminder: [], sale: [] },
  tags: { contact: [], sale: [] },
};

type RecordLists = { readonly [K in RecordKind]: RecordList<RecordTypes[K]> };
type TagLists = { readonly [N in TagNamespace]: RecordList<TagName> };

/** A person edited (`to` set) or removed (`to` undefined) */
interface PersonChange {
  from: Person;
  to: Person | undefined;
}

/**
 * Map items, keeping the original array when nothing changed.
 * Returning undefined drops the item.
 */
function rewrite<T>(items: readonly T[], update: (item: T) => T | undefined): readonly T[] {
  let changed = false;
  const result: T[] = [];
  for (const item of items) {
    const next = update(item);
    if (next !== item) {
      changed = true;
    }
    if (next !== undefined) {
      result.push(next);
    }
  }
  return changed ? result : items;
}

function sameOrder(a: readonly TagName[], b: readonly TagName[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag.equals(b[i]));
}

interface RecordSlot<T> {
  get(records: RecordState): readonly T[];
  set(records: RecordState, items: readonly T[]): RecordState;
}

type RecordSlots = { readonly [K in RecordKind]: RecordSlot<RecordTypes[K]> };

const RECORD_SLOTS: RecordSlots = {
  person: { get: (records) => records.person, set: (records, person) => ({ ...records, person }) },
  meeting: { get: (records) => records.meeting, set: (records, meeting) => ({ ...records, meeting }) },
  reminder: { get: (records) => records.reminder, set: (records, reminder) => ({ ...records, reminder }) },
  sale: { get: (records) => records.sale, set: (records, sale) => ({ ...records, sale }) },
};

function recordsOf<K extends RecordKind>(state: AddressBookState, kind: K): readonly RecordTypes[K][] {
  const slot: RecordSlot<RecordTypes[K]> = RECORD_SLOTS[kind];
  return slot.get(state.records);
}

function withRecords<K extends RecordKind>(
  state: AddressBookState,
  kind: K,
  items: readonly RecordTypes[K][]
): AddressBookState {
  const slot: RecordSlot<RecordTypes[K]> = RECORD_SLOTS[kind];
  return { ...state, records: slot.set(state.records, items) };
}

function withTags(state: AddressBookState, namespace: TagNamespace, tags: readonly TagName[]): AddressBookState {
  return { ...state, tags: { ...state.tags, [namespace]: tags } };
}

/**
 * Point meetings, reminders and sales at edited persons, and drop those of
 * removed persons
 */
function applyPersonChanges(state: AddressBookState, changes: readonly PersonChange[]): AddressBookState {
  if (changes.length === 0) {
    return state;
  }
  const byKey = new Map(changes.map((change) => [personKey(change.from), change.to]));
  const resolve = (person: Person): Person | undefined => {
    const key = personKey(person);
    return byKey.has(key) ? byKey.get(key) : person;
  };

  const meeting = rewrite(state.records.meeting, (item) => {
    const person = resolve(item.person);
    if (person === undefined) {
      return undefined;
    }
    return person === item.person ? item : createMeeting({ ...item, person });
  });
  const reminder = rewrite(state.records.reminder, (item) => {
    const person = resolve(item.person);
    if (person === undefined) {
      return undefined;
    }
    return person === item.person ? item : createReminder({ ...item, person });
  });
  const sale = rewrite(state.records.sale, (item) => {
    const buyer = resolve(item.buyer);
    if (buyer === undefined) {
      return undefined;
    }
    return buyer === item.buyer ? item : createSale({ ...item, buyer });
  });

  return { ...state, records: { ...state.records, meeting, reminder, sale } };
}

/**
 * Apply a tag list update to every record of the namespace
 */
function retag(
  state: AddressBookState,
  namespace: TagNamespace,
  update: (tags: readonly TagName[]) => readonly TagName[]
): AddressBookState {
  if (namespace === 'sale') {
    const sale = rewrite(state.records.sale, (item) => {
      const tags = update(item.tags);
      return sameTags(tags, item.tags) ? item : withSaleTags(item, tags);
    });
    return withRecords(state, 'sale', sale);
  }

  const changes: PersonChange[] = [];
  const person = rewrite(state.records.person, (item) => {
    const tags = update(item.tags);
    if (sameTags(tags, item.tags)) {
      return item;
    }
    const edited = withPersonTags(item, tags);
    changes.push({ from: item, to: edited });
    return edited;
  });
  return applyPersonChanges(withRecords(state, 'person', person), changes);
}

/**
 * Make sure every tag used by a record is listed in its namespace
 */
function registerRecordTags(state: AddressBookState): AddressBookState {
  const contact = normalizeTags([...state.tags.contact, ...state.records.person.flatMap((item) => item.tags)]);
  const sale = normalizeTags([...state.tags.sale, ...state.records.sale.flatMap((item) => item.tags)]);
  return {
    ...state,
    tags: {
      contact: sameOrder(contact, state.tags.contact) ? state.tags.contact : contact,
      sale: sameOrder(sale, state.tags.sale) ? state.tags.sale : sale,
    },
  };
}

function assertUnique<K extends RecordKind>(kind: K, items: readonly RecordTypes[K][]): void {
  if (findDuplicate(items, RECORD_KEYS[kind]) !== undefined) {
    throw new CommandError(
      AddressBookErrorCode.DuplicateRecord,
      `This ${RECORD_NOUNS[kind]} already exists in the address book`
    );
  }
}

function assertReferences(state: AddressBookState): void {
  const persons = new Set(state.records.person.map(personKey));
  const dangling = state.records.meeting.some((item) => !persons.has(personKey(item.person)))
    || state.records.reminder.some((item) => !persons.has(personKey(item.person)))
    || state.records.sale.some((item) => !persons.has(personKey(item.buyer)));
  if (dangling) {
    throw new CommandError(
      AddressBookErrorCode.InvalidState,
      'Meetings, reminders and sales must refer to a contact in the address book'
    );
  }
}

export class AddressBook {
  private state: AddressBookState = EMPTY_STATE;
  private readonly lists: RecordLists = {
    person: new RecordList(RECORD_KEYS.person),
    meeting: new RecordList(RECORD_KEYS.meeting),
    reminder: new RecordList(RECORD_KEYS.reminder),
    sale: new RecordList(RECORD_KEYS.sale),
  };
  private readonly tagLists: TagLists = {
    contact: new RecordList(tagKey),
    sale: new RecordList(tagKey),
  };

  constructor(initial?: AddressBookState) {
    if (initial) {
      this.resetData(initial);
    }
  }

  list<K extends RecordKind>(kind: K): ReadOnlyView<RecordTypes[K]> {
    return this.lists[kind];
  }

  /**
   * Tags of a namespace, in name order
   */
  tags(namespace: TagNamespace): ReadOnlyView<TagName> {
    return this.tagLists[namespace];
  }

  has<K extends RecordKind>(kind: K, record: RecordTypes[K]): boolean {
    return this.indexOf(kind, record) !== -1;
  }

  add<K extends RecordKind>(kind: K, record: RecordTypes[K]): void {
    if (this.has(kind, record)) {
      throw new CommandError(
        AddressBookErrorCode.DuplicateRecord,
        `This ${RECORD_NOUNS[kind]} already exists in the address book`
      );
    }
    const items: RecordTypes[K][] = [...recordsOf(this.state, kind), record];
    this.commit(withRecords(this.state, kind, items));
  }

  /**
   * Remove a record. Removing a person also removes the meetings, reminders
   * and sales that refer to it.
   */
  remove<K extends RecordKind>(kind: K, record: RecordTypes[K]): void {
    const index = this.requireIndex(kind, record);
    const remaining = recordsOf(this.state, kind).filter((_, i) => i !== index);
    let next = withRecords(this.state, kind, remaining);
    if (kind === 'person') {
      next = applyPersonChanges(next, [{ from: this.state.records.person[index], to: undefined }]);
    }
    this.commit(next);
  }

  /**
   * Replace a record in place. Replacing a person rewrites the records that
   * refer to it.
   */
  replace<K extends RecordKind>(kind: K, target: RecordTypes[K], edited: RecordTypes[K]): void {
    const index = this.requireIndex(kind, target);
    const items = recordsOf(this.state, kind).map((item, i) => (i === index ? edited : item));
    let next = withRecords(this.state, kind, items);
    if (kind === 'person') {
      next = applyPersonChanges(next, [{ from: this.state.records.person[index], to: next.records.person[index] }]);
    }
    this.commit(next);
  }

  hasTag(namespace: TagNamespace, tag: TagName): boolean {
    return this.state.tags[namespace].some((own) => own.equals(tag));
  }

  addTag(namespace: TagNamespace, tag: TagName): void {
    if (this.hasTag(namespace, tag)) {
      throw new CommandError(
        AddressBookErrorCode.DuplicateTag,
        `The ${namespace} tag ${tag.value} already exists`
      );
    }
    this.commit(withTags(this.state, namespace, normalizeTags([...this.state.tags[namespace], tag])));
  }

  /**
   * Delete a tag and strip it from every record of its namespace
   */
  removeTag(namespace: TagNamespace, tag: TagName): void {
    this.requireTag(namespace, tag);
    const tags = this.state.tags[namespace].filter((own) => !own.equals(tag));
    const next = retag(withTags(this.state, namespace, tags), namespace, (own) => own.filter((item) => !item.equals(tag)));
    this.commit(next);
  }

  /**
   * Rename a tag everywhere in its namespace
   */
  renameTag(namespace: TagNamespace, from: TagName, to: TagName): void {
    this.requireTag(namespace, from);
    if (this.hasTag(namespace, to)) {
      throw new CommandError(
        AddressBookErrorCode.DuplicateTag,
        `The ${namespace} tag ${to.value} already exists`
      );
    }
    const rename = (tags: readonly TagName[]): readonly TagName[] =>
      tags.map((item) => (item.equals(from) ? to : item));
    const next = retag(withTags(this.state, namespace, normalizeTags(rename(this.state.tags[namespace]))), namespace, rename);
    this.commit(next);
  }

  countByTag(namespace: TagNamespace, tag: TagName): number {
    return namespace === 'contact'
      ? this.state.records.person.filter((item) => personHasTag(item, tag)).length
      : this.state.records.sale.filter((item) => saleHasTag(item, tag)).length;
  }

  /**
   * Replace all data. The new state is checked like any other mutation.
   */
  resetData(state: AddressBookState): void {
    this.commit(state);
  }

  toState(): AddressBookState {
    return this.state;
  }

  private indexOf<K extends RecordKind>(kind: K, record: RecordTypes[K]): number {
    const keyOf = RECORD_KEYS[kind];
    const key = keyOf(record);
    return recordsOf(this.state, kind).findIndex((item) => keyOf(item) === key);
  }

  private requireIndex<K extends RecordKind>(kind: K, record: RecordTypes[K]): number {
    const index = this.indexOf(kind, record);
    if (index === -1) {
      throw new NotFoundError(
        AddressBookErrorCode.RecordNotFound,
        `The ${RECORD_NOUNS[kind]} is not in the address book`
      );
    }
    return index;
  }

  private requireTag(namespace: TagNamespace, tag: TagName): void {
    if (!this.hasTag(namespace, tag)) {
      throw new NotFoundError(
        AddressBookErrorCode.TagNotFound,
        `The ${namespace} tag ${tag.value} does not exist`,
        { field: 'tag' }
      );
    }
  }

  private commit(next: AddressBookState): void {
    const reconciled = registerRecordTags(next);
    for (const kind of RECORD_KINDS) {
      assertUnique(kind, recordsOf(reconciled, kind));
    }
    assertReferences(reconciled);

    const previous = this.state;
    this.state = reconciled;
    for (const kind of RECORD_KINDS) {
      this.publish(kind, previous);
    }
    for (const namespace of TAG_NAMESPACES) {
      if (reconciled.tags[namespace] !== previous.tags[namespace]) {
        this.tagLists[namespace].setAll(reconciled.tags[namespace]);
      }
    }
  }

  private publish<K extends RecordKind>(kind: K, previous: AddressBookState): void {
    const items = recordsOf(this.state, kind);
    if (items !== recordsOf(previous, kind)) {
      this.lists[kind].setAll(items);
    }
  }
}
