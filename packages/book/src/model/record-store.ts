/**
 * @fileoverview Record store: address book, user preferences and the live
 * views the presentation layer renders
 */

import { type Logger, type TagName, createLogger } from '@salesbook/core';
import { AddressBook, type AddressBookState } from './address-book';
import { type Meeting, compareMeetings } from './meeting';
import { type Person, comparePersonsByName } from './person';
import type { RecordKind, RecordTypes, TagNamespace } from './record-kinds';
import { type Reminder, compareReminders } from './reminder';
import { type Sale, compareSales } from './sale';
import { type Comparator, FilteredView, type Predicate, type ReadOnlyView, SortedView, showAll } from './views';

export interface UserPreferences {
  /** BCP 47 locale used for prices */
  readonly locale: string;
  /** ISO 4217 currency code for prices */
  readonly currency: string;
}

export const DEFAULT_PREFERENCES: UserPreferences = {
  locale: 'en-US',
  currency: 'USD',
};

export const DEFAULT_PERSON_COMPARATOR: Comparator<Person> = comparePersonsByName;

export interface RecordStoreSnapshot {
  readonly state: AddressBookState;
  readonly preferences: UserPreferences;
}

export interface RecordStoreOptions {
  state?: AddressBookState;
  preferences?: Partial<UserPreferences>;
  logger?: Logger;
}

export class RecordStore {
  private readonly book: AddressBook;
  private readonly logger: Logger;
  private prefs: UserPreferences;

  readonly filteredPersons: FilteredView<Person>;
  readonly sortedPersons: SortedView<Person>;
  readonly sortedMeetings: SortedView<Meeting>;
  readonly sortedReminders: SortedView<Reminder>;
  readonly filteredSales: FilteredView<Sale>;
  readonly sortedSales: SortedView<Sale>;
  readonly contactTags: ReadOnlyView<TagName>;
  readonly saleTags: ReadOnlyView<TagName>;

  constructor(options: RecordStoreOptions = {}) {
    this.book = new AddressBook(options.state);
    this.logger = options.logger ?? createLogger('record-store');
    this.prefs = { ...DEFAULT_PREFERENCES, ...options.preferences };

    this.filteredPersons = new FilteredView(this.book.list('person'));
    this.sortedPersons = new SortedView(this.filteredPersons, DEFAULT_PERSON_COMPARATOR);
    this.sortedMeetings = new SortedView(this.book.list('meeting'), compareMeetings);
    this.sortedReminders = new SortedView(this.book.list('reminder'), compareReminders);
    this.filteredSales = new FilteredView(this.book.list('sale'));
    this.sortedSales = new SortedView(this.filteredSales, compareSales);
    this.contactTags = this.book.tags('contact');
    this.saleTags = this.book.tags('sale');
  }

  get preferences(): UserPreferences {
    return this.prefs;
  }

  setPreferences(preferences: Partial<UserPreferences>): void {
    this.prefs = { ...this.prefs, ...preferences };
  }

  /**
   * Canonical, unfiltered records of a kind
   */
  records<K extends RecordKind>(kind: K): ReadOnlyView<RecordTypes[K]> {
    return this.book.list(kind);
  }

  tags(namespace: TagNamespace): ReadOnlyView<TagName> {
    return namespace === 'contact' ? this.contactTags : this.saleTags;
  }

  has<K extends RecordKind>(kind: K, record: RecordTypes[K]): boolean {
    return this.book.has(kind, record);
  }

  add<K extends RecordKind>(kind: K, record: RecordTypes[K]): void {
    this.book.add(kind, record);
  }

  remove<K extends RecordKind>(kind: K, record: RecordTypes[K]): void {
    this.book.remove(kind, record);
  }

  replace<K extends RecordKind>(kind: K, target: RecordTypes[K], edited: RecordTypes[K]): void {
    this.book.replace(kind, target, edited);
  }

  hasTag(namespace: TagNamespace, tag: TagName): boolean {
    return this.book.hasTag(namespace, tag);
  }

  addTag(namespace: TagNamespace, tag: TagName): void {
    this.book.addTag(namespace, tag);
  }

  removeTag(namespace: TagNamespace, tag: TagName): void {
    this.book.removeTag(namespace, tag);
  }

  renameTag(namespace: TagNamespace, from: TagName, to: TagName): void {
    this.book.renameTag(namespace, from, to);
  }

  countByTag(namespace: TagNamespace, tag: TagName): number {
    return this.book.countByTag(namespace, tag);
  }

  /**
   * A new live view over the canonical records of a kind
   */
  filteredView<K extends RecordKind>(kind: K, predicate: Predicate<RecordTypes[K]>): FilteredView<RecordTypes[K]> {
    return new FilteredView(this.book.list(kind), predicate);
  }

  sortedView<K extends RecordKind>(kind: K, comparator: Comparator<RecordTypes[K]>): SortedView<RecordTypes[K]> {
    return new SortedView(this.book.list(kind), comparator);
  }

  /**
   * Filter the displayed persons; the person sort goes back to name order
   */
  updatePersonFilter(predicate: Predicate<Person> = showAll): void {
    this.filteredPersons.setPredicate(predicate);
    this.sortedPersons.setComparator(DEFAULT_PERSON_COMPARATOR);
  }

  updatePersonSort(comparator: Comparator<Person>): void {
    this.sortedPersons.setComparator(comparator);
  }

  updateSaleFilter(predicate: Predicate<Sale> = showAll): void {
    this.filteredSales.setPredicate(predicate);
  }

  updateSaleSort(comparator: Comparator<Sale>): void {
    this.sortedSales.setComparator(comparator);
  }

  resetData(state: AddressBookState): void {
    this.book.resetData(state);
    this.logger.info('Address book data replaced', {
      persons: state.records.person.length,
      meetings: state.records.meeting.length,
      reminders: state.records.reminder.length,
      sales: state.records.sale.length,
    });
  }

  snapshot(): RecordStoreSnapshot {
    return { state: this.book.toState(), preferences: this.prefs };
  }
}
