/**
 * @fileoverview Contact records
 */

import {
  type Address,
  type Email,
  type Name,
  type Phone,
  type Remark,
  type TagName,
  normalizeTags,
} from '@salesbook/core';

export interface Person {
  readonly name: Name;
  readonly phone: Phone;
  readonly email: Email;
  readonly address: Address;
  readonly remark: Remark;
  readonly tags: readonly TagName[];
}

export function createPerson(fields: Person): Person {
  return Object.freeze({ ...fields, tags: normalizeTags(fields.tags) });
}

/**
 * Identity key; two persons are the same record when every field matches
 */
export function personKey(person: Person): string {
  return JSON.stringify([
    person.name.value,
    person.phone.value,
    person.email.value,
    person.address.value,
    person.remark.value,
    normalizeTags(person.tags).map((tag) => tag.value),
  ]);
}

export function isSamePerson(a: Person, b: Person): boolean {
  return a === b || personKey(a) === personKey(b);
}

export function personHasTag(person: Person, tag: TagName): boolean {
  return person.tags.some((own) => own.equals(tag));
}

export function withPersonTags(person: Person, tags: Iterable<TagName>): Person {
  return createPerson({ ...person, tags: Array.from(tags) });
}

export const comparePersonsByName = (a: Person, b: Person): number => a.name.compare(b.name);

export const comparePersonsByEmail = (a: Person, b: Person): number =>
  a.email.value.toLowerCase().localeCompare(b.email.value.toLowerCase());

export function formatTags(tags: readonly TagName[]): string {
  return tags.map((tag) => `[${tag.value}]`).join(' ');
}

export function formatPerson(person: Person): string {
  const parts = [
    person.name.value,
    `Phone: ${person.phone.value}`,
    `Email: ${person.email.value}`,
    `Address: ${person.address.value}`,
  ];
  if (!person.remark.isEmpty) {
    parts.push(`Remark: ${person.remark.value}`);
  }
  if (person.tags.length > 0) {
    parts.push(`Tags: ${formatTags(person.tags)}`);
  }
  return parts.join('; ');
}
