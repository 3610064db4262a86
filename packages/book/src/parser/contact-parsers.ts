/**
 * @fileoverview Parsers for `contact` commands
 */

import { AddressBookErrorCode, ParseError, Remark } from '@salesbook/core';
import { invalidFormat } from '../commands/messages';
import type { Command, PersonChanges } from '../commands/types';
import { createPerson } from '../model/person';
import { tokenize } from './argument-tokenizer';
import { Prefix } from './cli-syntax';
import {
  optional,
  parseAddress,
  parseEmail,
  parseIndexArgument,
  parseIndexPreamble,
  parseName,
  parsePhone,
  parseRemark,
  parseTags,
  parseTagsForEdit,
  requireEmptyPreamble,
  requirePrefixes,
  requireSomeChange,
  requireValue,
} from './parser-util';
import type { ParserEntry } from './types';

export const ADD_CONTACT_USAGE = 'contact add: Adds a contact.\n'
  + 'Parameters: n/NAME p/PHONE e/EMAIL a/ADDRESS [r/REMARK] [t/TAG]...\n'
  + 'Example: contact add n/John Doe p/98765432 e/johnd@example.com a/311, Clementi Ave 2 t/friends';

export const EDIT_CONTACT_USAGE = 'contact edit: Edits the contact at the index shown in the contact list.\n'
  + 'Parameters: INDEX [n/NAME] [p/PHONE] [e/EMAIL] [a/ADDRESS] [r/REMARK] [t/TAG]...\n'
  + 'Example: contact edit 1 p/91234567 e/johndoe@example.com';

export const DELETE_CONTACT_USAGE = 'contact delete: Deletes the contact at the index shown in the contact list, '
  + 'with their meetings, reminders and sales.\n'
  + 'Parameters: INDEX\n'
  + 'Example: contact delete 1';

export const FIND_CONTACT_USAGE = 'contact find: Lists contacts whose names contain any of the keywords '
  + '(whole words, case-insensitive).\n'
  + 'Parameters: KEYWORD [MORE_KEYWORDS]...\n'
  + 'Example: contact find alice bob';

export const SORT_CONTACT_USAGE = 'contact sort: Sorts the contact list by name or email.\n'
  + 'Parameters: n/[asc|desc] or e/[asc|desc]\n'
  + 'Example: contact sort e/desc';

const CONTACT_PREFIXES = [Prefix.Name, Prefix.Phone, Prefix.Email, Prefix.Address, Prefix.Remark, Prefix.Tag];
const SINGLE_VALUED = [Prefix.Name, Prefix.Phone, Prefix.Email, Prefix.Address, Prefix.Remark];

export function parseAddContact(args: string): Command {
  const map = tokenize(args, ...CONTACT_PREFIXES);
  requirePrefixes(map, ADD_CONTACT_USAGE, Prefix.Name, Prefix.Phone, Prefix.Email, Prefix.Address);
  requireEmptyPreamble(map, ADD_CONTACT_USAGE);
  map.verifyNoDuplicatePrefixesFor(ADD_CONTACT_USAGE, ...SINGLE_VALUED);

  const person = createPerson({
    name: parseName(requireValue(map, Prefix.Name, ADD_CONTACT_USAGE)),
    phone: parsePhone(requireValue(map, Prefix.Phone, ADD_CONTACT_USAGE)),
    email: parseEmail(requireValue(map, Prefix.Email, ADD_CONTACT_USAGE)),
    address: parseAddress(requireValue(map, Prefix.Address, ADD_CONTACT_USAGE)),
    remark: optional(map, Prefix.Remark, parseRemark) ?? Remark.EMPTY,
    tags: parseTags(map.getAllValues(Prefix.Tag)),
  });
  return { group: 'contact', kind: 'add', person };
}

export function parseEditContact(args: string): Command {
  const map = tokenize(args, ...CONTACT_PREFIXES);
  const index = parseIndexPreamble(map.getPreamble(), EDIT_CONTACT_USAGE);
  map.verifyNoDuplicatePrefixesFor(EDIT_CONTACT_USAGE, ...SINGLE_VALUED);

  const changes: PersonChanges = {
    name: optional(map, Prefix.Name, parseName),
    phone: optional(map, Prefix.Phone, parsePhone),
    email: optional(map, Prefix.Email, parseEmail),
    address: optional(map, Prefix.Address, parseAddress),
    remark: optional(map, Prefix.Remark, parseRemark),
    tags: parseTagsForEdit(map.getAllValues(Prefix.Tag)),
  };
  requireSomeChange(changes, EDIT_CONTACT_USAGE);
  return { group: 'contact', kind: 'edit', index, changes };
}

export function parseDeleteContact(args: string): Command {
  return { group: 'contact', kind: 'delete', index: parseIndexArgument(args, DELETE_CONTACT_USAGE) };
}

export function parseFindContact(args: string): Command {
  const trimmed = args.trim();
  if (trimmed === '') {
    throw new ParseError(AddressBookErrorCode.InvalidCommandFormat, invalidFormat(FIND_CONTACT_USAGE));
  }
  return { group: 'contact', kind: 'find', keywords: trimmed.split(/\s+/) };
}

function parseSortOrder(raw: string): boolean {
  switch (raw.toLowerCase()) {
    case '':
    case 'asc':
      return false;
    case 'desc':
      return true;
    default:
      throw new ParseError(AddressBookErrorCode.InvalidFieldValue, 'Sort order should be asc or desc', {
        field: 'order',
      });
  }
}

export function parseSortContact(args: string): Command {
  const map = tokenize(args, Prefix.Name, Prefix.Email);
  requireEmptyPreamble(map, SORT_CONTACT_USAGE);
  map.verifyNoDuplicatePrefixesFor(SORT_CONTACT_USAGE, Prefix.Name, Prefix.Email);

  const byName = map.getValue(Prefix.Name);
  const byEmail = map.getValue(Prefix.Email);
  if ((byName === undefined) === (byEmail === undefined)) {
    throw new ParseError(
      AddressBookErrorCode.InvalidCommandFormat,
      invalidFormat(SORT_CONTACT_USAGE, `Specify exactly one of ${Prefix.Name} or ${Prefix.Email}`)
    );
  }
  return byName !== undefined
    ? { group: 'contact', kind: 'sort', key: 'name', descending: parseSortOrder(byName) }
    : { group: 'contact', kind: 'sort', key: 'email', descending: parseSortOrder(byEmail ?? '') };
}

export const CONTACT_PARSERS: readonly ParserEntry[] = [
  ['add', parseAddContact],
  ['edit', parseEditContact],
  ['delete', parseDeleteContact],
  ['list', () => ({ group: 'contact', kind: 'list' })],
  ['find', parseFindContact],
  ['sort', parseSortContact],
];
