/**
 * @fileoverview Shared helpers for command parsers
 *
 * Value objects throw ValidationError; the parse helpers re-raise it as a
 * ParseError carrying the same message and field, so the user sees which
 * field was wrong.
 */

import {
  Address,
  AddressBookErrorCode,
  DateTime,
  Duration,
  Email,
  Index,
  ItemName,
  Message,
  Name,
  ParseError,
  Phone,
  Quantity,
  Remark,
  TagName,
  UnitPrice,
  ValidationError,
} from '@salesbook/core';
import { STATISTICS_MONTHS, isValidStatisticsMonths } from '../config/validator';
import { invalidFormat } from '../commands/messages';
import type { TagNamespace } from '../model/record-kinds';
import type { ArgumentMultimap } from './argument-multimap';
import { Prefix } from './cli-syntax';

export function parseValue<T>(raw: string, create: (raw: string) => T, field: string): T {
  try {
    return create(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ParseError(AddressBookErrorCode.InvalidFieldValue, error.message, {
        field: error.field ?? field,
        cause: error,
      });
    }
    throw error;
  }
}

export const parseIndex = (raw: string): Index => parseValue(raw, (value) => Index.parse(value), 'index');
export const parseName = (raw: string): Name => parseValue(raw, (value) => Name.of(value), 'name');
export const parsePhone = (raw: string): Phone => parseValue(raw, (value) => Phone.of(value), 'phone');
export const parseEmail = (raw: string): Email => parseValue(raw, (value) => Email.of(value), 'email');
export const parseAddress = (raw: string): Address => parseValue(raw, (value) => Address.of(value), 'address');
export const parseRemark = (raw: string): Remark => parseValue(raw, (value) => Remark.of(value), 'remark');
export const parseMessage = (raw: string): Message => parseValue(raw, (value) => Message.of(value), 'message');
export const parseItemName = (raw: string): ItemName => parseValue(raw, (value) => ItemName.of(value), 'item name');
export const parseTag = (raw: string): TagName => parseValue(raw, (value) => TagName.of(value), 'tag');
export const parseDateTime = (raw: string): DateTime => parseValue(raw, (value) => DateTime.of(value), 'date');
export const parseDuration = (raw: string): Duration => parseValue(raw, (value) => Duration.parse(value), 'duration');
export const parseUnitPrice = (raw: string): UnitPrice => parseValue(raw, (value) => UnitPrice.of(value), 'unit price');
export const parseQuantity = (raw: string): Quantity => parseValue(raw, (value) => Quantity.parse(value), 'quantity');

export function parseTags(values: readonly string[]): TagName[] {
  return values.map(parseTag);
}

/**
 * Tags for an edit: absent leaves them alone, a single empty `t/` clears them
 */
export function parseTagsForEdit(values: readonly string[]): TagName[] | undefined {
  if (values.length === 0) {
    return undefined;
  }
  if (values.length === 1 && values[0] === '') {
    return [];
  }
  return parseTags(values);
}

export function parseMonths(raw: string): number {
  const trimmed = raw.trim();
  const months = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!isValidStatisticsMonths(months)) {
    throw new ParseError(
      AddressBookErrorCode.InvalidFieldValue,
      `Months should be a whole number from ${STATISTICS_MONTHS.min} to ${STATISTICS_MONTHS.max}`,
      { field: 'months' }
    );
  }
  return months;
}

/**
 * Index given as the whole argument string, as in `delete 2`
 */
export function parseIndexArgument(args: string, usage: string): Index {
  return parseIndexPreamble(args.trim(), usage);
}

export function parseIndexPreamble(preamble: string, usage: string): Index {
  try {
    return Index.parse(preamble);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ParseError(AddressBookErrorCode.InvalidCommandFormat, invalidFormat(usage, error.message), {
        field: 'index',
        cause: error,
      });
    }
    throw error;
  }
}

export function requireEmptyPreamble(map: ArgumentMultimap, usage: string): void {
  const preamble = map.getPreamble();
  if (preamble !== '') {
    throw new ParseError(
      AddressBookErrorCode.UnexpectedPreamble,
      invalidFormat(usage, `Unexpected text before the first prefix: "${preamble}"`)
    );
  }
}

/**
 * Throw for the first compulsory prefix that is missing
 */
export function requirePrefixes(map: ArgumentMultimap, usage: string, ...prefixes: Prefix[]): void {
  const missing = prefixes.find((prefix) => !map.has(prefix));
  if (missing !== undefined) {
    throw missingPrefix(missing, usage);
  }
}

export function requireValue(map: ArgumentMultimap, prefix: Prefix, usage: string): string {
  const value = map.getValue(prefix);
  if (value === undefined) {
    throw missingPrefix(prefix, usage);
  }
  return value;
}

function missingPrefix(prefix: Prefix, usage: string): ParseError {
  return new ParseError(AddressBookErrorCode.MissingPrefix, invalidFormat(usage, `Missing prefix: ${prefix}`), {
    field: prefix,
  });
}

/**
 * Parse a prefix value if the prefix was given
 */
export function optional<T>(map: ArgumentMultimap, prefix: Prefix, parse: (raw: string) => T): T | undefined {
  const value = map.getValue(prefix);
  return value === undefined ? undefined : parse(value);
}

/**
 * Exactly one of `c/` (contact tags) or `s/` (sale tags)
 */
export function parseNamespace(map: ArgumentMultimap, usage: string): TagNamespace {
  const contact = map.has(Prefix.ContactTags);
  const sale = map.has(Prefix.SaleTags);
  if (contact === sale) {
    throw new ParseError(
      AddressBookErrorCode.InvalidCommandFormat,
      invalidFormat(usage, `Specify exactly one of ${Prefix.ContactTags} or ${Prefix.SaleTags}`),
      { field: 'namespace' }
    );
  }
  return contact ? 'contact' : 'sale';
}

export function requireSomeChange(changes: object, usage: string): void {
  const values: unknown[] = Object.values(changes);
  if (values.every((value) => value === undefined)) {
    throw new ParseError(
      AddressBookErrorCode.NoFieldEdited,
      invalidFormat(usage, 'At least one field to edit must be provided.')
    );
  }
}
