/**
 * @fileoverview Parsers for `sale` commands
 */

import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { invalidFormat } from '../commands/messages';
import type { Command, SaleChanges } from '../commands/types';
import { tokenize } from './argument-tokenizer';
import { Prefix } from './cli-syntax';
import {
  optional,
  parseDateTime,
  parseIndex,
  parseIndexArgument,
  parseIndexPreamble,
  parseItemName,
  parseMonths,
  parseQuantity,
  parseTag,
  parseTags,
  parseTagsForEdit,
  parseUnitPrice,
  requireEmptyPreamble,
  requirePrefixes,
  requireSomeChange,
  requireValue,
} from './parser-util';
import type { ParserEntry } from './types';

export const ADD_SALE_USAGE = 'sale add: Records a sale to a contact.\n'
  + 'Parameters: i/CONTACT_INDEX n/ITEM_NAME d/DATE p/UNIT_PRICE q/QUANTITY [t/TAG]...\n'
  + 'Example: sale add i/1 n/Blue Pen d/2023-08-01 10:30 p/1.50 q/20 t/stationery';

export const EDIT_SALE_USAGE = 'sale edit: Edits the sale at the index shown in the sale list.\n'
  + 'Parameters: INDEX [i/CONTACT_INDEX] [n/ITEM_NAME] [d/DATE] [p/UNIT_PRICE] [q/QUANTITY] [t/TAG]...\n'
  + 'Example: sale edit 1 q/25';

export const DELETE_SALE_USAGE = 'sale delete: Deletes the sale at the index shown in the sale list.\n'
  + 'Parameters: INDEX\n'
  + 'Example: sale delete 1';

export const LIST_SALE_USAGE = 'sale list: Lists all sales, the sales to one contact, or the sales with a tag.\n'
  + 'Parameters: [i/CONTACT_INDEX] or [t/TAG]\n'
  + 'Example: sale list i/2';

export const SALE_STATS_USAGE = 'sale stats: Counts sales per month.\n'
  + 'Parameters: [mo/MONTHS]\n'
  + 'Example: sale stats mo/12';

const SALE_PREFIXES = [
  Prefix.ContactIndex,
  Prefix.ItemName,
  Prefix.Date,
  Prefix.Price,
  Prefix.Quantity,
  Prefix.Tag,
];
const SINGLE_VALUED = [Prefix.ContactIndex, Prefix.ItemName, Prefix.Date, Prefix.Price, Prefix.Quantity];

export function parseAddSale(args: string): Command {
  const map = tokenize(args, ...SALE_PREFIXES);
  requirePrefixes(map, ADD_SALE_USAGE, ...SINGLE_VALUED);
  requireEmptyPreamble(map, ADD_SALE_USAGE);
  map.verifyNoDuplicatePrefixesFor(ADD_SALE_USAGE, ...SINGLE_VALUED);

  return {
    group: 'sale',
    kind: 'add',
    contactIndex: parseIndex(requireValue(map, Prefix.ContactIndex, ADD_SALE_USAGE)),
    itemName: parseItemName(requireValue(map, Prefix.ItemName, ADD_SALE_USAGE)),
    datetime: parseDateTime(requireValue(map, Prefix.Date, ADD_SALE_USAGE)),
    unitPrice: parseUnitPrice(requireValue(map, Prefix.Price, ADD_SALE_USAGE)),
    quantity: parseQuantity(requireValue(map, Prefix.Quantity, ADD_SALE_USAGE)),
    tags: parseTags(map.getAllValues(Prefix.Tag)),
  };
}

export function parseEditSale(args: string): Command {
  const map = tokenize(args, ...SALE_PREFIXES);
  const index = parseIndexPreamble(map.getPreamble(), EDIT_SALE_USAGE);
  map.verifyNoDuplicatePrefixesFor(EDIT_SALE_USAGE, ...SINGLE_VALUED);

  const changes: SaleChanges = {
    contactIndex: optional(map, Prefix.ContactIndex, parseIndex),
    itemName: optional(map, Prefix.ItemName, parseItemName),
    datetime: optional(map, Prefix.Date, parseDateTime),
    unitPrice: optional(map, Prefix.Price, parseUnitPrice),
    quantity: optional(map, Prefix.Quantity, parseQuantity),
    tags: parseTagsForEdit(map.getAllValues(Prefix.Tag)),
  };
  requireSomeChange(changes, EDIT_SALE_USAGE);
  return { group: 'sale', kind: 'edit', index, changes };
}

export function parseDeleteSale(args: string): Command {
  return { group: 'sale', kind: 'delete', index: parseIndexArgument(args, DELETE_SALE_USAGE) };
}

export function parseListSale(args: string): Command {
  const map = tokenize(args, Prefix.ContactIndex, Prefix.Tag);
  requireEmptyPreamble(map, LIST_SALE_USAGE);
  map.verifyNoDuplicatePrefixesFor(LIST_SALE_USAGE, Prefix.ContactIndex, Prefix.Tag);

  const contactIndex = optional(map, Prefix.ContactIndex, parseIndex);
  const tag = optional(map, Prefix.Tag, parseTag);
  if (contactIndex && tag) {
    throw new ParseError(
      AddressBookErrorCode.InvalidCommandFormat,
      invalidFormat(LIST_SALE_USAGE, `Use at most one of ${Prefix.ContactIndex} or ${Prefix.Tag}`)
    );
  }
  if (contactIndex) {
    return { group: 'sale', kind: 'list', filter: { by: 'contact', contactIndex } };
  }
  if (tag) {
    return { group: 'sale', kind: 'list', filter: { by: 'tag', tag } };
  }
  return { group: 'sale', kind: 'list', filter: { by: 'all' } };
}

export function parseSaleStats(args: string): Command {
  const map = tokenize(args, Prefix.Months);
  requireEmptyPreamble(map, SALE_STATS_USAGE);
  map.verifyNoDuplicatePrefixesFor(SALE_STATS_USAGE, Prefix.Months);
  return { group: 'sale', kind: 'stats', months: optional(map, Prefix.Months, parseMonths) };
}

export const SALE_PARSERS: readonly ParserEntry[] = [
  ['add', parseAddSale],
  ['edit', parseEditSale],
  ['delete', parseDeleteSale],
  ['list', parseListSale],
  ['stats', parseSaleStats],
];
