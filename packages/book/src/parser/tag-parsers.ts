/**
 * @fileoverview Parsers for `tag` commands
 *
 * Every command except `list` names its namespace with an empty `c/`
 * (contact tags) or `s/` (sale tags) prefix.
 */

import type { Command } from '../commands/types';
import { tokenize } from './argument-tokenizer';
import { Prefix } from './cli-syntax';
import {
  parseIndexPreamble,
  parseNamespace,
  parseTag,
  requireEmptyPreamble,
  requirePrefixes,
  requireValue,
} from './parser-util';
import type { ParserEntry } from './types';

export const ADD_TAG_USAGE = 'tag add: Adds a contact or sale tag.\n'
  + 'Parameters: c/ or s/, then t/TAG\n'
  + 'Example: tag add c/ t/friends';

export const EDIT_TAG_USAGE = 'tag edit: Renames the tag at the index shown in the contact or sale tag list.\n'
  + 'Parameters: INDEX c/ or s/, then t/NEW_NAME\n'
  + 'Example: tag edit 1 c/ t/colleagues';

export const DELETE_TAG_USAGE = 'tag delete: Deletes the tag at the index shown in the contact or sale tag list.\n'
  + 'Parameters: INDEX c/ or s/\n'
  + 'Example: tag delete 1 s/';

export const FIND_TAG_USAGE = 'tag find: Lists the contacts or sales with a tag.\n'
  + 'Parameters: c/ or s/, then t/TAG\n'
  + 'Example: tag find c/ t/friends';

const TAG_PREFIXES = [Prefix.ContactTags, Prefix.SaleTags, Prefix.Tag];

export function parseAddTag(args: string): Command {
  const map = tokenize(args, ...TAG_PREFIXES);
  requireEmptyPreamble(map, ADD_TAG_USAGE);
  const namespace = parseNamespace(map, ADD_TAG_USAGE);
  requirePrefixes(map, ADD_TAG_USAGE, Prefix.Tag);
  map.verifyNoDuplicatePrefixesFor(ADD_TAG_USAGE, ...TAG_PREFIXES);
  return { group: 'tag', kind: 'add', namespace, tag: parseTag(requireValue(map, Prefix.Tag, ADD_TAG_USAGE)) };
}

export function parseEditTag(args: string): Command {
  const map = tokenize(args, ...TAG_PREFIXES);
  const index = parseIndexPreamble(map.getPreamble(), EDIT_TAG_USAGE);
  const namespace = parseNamespace(map, EDIT_TAG_USAGE);
  requirePrefixes(map, EDIT_TAG_USAGE, Prefix.Tag);
  map.verifyNoDuplicatePrefixesFor(EDIT_TAG_USAGE, ...TAG_PREFIXES);
  return {
    group: 'tag',
    kind: 'edit',
    namespace,
    index,
    name: parseTag(requireValue(map, Prefix.Tag, EDIT_TAG_USAGE)),
  };
}

export function parseDeleteTag(args: string): Command {
  const map = tokenize(args, Prefix.ContactTags, Prefix.SaleTags);
  const index = parseIndexPreamble(map.getPreamble(), DELETE_TAG_USAGE);
  const namespace = parseNamespace(map, DELETE_TAG_USAGE);
  return { group: 'tag', kind: 'delete', namespace, index };
}

export function parseFindTag(args: string): Command {
  const map = tokenize(args, ...TAG_PREFIXES);
  requireEmptyPreamble(map, FIND_TAG_USAGE);
  const namespace = parseNamespace(map, FIND_TAG_USAGE);
  requirePrefixes(map, FIND_TAG_USAGE, Prefix.Tag);
  map.verifyNoDuplicatePrefixesFor(FIND_TAG_USAGE, ...TAG_PREFIXES);
  return { group: 'tag', kind: 'find', namespace, tag: parseTag(requireValue(map, Prefix.Tag, FIND_TAG_USAGE)) };
}

export const TAG_PARSERS: readonly ParserEntry[] = [
  ['add', parseAddTag],
  ['edit', parseEditTag],
  ['delete', parseDeleteTag],
  ['list', () => ({ group: 'tag', kind: 'list' })],
  ['find', parseFindTag],
];
