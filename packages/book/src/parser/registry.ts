/**
 * @fileoverview Two-level parser dispatch: group word, then command word
 */

import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { MESSAGE_UNKNOWN_COMMAND } from '../commands/messages';
import { CONTACT_PARSERS } from './contact-parsers';
import { MEETING_PARSERS } from './meeting-parsers';
import { REMINDER_PARSERS } from './reminder-parsers';
import { SALE_PARSERS } from './sale-parsers';
import { TAG_PARSERS } from './tag-parsers';
import type { CommandParser, ParserEntry } from './types';

/** Words that are whole commands and can never name a group */
export const GENERAL_COMMAND_WORDS: readonly string[] = ['help', 'exit', 'clear'];

export class CommandParserRegistry {
  private readonly groups = new Map<string, Map<string, CommandParser>>();

  /**
   * Register the command words of a group. Throws ParseError when the group
   * is already registered or a command word appears twice.
   */
  registerGroup(group: string, entries: readonly ParserEntry[]): this {
    if (this.groups.has(group) || GENERAL_COMMAND_WORDS.includes(group)) {
      throw new ParseError(AddressBookErrorCode.DuplicateGroup, `Command group "${group}" is already defined`, {
        field: group,
      });
    }

    const parsers = new Map<string, CommandParser>();
    for (const [commandWord, parser] of entries) {
      if (parsers.has(commandWord)) {
        throw new ParseError(
          AddressBookErrorCode.DuplicateCommandWord,
          `Command word "${commandWord}" is defined twice in group "${group}"`,
          { field: commandWord }
        );
      }
      parsers.set(commandWord, parser);
    }

    this.groups.set(group, parsers);
    return this;
  }

  hasGroup(group: string): boolean {
    return this.groups.has(group);
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  commandWords(group: string): string[] {
    return [...(this.groups.get(group)?.keys() ?? [])];
  }

  resolve(group: string, commandWord: string): CommandParser {
    const parser = this.groups.get(group)?.get(commandWord);
    if (!parser) {
      throw new ParseError(AddressBookErrorCode.UnknownCommand, MESSAGE_UNKNOWN_COMMAND, {
        field: commandWord,
        context: { operation: `${group} ${commandWord}` },
      });
    }
    return parser;
  }
}

export function createDefaultRegistry(): CommandParserRegistry {
  return new CommandParserRegistry()
    .registerGroup('contact', CONTACT_PARSERS)
    .registerGroup('meeting', MEETING_PARSERS)
    .registerGroup('reminder', REMINDER_PARSERS)
    .registerGroup('sale', SALE_PARSERS)
    .registerGroup('tag', TAG_PARSERS);
}
