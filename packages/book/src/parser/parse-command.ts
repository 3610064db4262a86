import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { MESSAGE_HELP, MESSAGE_UNKNOWN_COMMAND, invalidFormat } from '../commands/messages';
import type { Command, GeneralCommand } from '../commands/types';
import type { CommandParserRegistry } from './registry';

const GENERAL_COMMANDS = new Map<string, GeneralCommand>([
  ['help', { group: 'general', kind: 'help' }],
  ['exit', { group: 'general', kind: 'exit' }],
  ['clear', { group: 'general', kind: 'clear' }],
]);

function splitFirstWord(text: string): { word: string; rest: string } {
  const match = /^(\S*)([\s\S]*)$/.exec(text);
  return match ? { word: match[1], rest: match[2] } : { word: '', rest: '' };
}

/**
 * Parse `help`, `exit`, `clear` or `<group> <command word> <arguments>`
 */
export function parseCommand(text: string, registry: CommandParserRegistry): Command {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new ParseError(AddressBookErrorCode.InvalidCommandFormat, invalidFormat(MESSAGE_HELP));
  }

  const { word: group, rest } = splitFirstWord(trimmed);
  const general = GENERAL_COMMANDS.get(group);
  if (general) {
    return general;
  }

  if (!registry.hasGroup(group)) {
    throw new ParseError(AddressBookErrorCode.UnknownCommand, MESSAGE_UNKNOWN_COMMAND, { field: group });
  }

  const { word: commandWord, rest: args } = splitFirstWord(rest.trimStart());
  if (commandWord === '') {
    throw new ParseError(
      AddressBookErrorCode.InvalidCommandFormat,
      invalidFormat(`${group} ${registry.commandWords(group).join(' | ')}`),
      { field: group }
    );
  }

  return registry.resolve(group, commandWord)(args);
}
