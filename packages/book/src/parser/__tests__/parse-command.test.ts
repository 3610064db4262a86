import { describe, it, expect } from '@jest/globals';
import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { MESSAGE_HELP, MESSAGE_UNKNOWN_COMMAND } from '../../commands/messages';
import { parseCommand } from '../parse-command';
import { CommandParserRegistry, createDefaultRegistry } from '../registry';

function catchParseError(run: () => unknown): ParseError {
  try {
    run();
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('parseCommand', () => {
  const registry = createDefaultRegistry();

  it('maps general commands directly', () => {
    expect(parseCommand('help', registry)).toEqual({ group: 'general', kind: 'help' });
    expect(parseCommand('  exit  ', registry)).toEqual({ group: 'general', kind: 'exit' });
    expect(parseCommand('clear', registry)).toEqual({ group: 'general', kind: 'clear' });
  });

  it('dispatches on group then command word', () => {
    expect(parseCommand('contact list', registry)).toEqual({ group: 'contact', kind: 'list' });
    expect(parseCommand('tag   list', registry)).toEqual({ group: 'tag', kind: 'list' });
    expect(parseCommand('meeting delete 2', registry)).toMatchObject({ group: 'meeting', kind: 'delete' });
  });

  it('rejects empty input with the help text', () => {
    const error = catchParseError(() => parseCommand('   ', registry));
    expect(error.code).toBe(AddressBookErrorCode.InvalidCommandFormat);
    expect(error.message).toBe(`Invalid command format!\n${MESSAGE_HELP}`);
  });

  it('rejects unknown groups and command words', () => {
    const group = catchParseError(() => parseCommand('person add n/Amy', registry));
    expect(group.code).toBe(AddressBookErrorCode.UnknownCommand);
    expect(group.message).toBe(MESSAGE_UNKNOWN_COMMAND);

    const word = catchParseError(() => parseCommand('sale refund 1', registry));
    expect(word.code).toBe(AddressBookErrorCode.UnknownCommand);
    expect(word.field).toBe('refund');
  });

  it('lists the command words of a bare group', () => {
    const error = catchParseError(() => parseCommand('reminder', registry));
    expect(error.message).toBe('Invalid command format!\nreminder add | edit | delete | list');
  });
});

describe('CommandParserRegistry', () => {
  it('refuses a group registered twice', () => {
    const registry = new CommandParserRegistry().registerGroup('contact', []);
    expect(catchParseError(() => registry.registerGroup('contact', [])).code).toBe(AddressBookErrorCode.DuplicateGroup);
  });

  it('refuses general command words as group names', () => {
    expect(catchParseError(() => new CommandParserRegistry().registerGroup('help', [])).code)
      .toBe(AddressBookErrorCode.DuplicateGroup);
  });

  it('refuses a command word defined twice in a group', () => {
    const list = (): { group: 'tag'; kind: 'list' } => ({ group: 'tag', kind: 'list' });
    const error = catchParseError(() => new CommandParserRegistry().registerGroup('tag', [['list', list], ['list', list]]));
    expect(error.code).toBe(AddressBookErrorCode.DuplicateCommandWord);
    expect(error.field).toBe('list');
  });

  it('keeps registration order', () => {
    expect(createDefaultRegistry().groupNames()).toEqual(['contact', 'meeting', 'reminder', 'sale', 'tag']);
  });
});
