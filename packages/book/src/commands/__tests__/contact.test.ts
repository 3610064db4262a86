import { describe, it, expect, beforeEach } from '@jest/globals';
import { AddressBookErrorCode, CommandError, ParseError } from '@salesbook/core';
import type { CommandContext } from '../context';
import { ALICE, BENSON, CARL, createTestContext, runCommand, typicalState } from '../../testing/fixtures';

describe('contact commands', () => {
  let context: CommandContext;

  beforeEach(() => {
    context = createTestContext({ state: typicalState() });
  });

  it('adds a contact given every prefix', () => {
    const result = runCommand(context, 'contact add n/Dana Lee p/91112222 e/dana@example.com a/1 Main St r/Met at expo t/vip');
    expect(result.feedbackToUser).toBe(
      'New contact added: Dana Lee; Phone: 91112222; Email: dana@example.com; Address: 1 Main St; '
        + 'Remark: Met at expo; Tags: [vip]'
    );
    expect(result.panel).toBe('contact');
    expect(context.store.sortedPersons.size).toBe(4);
    expect(context.store.contactTags.toArray().map((tag) => tag.value)).toEqual(['friends', 'owesMoney', 'vip']);
  });

  it('names the missing prefix and adds nothing', () => {
    try {
      runCommand(context, 'contact add n/Dana Lee p/91112222 a/1 Main St');
      throw new Error('expected a ParseError');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.field).toBe('e/');
        expect(error.message).toContain('Missing prefix: e/');
      }
    }
    expect(context.store.sortedPersons.size).toBe(3);
  });

  it('refuses a duplicate contact', () => {
    expect(() => runCommand(context, 'contact add n/Carl Kurz p/95352563 e/heinz@example.com a/wall street'))
      .toThrow('This contact already exists in the address book');
    expect(context.store.sortedPersons.size).toBe(3);
  });

  it('edits the contact at a displayed index and updates its records', () => {
    const result = runCommand(context, 'contact edit 1 n/Alice Tan');
    expect(result.feedbackToUser).toBe(
      'Edited contact: Alice Tan; Phone: 94351253; Email: alice@example.com; '
        + 'Address: 123, Jurong West Ave 6, #08-111; Tags: [friends]'
    );
    expect(context.store.sortedMeetings.get(0)?.person.name.value).toBe('Alice Tan');
    expect(context.store.sortedSales.get(0)?.buyer.name.value).toBe('Alice Tan');
  });

  it('shows every sale again after the listed buyer is edited', () => {
    runCommand(context, 'sale list i/1');
    expect(context.store.sortedSales.size).toBe(1);

    runCommand(context, 'contact edit 1 p/90001111');
    expect(context.store.sortedSales.toArray().map((sale) => sale.buyer.name.value)).toEqual([
      'Alice Pauline',
      'Benson Meier',
    ]);
  });

  it('leaves the list unchanged for an index past the end', () => {
    try {
      runCommand(context, 'contact delete 4');
      throw new Error('expected a CommandError');
    } catch (error) {
      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.code).toBe(AddressBookErrorCode.IndexOutOfRange);
        expect(error.message).toBe('The contact index provided is invalid');
      }
    }
    expect(context.store.sortedPersons.size).toBe(3);
  });

  it('deletes a contact with its meetings and sales', () => {
    const result = runCommand(context, 'contact delete 1');
    expect(result.feedbackToUser).toBe(
      'Deleted contact: Alice Pauline; Phone: 94351253; Email: alice@example.com; '
        + 'Address: 123, Jurong West Ave 6, #08-111; Tags: [friends]'
    );
    expect(context.store.sortedPersons.toArray()).toEqual([BENSON, CARL]);
    expect(context.store.sortedMeetings.size).toBe(0);
    expect(context.store.sortedSales.size).toBe(1);
  });

  it('finds contacts by whole name words', () => {
    expect(runCommand(context, 'contact find ALICE kurz').feedbackToUser).toBe('2 contacts listed!');
    expect(context.store.sortedPersons.toArray()).toEqual([ALICE, CARL]);

    expect(runCommand(context, 'contact find ali').feedbackToUser).toBe('0 contacts listed!');
    expect(runCommand(context, 'contact list').feedbackToUser).toBe('Listed all contacts');
    expect(context.store.sortedPersons.size).toBe(3);
  });

  it('resolves indexes against the filtered list', () => {
    runCommand(context, 'contact find carl');
    runCommand(context, 'contact delete 1');
    expect(context.store.records('person').toArray()).toEqual([ALICE, BENSON]);
  });

  it('sorts by email in descending order', () => {
    const result = runCommand(context, 'contact sort e/desc');
    expect(result.feedbackToUser).toBe('Sorted contacts by email in descending order');
    expect(context.store.sortedPersons.toArray()).toEqual([BENSON, CARL, ALICE]);
  });
});
