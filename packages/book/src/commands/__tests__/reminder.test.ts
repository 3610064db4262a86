import { describe, it, expect } from '@jest/globals';
import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { EMPTY_STATE } from '../../model/address-book';
import { ALICE, BENSON, createTestContext, runCommand, typicalState } from '../../testing/fixtures';

describe('reminder commands', () => {
  const twoContacts = {
    ...EMPTY_STATE,
    records: { ...EMPTY_STATE.records, person: [ALICE, BENSON] },
  };

  it('adds a reminder for the second contact', () => {
    const context = createTestContext({ state: twoContacts });
    const result = runCommand(context, 'reminder add i/2 m/Call Amy d/2023-08-01');
    expect(result.feedbackToUser).toBe('New reminder added: Call Amy (Benson Meier); Date: 2023-08-01 00:00');
    expect(context.store.sortedReminders.size).toBe(1);
    expect(context.store.sortedReminders.get(0)?.person).toBe(BENSON);
  });

  it('rejects an index written before the prefixes', () => {
    const context = createTestContext({ state: twoContacts });
    try {
      runCommand(context, 'reminder add 1 i/2 m/Call Amy d/2023-08-01');
      throw new Error('expected a ParseError');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.code).toBe(AddressBookErrorCode.UnexpectedPreamble);
      }
    }
    expect(context.store.sortedReminders.size).toBe(0);
  });

  it('reports overdue reminders in the list', () => {
    const context = createTestContext({ state: typicalState() });
    expect(runCommand(context, 'reminder list').feedbackToUser).toBe('Listed 1 reminder (1 overdue)');
    runCommand(context, 'reminder edit 1 d/2023-09-01 09:00');
    expect(runCommand(context, 'reminder list').feedbackToUser).toBe('Listed 1 reminder');
  });

  it('deletes a reminder', () => {
    const context = createTestContext({ state: typicalState() });
    expect(runCommand(context, 'reminder delete 1').feedbackToUser).toBe(
      'Deleted reminder: Send quote (Benson Meier); Date: 2023-07-20 09:00'
    );
    expect(context.store.sortedReminders.size).toBe(0);
  });
});
