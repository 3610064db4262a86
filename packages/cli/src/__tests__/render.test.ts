import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryStorage, LogicManager, fixedClock } from '@salesbook/book';
import { AddressBookErrorCode, DateTime, Logger, LogLevel, StorageError } from '@salesbook/core';
import { panelLines, renderError, renderResult, statisticsRows } from '../render';

const plain = { colors: false };

async function seededLogic(): Promise<LogicManager> {
  const logic = await LogicManager.create({
    storage: new InMemoryStorage(),
    logger: new Logger({ level: LogLevel.Silent }),
    clock: fixedClock(DateTime.of('2023-08-20 12:00')),
  });
  await logic.execute('contact add n/Dana Lee p/91112222 e/dana@example.com a/1 Main St t/vip');
  await logic.execute('contact add n/Ben Ong p/93334444 e/ben@example.com a/2 Side Rd');
  await logic.execute('sale add i/1 n/Desk lamp d/2023-08-01 10:00 p/19.90 q/2 t/retail');
  return logic;
}

describe('render', () => {
  let logic: LogicManager;

  beforeEach(async () => {
    logic = await seededLogic();
  });

  it('numbers the displayed contacts', () => {
    expect(panelLines(logic, 'contact')).toEqual([
      '1. Ben Ong; Phone: 93334444; Email: ben@example.com; Address: 2 Side Rd',
      '2. Dana Lee; Phone: 91112222; Email: dana@example.com; Address: 1 Main St; Tags: [vip]',
    ]);
  });

  it('lists both tag namespaces', () => {
    expect(panelLines(logic, 'tag')).toEqual(['Contact tags:', '  1. vip', 'Sale tags:', '  1. retail']);
  });

  it('prints feedback followed by the panel', async () => {
    const result = await logic.execute('sale list');
    expect(renderResult(result, logic, plain)).toBe(
      'Listed 1 sale\n'
        + '1. Desk lamp sold to Ben Ong; Date: 2023-08-01 10:00; Unit price: $19.90; Quantity: 2; Total: $39.80; '
        + 'Tags: [retail]'
    );
  });

  it('prints only feedback for an empty panel', async () => {
    const result = await logic.execute('meeting list');
    expect(renderResult(result, logic, plain)).toBe('Listed 0 meetings');
  });

  it('tabulates statistics', async () => {
    const result = await logic.execute('sale stats mo/2');
    expect(result.statistics && statisticsRows(result.statistics)).toEqual([
      ['Month', 'Sales'],
      ['Jul 2023', '0'],
      ['Aug 2023', '1'],
    ]);
    const output = renderResult(result, logic, plain);
    expect(output.startsWith('Sales per month over the last 2 months:\nJul 2023: 0\nAug 2023: 1\n')).toBe(true);
    expect(output).toContain('Aug 2023');
  });

  it('prints error messages', () => {
    const error = new StorageError(AddressBookErrorCode.StorageSaveFailed, 'Could not save the address book');
    expect(renderError(error, plain)).toBe('Could not save the address book');
  });
});
