import { describe, it, expect, beforeEach } from '@jest/globals';
import { NotFoundError } from '@salesbook/core';
import type { CommandContext } from '../context';
import { CHAIR_SALE, LAMP_SALE, createTestContext, runCommand, typicalState } from '../../testing/fixtures';

describe('sale commands', () => {
  let context: CommandContext;

  beforeEach(() => {
    context = createTestContext({ state: typicalState() });
  });

  it('adds a sale and registers its tags', () => {
    const result = runCommand(context, 'sale add i/3 n/Blue Pen d/2023-08-18 10:30 p/1.50 q/20 t/stationery');
    expect(result.feedbackToUser).toBe(
      'New sale added: Blue Pen sold to Carl Kurz; Date: 2023-08-18 10:30; Unit price: $1.50; '
        + 'Quantity: 20; Total: $30.00; Tags: [stationery]'
    );
    expect(context.store.saleTags.toArray().map((tag) => tag.value)).toEqual(['retail', 'stationery']);
    expect(context.store.sortedSales.size).toBe(3);
  });

  it('edits the quantity', () => {
    expect(runCommand(context, 'sale edit 2 q/3').feedbackToUser).toBe(
      'Edited sale: Office chair sold to Benson Meier; Date: 2023-08-15 11:00; Unit price: $149.00; '
        + 'Quantity: 3; Total: $447.00'
    );
  });

  it('formats prices with the preferred currency', () => {
    context.store.setPreferences({ currency: 'EUR' });
    expect(runCommand(context, 'sale delete 1').feedbackToUser).toBe(
      'Deleted sale: Desk lamp sold to Alice Pauline; Date: 2023-07-03 14:30; Unit price: €19.90; '
        + 'Quantity: 2; Total: €39.80; Tags: [retail]'
    );
  });

  it('leaves the store untouched when the sale cannot be displayed', () => {
    const broken = createTestContext({ state: typicalState(), preferences: { locale: 'not a locale!!' } });

    expect(() => runCommand(broken, 'sale add i/3 n/Blue Pen d/2023-08-18 10:30 p/1.50 q/20 t/stationery'))
      .toThrow(RangeError);
    expect(() => runCommand(broken, 'sale delete 1')).toThrow(RangeError);

    expect(broken.store.records('sale').toArray()).toEqual([LAMP_SALE, CHAIR_SALE]);
    expect(broken.store.saleTags.toArray().map((tag) => tag.value)).toEqual(['retail']);
  });

  it('lists sales by contact, by tag and all', () => {
    expect(runCommand(context, 'sale list i/1').feedbackToUser).toBe('Listed 1 sale to Alice Pauline');
    expect(context.store.sortedSales.toArray()).toEqual([LAMP_SALE]);

    expect(runCommand(context, 'sale list t/retail').feedbackToUser).toBe('Listed 1 sale tagged retail');
    expect(runCommand(context, 'sale list').feedbackToUser).toBe('Listed 2 sales');
    expect(context.store.sortedSales.toArray()).toEqual([LAMP_SALE, CHAIR_SALE]);
  });

  it('refuses to list by a tag that does not exist', () => {
    expect(() => runCommand(context, 'sale list t/wholesale')).toThrow(NotFoundError);
    expect(() => runCommand(context, 'sale list t/wholesale')).toThrow('The sale tag wholesale does not exist');
  });

  it('resolves sale indexes against the filtered list', () => {
    runCommand(context, 'sale list i/2');
    runCommand(context, 'sale delete 1');
    expect(context.store.records('sale').toArray()).toEqual([LAMP_SALE]);
  });

  it('counts sales per month', () => {
    const result = runCommand(context, 'sale stats mo/2');
    expect(result.feedbackToUser).toBe('Sales per month over the last 2 months:\nJul 2023: 1\nAug 2023: 1');
    expect(result.statistics?.group).toBe('sale');
  });
});
