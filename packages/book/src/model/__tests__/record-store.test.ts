import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { TagName } from '@salesbook/core';
import { comparePersonsByEmail } from '../person';
import { RecordStore } from '../record-store';
import { reversed } from '../views';
import { ALICE, BENSON, CARL, CHAIR_SALE, LAMP_SALE, silentLogger, typicalState } from '../../testing/fixtures';
import { PersonBuilder } from '../../testing/builders';

describe('RecordStore', () => {
  let store: RecordStore;

  beforeEach(() => {
    store = new RecordStore({ state: typicalState(), logger: silentLogger() });
  });

  it('starts with default preferences', () => {
    expect(store.preferences).toEqual({ locale: 'en-US', currency: 'USD' });
    store.setPreferences({ currency: 'EUR' });
    expect(store.preferences).toEqual({ locale: 'en-US', currency: 'EUR' });
  });

  it('sorts persons by name and follows additions', () => {
    const aaron = PersonBuilder.create().withName('Aaron Ng').withEmail('aaron@example.com').build();
    store.add('person', aaron);
    expect(store.sortedPersons.toArray()).toEqual([aaron, ALICE, BENSON, CARL]);
  });

  it('filters and sorts persons together', () => {
    store.updatePersonFilter((person) => person.tags.length > 0);
    expect(store.sortedPersons.toArray()).toEqual([ALICE, BENSON]);

    store.updatePersonSort(reversed(comparePersonsByEmail));
    expect(store.sortedPersons.toArray()).toEqual([BENSON, ALICE]);
  });

  it('resets the person sort when the filter changes', () => {
    store.updatePersonSort(reversed(comparePersonsByEmail));
    store.updatePersonFilter();
    expect(store.sortedPersons.toArray()).toEqual([ALICE, BENSON, CARL]);
  });

  it('sorts sales by date over the sale filter', () => {
    expect(store.sortedSales.toArray()).toEqual([LAMP_SALE, CHAIR_SALE]);
    store.updateSaleFilter((sale) => sale.buyer === BENSON);
    expect(store.sortedSales.toArray()).toEqual([CHAIR_SALE]);
    store.updateSaleFilter();
    expect(store.sortedSales.size).toBe(2);
  });

  it('notifies views once per committed mutation', () => {
    const listener = jest.fn();
    store.sortedSales.subscribe(listener);
    store.remove('person', ALICE);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.sortedSales.toArray()).toEqual([CHAIR_SALE]);
  });

  it('builds independent views on demand', () => {
    const view = store.filteredView('sale', (sale) => sale.quantity.value > 1);
    expect(view.toArray()).toEqual([LAMP_SALE]);
    const byItem = store.sortedView('sale', (a, b) => a.itemName.value.localeCompare(b.itemName.value));
    expect(byItem.toArray()).toEqual([LAMP_SALE, CHAIR_SALE]);
  });

  it('exposes tags by namespace', () => {
    expect(store.tags('sale')).toBe(store.saleTags);
    store.addTag('sale', TagName.of('bulk'));
    expect(store.saleTags.toArray().map((tag) => tag.value)).toEqual(['bulk', 'retail']);
  });

  it('snapshots state and preferences', () => {
    const { state, preferences } = store.snapshot();
    expect(state.records.person).toEqual([ALICE, BENSON, CARL]);
    expect(preferences.locale).toBe('en-US');
  });
});
