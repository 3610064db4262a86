/**
 * @fileoverview Sale command execution
 */

import { AddressBookErrorCode, NotFoundError } from '@salesbook/core';
import { isSamePerson } from '../model/person';
import { createSale, formatSale, saleHasTag } from '../model/sale';
import type { CommandContext } from './context';
import { assertNever, commandResult } from './result';
import { formatStatistics, monthlyCounts, plural, resolveIndex } from './support';
import type { CommandResult, SaleCommand, SaleListFilter } from './types';

function listSales(filter: SaleListFilter, { store }: CommandContext): CommandResult {
  switch (filter.by) {
    case 'all':
      store.updateSaleFilter();
      return commandResult(`Listed ${plural(store.sortedSales.size, 'sale')}`, { panel: 'sale' });

    case 'contact': {
      const buyer = resolveIndex(store.sortedPersons, filter.contactIndex, 'contact');
      store.updateSaleFilter((sale) => isSamePerson(sale.buyer, buyer));
      return commandResult(
        `Listed ${plural(store.sortedSales.size, 'sale')} to ${buyer.name.value}`,
        { panel: 'sale' }
      );
    }

    case 'tag': {
      const { tag } = filter;
      if (!store.hasTag('sale', tag)) {
        throw new NotFoundError(AddressBookErrorCode.TagNotFound, `The sale tag ${tag.value} does not exist`, {
          field: 'tag',
        });
      }
      store.updateSaleFilter((sale) => saleHasTag(sale, tag));
      return commandResult(`Listed ${plural(store.sortedSales.size, 'sale')} tagged ${tag.value}`, { panel: 'sale' });
    }

    default:
      return assertNever(filter);
  }
}

export function executeSale(command: SaleCommand, context: CommandContext): CommandResult {
  const { store } = context;
  const priceFormat = store.preferences;

  switch (command.kind) {
    case 'add': {
      const buyer = resolveIndex(store.sortedPersons, command.contactIndex, 'contact');
      const sale = createSale({
        buyer,
        itemName: command.itemName,
        datetime: command.datetime,
        unitPrice: command.unitPrice,
        quantity: command.quantity,
        tags: command.tags,
      });
      const feedback = `New sale added: ${formatSale(sale, priceFormat)}`;
      store.add('sale', sale);
      return commandResult(feedback, { panel: 'sale' });
    }

    case 'edit': {
      const target = resolveIndex(store.sortedSales, command.index, 'sale');
      const { changes } = command;
      const edited = createSale({
        buyer: changes.contactIndex
          ? resolveIndex(store.sortedPersons, changes.contactIndex, 'contact')
          : target.buyer,
        itemName: changes.itemName ?? target.itemName,
        datetime: changes.datetime ?? target.datetime,
        unitPrice: changes.unitPrice ?? target.unitPrice,
        quantity: changes.quantity ?? target.quantity,
        tags: changes.tags ?? target.tags,
      });
      const feedback = `Edited sale: ${formatSale(edited, priceFormat)}`;
      store.replace('sale', target, edited);
      return commandResult(feedback, { panel: 'sale' });
    }

    case 'delete': {
      const target = resolveIndex(store.sortedSales, command.index, 'sale');
      const feedback = `Deleted sale: ${formatSale(target, priceFormat)}`;
      store.remove('sale', target);
      return commandResult(feedback, { panel: 'sale' });
    }

    case 'list':
      return listSales(command.filter, context);

    case 'stats': {
      const months = command.months ?? context.config.statisticsMonths;
      const rows = monthlyCounts(store.records('sale'), (sale) => sale.datetime, context.clock.now().monthAndYear, months);
      return commandResult(formatStatistics(`Sales per month over the last ${plural(months, 'month')}:`, rows), {
        statistics: { group: 'sale', rows },
        panel: 'sale',
      });
    }

    default:
      return assertNever(command);
  }
}
