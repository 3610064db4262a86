/**
 * @fileoverview Tag command execution
 *
 * Tag indexes point into the tag list of the namespace the command names.
 */

import { AddressBookErrorCode, NotFoundError, type TagName } from '@salesbook/core';
import { personHasTag } from '../model/person';
import type { TagNamespace } from '../model/record-kinds';
import { saleHasTag } from '../model/sale';
import type { RecordStore } from '../model/record-store';
import type { CommandContext } from './context';
import { assertNever, commandResult } from './result';
import { plural, resolveIndex } from './support';
import type { CommandResult, TagCommand } from './types';

function describeTags(tags: Iterable<TagName>): string {
  const names = Array.from(tags, (tag) => `[${tag.value}]`);
  return names.length > 0 ? names.join(' ') : '(none)';
}

function resetFilter(store: RecordStore, namespace: TagNamespace): void {
  if (namespace === 'contact') {
    store.updatePersonFilter();
  } else {
    store.updateSaleFilter();
  }
}

function findByTag(store: RecordStore, namespace: TagNamespace, tag: TagName): CommandResult {
  if (!store.hasTag(namespace, tag)) {
    throw new NotFoundError(AddressBookErrorCode.TagNotFound, `The ${namespace} tag ${tag.value} does not exist`, {
      field: 'tag',
    });
  }
  if (namespace === 'contact') {
    store.updatePersonFilter((person) => personHasTag(person, tag));
    return commandResult(`${plural(store.sortedPersons.size, 'contact')} tagged ${tag.value}`, { panel: 'contact' });
  }
  store.updateSaleFilter((sale) => saleHasTag(sale, tag));
  return commandResult(`${plural(store.sortedSales.size, 'sale')} tagged ${tag.value}`, { panel: 'sale' });
}

export function executeTag(command: TagCommand, { store }: CommandContext): CommandResult {
  switch (command.kind) {
    case 'add':
      store.addTag(command.namespace, command.tag);
      return commandResult(`New ${command.namespace} tag added: ${command.tag.value}`, { panel: 'tag' });

    case 'edit': {
      const target = resolveIndex(store.tags(command.namespace), command.index, `${command.namespace} tag`);
      store.renameTag(command.namespace, target, command.name);
      resetFilter(store, command.namespace);
      return commandResult(
        `Renamed ${command.namespace} tag ${target.value} to ${command.name.value}`,
        { panel: 'tag' }
      );
    }

    case 'delete': {
      const target = resolveIndex(store.tags(command.namespace), command.index, `${command.namespace} tag`);
      store.removeTag(command.namespace, target);
      resetFilter(store, command.namespace);
      return commandResult(`Deleted ${command.namespace} tag: ${target.value}`, { panel: 'tag' });
    }

    case 'list':
      return commandResult(
        `Contact tags: ${describeTags(store.contactTags)}\nSale tags: ${describeTags(store.saleTags)}`,
        { panel: 'tag' }
      );

    case 'find':
      return findByTag(store, command.namespace, command.tag);

    default:
      return assertNever(command);
  }
}
