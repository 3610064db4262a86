/**
 * @fileoverview Contact command execution
 */

import { type Comparator, reversed } from '../model/views';
import {
  type Person,
  comparePersonsByEmail,
  comparePersonsByName,
  createPerson,
  formatPerson,
} from '../model/person';
import type { CommandContext } from './context';
import { assertNever, commandResult } from './result';
import { plural, resolveIndex } from './support';
import type { ContactCommand, CommandResult, PersonChanges, PersonSortKey } from './types';

const SORT_COMPARATORS: Record<PersonSortKey, Comparator<Person>> = {
  name: comparePersonsByName,
  email: comparePersonsByEmail,
};

export function editPerson(target: Person, changes: PersonChanges): Person {
  return createPerson({
    name: changes.name ?? target.name,
    phone: changes.phone ?? target.phone,
    email: changes.email ?? target.email,
    address: changes.address ?? target.address,
    remark: changes.remark ?? target.remark,
    tags: changes.tags ?? target.tags,
  });
}

/**
 * Whole-word, case-insensitive match of any keyword against the name
 */
export function nameMatchesAnyKeyword(keywords: readonly string[]): (person: Person) => boolean {
  const wanted = keywords.map((keyword) => keyword.toLowerCase());
  return (person) => {
    const words = person.name.value.toLowerCase().split(/\s+/);
    return wanted.some((keyword) => words.includes(keyword));
  };
}

export function executeContact(command: ContactCommand, { store }: CommandContext): CommandResult {
  switch (command.kind) {
    case 'add': {
      store.add('person', command.person);
      store.updatePersonFilter();
      return commandResult(`New contact added: ${formatPerson(command.person)}`, { panel: 'contact' });
    }

    case 'edit': {
      const target = resolveIndex(store.sortedPersons, command.index, 'contact');
      const edited = editPerson(target, command.changes);
      store.replace('person', target, edited);
      // Filters hold the old contact by value
      store.updatePersonFilter();
      store.updateSaleFilter();
      return commandResult(`Edited contact: ${formatPerson(edited)}`, { panel: 'contact' });
    }

    case 'delete': {
      const target = resolveIndex(store.sortedPersons, command.index, 'contact');
      store.remove('person', target);
      store.updateSaleFilter();
      return commandResult(`Deleted contact: ${formatPerson(target)}`, { panel: 'contact' });
    }

    case 'list':
      store.updatePersonFilter();
      return commandResult('Listed all contacts', { panel: 'contact' });

    case 'find': {
      store.updatePersonFilter(nameMatchesAnyKeyword(command.keywords));
      return commandResult(`${plural(store.sortedPersons.size, 'contact')} listed!`, { panel: 'contact' });
    }

    case 'sort': {
      const comparator = SORT_COMPARATORS[command.key];
      store.updatePersonSort(command.descending ? reversed(comparator) : comparator);
      const order = command.descending ? 'descending' : 'ascending';
      return commandResult(`Sorted contacts by ${command.key} in ${order} order`, { panel: 'contact' });
    }

    default:
      return assertNever(command);
  }
}
