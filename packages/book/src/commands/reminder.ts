import { createReminder, formatReminder, isOverdue } from '../model/reminder';
import type { CommandContext } from './context';
import { assertNever, commandResult } from './result';
import { plural, resolveIndex } from './support';
import type { CommandResult, ReminderCommand } from './types';

export function executeReminder(command: ReminderCommand, context: CommandContext): CommandResult {
  const { store } = context;

  switch (command.kind) {
    case 'add': {
      const person = resolveIndex(store.sortedPersons, command.contactIndex, 'contact');
      const reminder = createReminder({ person, message: command.message, scheduledAt: command.scheduledAt });
      store.add('reminder', reminder);
      return commandResult(`New reminder added: ${formatReminder(reminder)}`, { panel: 'reminder' });
    }

    case 'edit': {
      const target = resolveIndex(store.sortedReminders, command.index, 'reminder');
      const { changes } = command;
      const edited = createReminder({
        person: changes.contactIndex
          ? resolveIndex(store.sortedPersons, changes.contactIndex, 'contact')
          : target.person,
        message: changes.message ?? target.message,
        scheduledAt: changes.scheduledAt ?? target.scheduledAt,
      });
      store.replace('reminder', target, edited);
      return commandResult(`Edited reminder: ${formatReminder(edited)}`, { panel: 'reminder' });
    }

    case 'delete': {
      const target = resolveIndex(store.sortedReminders, command.index, 'reminder');
      store.remove('reminder', target);
      return commandResult(`Deleted reminder: ${formatReminder(target)}`, { panel: 'reminder' });
    }

    case 'list': {
      const now = context.clock.now();
      const overdue = store.sortedReminders.toArray().filter((reminder) => isOverdue(reminder, now)).length;
      const summary = `Listed ${plural(store.sortedReminders.size, 'reminder')}`;
      return commandResult(overdue > 0 ? `${summary} (${overdue} overdue)` : summary, { panel: 'reminder' });
    }

    default:
      return assertNever(command);
  }
}
