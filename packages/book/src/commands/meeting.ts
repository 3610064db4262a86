import { createMeeting, formatMeeting } from '../model/meeting';
import type { CommandContext } from './context';
import { assertNever, commandResult } from './result';
import { formatStatistics, monthlyCounts, plural, resolveIndex } from './support';
import type { CommandResult, MeetingCommand } from './types';

export function executeMeeting(command: MeetingCommand, context: CommandContext): CommandResult {
  const { store } = context;

  switch (command.kind) {
    case 'add': {
      const person = resolveIndex(store.sortedPersons, command.contactIndex, 'contact');
      const meeting = createMeeting({
        person,
        message: command.message,
        start: command.start,
        duration: command.duration,
      });
      store.add('meeting', meeting);
      return commandResult(`New meeting added: ${formatMeeting(meeting)}`, { panel: 'meeting' });
    }

    case 'edit': {
      const target = resolveIndex(store.sortedMeetings, command.index, 'meeting');
      const { changes } = command;
      const edited = createMeeting({
        person: changes.contactIndex
          ? resolveIndex(store.sortedPersons, changes.contactIndex, 'contact')
          : target.person,
        message: changes.message ?? target.message,
        start: changes.start ?? target.start,
        duration: changes.duration ?? target.duration,
      });
      store.replace('meeting', target, edited);
      return commandResult(`Edited meeting: ${formatMeeting(edited)}`, { panel: 'meeting' });
    }

    case 'delete': {
      const target = resolveIndex(store.sortedMeetings, command.index, 'meeting');
      store.remove('meeting', target);
      return commandResult(`Deleted meeting: ${formatMeeting(target)}`, { panel: 'meeting' });
    }

    case 'list':
      return commandResult(`Listed ${plural(store.sortedMeetings.size, 'meeting')}`, { panel: 'meeting' });

    case 'stats': {
      const months = command.months ?? context.config.statisticsMonths;
      const rows = monthlyCounts(
        store.records('meeting'),
        (meeting) => meeting.start,
        context.clock.now().monthAndYear,
        months
      );
      return commandResult(formatStatistics(`Meetings per month over the last ${plural(months, 'month')}:`, rows), {
        statistics: { group: 'meeting', rows },
        panel: 'meeting',
      });
    }

    default:
      return assertNever(command);
  }
}
