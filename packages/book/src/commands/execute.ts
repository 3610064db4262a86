import { executeContact } from './contact';
import type { CommandContext } from './context';
import { executeGeneral } from './general';
import { executeMeeting } from './meeting';
import { executeReminder } from './reminder';
import { assertNever } from './result';
import { executeSale } from './sale';
import { executeTag } from './tag';
import type { Command, CommandResult } from './types';

/**
 * Run a parsed command against the store. Either the whole mutation is
 * applied or the store is left as it was and the error is thrown.
 */
export function executeCommand(command: Command, context: CommandContext): CommandResult {
  context.logger.debug(`Executing ${command.group} ${command.kind}`);

  switch (command.group) {
    case 'general':
      return executeGeneral(command, context);
    case 'contact':
      return executeContact(command, context);
    case 'meeting':
      return executeMeeting(command, context);
    case 'reminder':
      return executeReminder(command, context);
    case 'sale':
      return executeSale(command, context);
    case 'tag':
      return executeTag(command, context);
    default:
      return assertNever(command);
  }
}
