import { EMPTY_STATE } from '../model/address-book';
import type { CommandContext } from './context';
import { MESSAGE_CLEARED, MESSAGE_EXIT, MESSAGE_HELP } from './messages';
import { assertNever, commandResult } from './result';
import type { CommandResult, GeneralCommand } from './types';

export function executeGeneral(command: GeneralCommand, { store }: CommandContext): CommandResult {
  switch (command.kind) {
    case 'help':
      return commandResult(MESSAGE_HELP, { showHelp: true });

    case 'exit':
      return commandResult(MESSAGE_EXIT, { exit: true });

    case 'clear':
      store.resetData(EMPTY_STATE);
      store.updatePersonFilter();
      store.updateSaleFilter();
      return commandResult(MESSAGE_CLEARED, { clear: true });

    default:
      return assertNever(command);
  }
}
