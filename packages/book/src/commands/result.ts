import type { CommandResult } from './types';

export type CommandResultFlags = Partial<Omit<CommandResult, 'feedbackToUser'>>;

export function commandResult(feedbackToUser: string, flags: CommandResultFlags = {}): CommandResult {
  return {
    feedbackToUser,
    showHelp: false,
    exit: false,
    clear: false,
    ...flags,
  };
}

export function assertNever(value: never): never {
  throw new TypeError(`Unhandled command: ${JSON.stringify(value)}`);
}
