/**
 * @fileoverview User-facing messages shared by parsers and commands
 */

export const MESSAGE_UNKNOWN_COMMAND = 'Unknown command';

export const MESSAGE_INVALID_COMMAND_FORMAT = 'Invalid command format!';

export function invalidFormat(usage: string, reason?: string): string {
  return reason
    ? `${MESSAGE_INVALID_COMMAND_FORMAT} ${reason}\n${usage}`
    : `${MESSAGE_INVALID_COMMAND_FORMAT}\n${usage}`;
}

export function invalidIndex(noun: string): string {
  return `The ${noun} index provided is invalid`;
}

export const MESSAGE_HELP = [
  'Commands:',
  '  help | exit | clear',
  '  contact add | edit | delete | list | find | sort',
  '  meeting add | edit | delete | list | stats',
  '  reminder add | edit | delete | list',
  '  sale add | edit | delete | list | stats',
  '  tag add | edit | delete | list | find',
  'Type a command without arguments to see its format.',
].join('\n');

export const MESSAGE_EXIT = 'Exiting SalesBook as requested ...';

export const MESSAGE_CLEARED = 'SalesBook has been cleared!';
