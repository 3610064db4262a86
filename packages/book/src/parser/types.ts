import type { Command } from '../commands/types';

/** Turns the argument text after a command word into a command */
export type CommandParser = (args: string) => Command;

export type ParserEntry = readonly [commandWord: string, parser: CommandParser];
