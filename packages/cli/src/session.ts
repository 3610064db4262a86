import inquirer from 'inquirer';
import type { LogicManager } from '@salesbook/book';
import { isAddressBookError } from '@salesbook/core';
import { type RenderOptions, renderError, renderResult } from './render';

export interface SessionIO {
  /** Next line of input, or undefined once input has ended */
  read(): Promise<string | undefined>;
  write(text: string): void;
}

interface CommandAnswer {
  command: string;
}

export function inquirerInput(): SessionIO['read'] {
  return async () => {
    const { command } = await inquirer.prompt<CommandAnswer>([
      {
        type: 'input',
        name: 'command',
        message: 'salesbook>',
      },
    ]);
    return command;
  };
}

/**
 * Read-execute-print loop. Address book errors are printed and the loop goes
 * on; it ends on `exit` or at the end of input.
 */
export async function runSession(logic: LogicManager, io: SessionIO, options: RenderOptions): Promise<void> {
  for (;;) {
    const line = await io.read();
    if (line === undefined) {
      return;
    }
    if (line.trim() === '') {
      continue;
    }

    try {
      const result = await logic.execute(line);
      io.write(renderResult(result, logic, options));
      if (result.exit) {
        return;
      }
    } catch (error: unknown) {
      if (!isAddressBookError(error)) {
        throw error;
      }
      io.write(renderError(error, options));
    }
  }
}
