import { describe, it, expect } from '@jest/globals';
import { InMemoryStorage, LogicManager, MESSAGE_EXIT } from '@salesbook/book';
import { Logger, LogLevel } from '@salesbook/core';
import { type SessionIO, runSession } from '../session';

function scripted(lines: string[]): SessionIO & { output: string[] } {
  const pending = [...lines];
  const output: string[] = [];
  return {
    output,
    read: async () => pending.shift(),
    write: (text) => {
      output.push(text);
    },
  };
}

function createLogic(): Promise<LogicManager> {
  return LogicManager.create({ storage: new InMemoryStorage(), logger: new Logger({ level: LogLevel.Silent }) });
}

describe('runSession', () => {
  it('prints errors and keeps going until exit', async () => {
    const logic = await createLogic();
    const io = scripted(['contact delete 1', '', 'contact list', 'exit', 'contact list']);

    await runSession(logic, io, { colors: false });

    expect(io.output).toEqual([
      'The contact index provided is invalid',
      'Listed all contacts',
      MESSAGE_EXIT,
    ]);
  });

  it('stops at the end of input', async () => {
    const logic = await createLogic();
    const io = scripted(['tag list']);
    await runSession(logic, io, { colors: false });
    expect(io.output).toEqual(['Contact tags: (none)\nSale tags: (none)\nContact tags:\nSale tags:']);
  });
});
