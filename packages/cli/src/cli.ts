#!/usr/bin/env node
/**
 * Command line launcher for SalesBook
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { InMemoryStorage, LogicManager, mergeConfig } from '@salesbook/book';
import { configureLogger, isAddressBookError, toFeedback } from '@salesbook/core';
import { type CliOptions, configFromOptions } from './options';
import { type RenderOptions, renderError, renderResult } from './render';
import { inquirerInput, runSession } from './session';

const program = new Command();

async function startLogic(): Promise<LogicManager> {
  const config = mergeConfig(configFromOptions(program.opts<CliOptions>()));
  configureLogger({ level: config.logLevel });
  return LogicManager.create({ storage: new InMemoryStorage(), config });
}

function renderOptions(): RenderOptions {
  return { colors: chalk.supportsColor !== false };
}

program
  .name('salesbook')
  .description('Contacts, meetings, reminders and sales, driven by typed commands')
  .version('0.1.0')
  .option('-l, --log-level <level>', 'Log level (silent, error, warn, info, debug, trace)')
  .option('--locale <locale>', 'Locale for prices, e.g. en-GB')
  .option('--currency <code>', 'ISO 4217 currency code for prices, e.g. EUR')
  .option('--months <count>', 'Months covered by stats when a command names none')
  .action(async () => {
    const logic = await startLogic();
    console.log(chalk.cyan.bold('SalesBook') + chalk.dim(' (type "help" for commands)'));
    await runSession(logic, { read: inquirerInput(), write: (text) => console.log(text) }, renderOptions());
  });

program
  .command('exec')
  .description('Run a single command, e.g. salesbook exec contact list')
  .argument('<words...>', 'Command words and arguments')
  .action(async (words: string[]) => {
    const logic = await startLogic();
    try {
      const result = await logic.execute(words.join(' '));
      console.log(renderResult(result, logic, renderOptions()));
    } catch (error: unknown) {
      if (!isAddressBookError(error)) {
        throw error;
      }
      console.error(renderError(error, renderOptions()));
      process.exitCode = 1;
    }
  });

process.on('SIGINT', () => {
  console.log(chalk.yellow('\nBye'));
  process.exit(0);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`salesbook: ${toFeedback(error)}`));
  process.exit(1);
});
