/**
 * @fileoverview Text rendering of command results for the terminal
 *
 * After each command the feedback is printed, followed by the panel the
 * result asks for as numbered lines, and a table for statistics reports.
 */

import chalk from 'chalk';
import { table } from 'table';
import {
  type CommandResult,
  type LogicManager,
  type Panel,
  type StatisticsReport,
  formatMeeting,
  formatPerson,
  formatReminder,
  formatSale,
} from '@salesbook/book';
import { type AddressBookError, ErrorCategory } from '@salesbook/core';

export interface RenderOptions {
  colors: boolean;
}

type Painter = InstanceType<typeof chalk.Instance>;

function painter(options: RenderOptions): Painter {
  return new chalk.Instance({ level: options.colors ? 1 : 0 });
}

function numbered(lines: Iterable<string>, indent = ''): string[] {
  return Array.from(lines, (line, i) => `${indent}${i + 1}. ${line}`);
}

/**
 * The displayed view behind a panel, one numbered line per item
 */
export function panelLines(logic: LogicManager, panel: Panel): string[] {
  switch (panel) {
    case 'contact':
      return numbered(Array.from(logic.persons, formatPerson));
    case 'meeting':
      return numbered(Array.from(logic.meetings, formatMeeting));
    case 'reminder':
      return numbered(Array.from(logic.reminders, formatReminder));
    case 'sale':
      return numbered(Array.from(logic.sales, (sale) => formatSale(sale, logic.preferences)));
    case 'tag': {
      const store = logic.recordStore;
      return [
        'Contact tags:',
        ...numbered(Array.from(store.contactTags, (tag) => tag.value), '  '),
        'Sale tags:',
        ...numbered(Array.from(store.saleTags, (tag) => tag.value), '  '),
      ];
    }
  }
}

export function statisticsRows(report: StatisticsReport): string[][] {
  return [
    ['Month', report.group === 'meeting' ? 'Meetings' : 'Sales'],
    ...report.rows.map((row) => [row.monthAndYear.toString(), String(row.count)]),
  ];
}

export function renderResult(result: CommandResult, logic: LogicManager, options: RenderOptions): string {
  const paint = painter(options);
  const blocks = [paint.green(result.feedbackToUser)];

  // The statistics table replaces the panel listing
  if (result.statistics) {
    blocks.push(table(statisticsRows(result.statistics)).trimEnd());
  } else if (result.panel && !result.showHelp) {
    const lines = panelLines(logic, result.panel);
    if (lines.length > 0) {
      blocks.push(lines.join('\n'));
    }
  }

  return blocks.join('\n');
}

export function renderError(error: AddressBookError, options: RenderOptions): string {
  const paint = painter(options);
  return error.isCategory(ErrorCategory.Storage)
    ? paint.red.bold(error.message)
    : paint.red(error.message);
}
