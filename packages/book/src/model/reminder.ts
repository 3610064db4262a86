import type { DateTime, Message } from '@salesbook/core';
import { type Person, personKey } from './person';

export interface Reminder {
  readonly person: Person;
  readonly message: Message;
  readonly scheduledAt: DateTime;
}

export function createReminder(fields: Reminder): Reminder {
  return Object.freeze({ ...fields });
}

export function reminderKey(reminder: Reminder): string {
  return JSON.stringify([personKey(reminder.person), reminder.message.value, reminder.scheduledAt.toString()]);
}

export function isOverdue(reminder: Reminder, now: DateTime): boolean {
  return reminder.scheduledAt.isBefore(now);
}

export function compareReminders(a: Reminder, b: Reminder): number {
  return a.scheduledAt.compare(b.scheduledAt) || a.message.value.localeCompare(b.message.value);
}

export function formatReminder(reminder: Reminder): string {
  return `${reminder.message.value} (${reminder.person.name.value}); Date: ${reminder.scheduledAt.toString()}`;
}
