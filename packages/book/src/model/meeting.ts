import type { DateTime, Duration, Message } from '@salesbook/core';
import { type Person, personKey } from './person';

export interface Meeting {
  readonly person: Person;
  readonly message: Message;
  readonly start: DateTime;
  readonly duration: Duration;
}

export function createMeeting(fields: Meeting): Meeting {
  return Object.freeze({ ...fields });
}

export function meetingKey(meeting: Meeting): string {
  return JSON.stringify([
    personKey(meeting.person),
    meeting.message.value,
    meeting.start.toString(),
    meeting.duration.minutes,
  ]);
}

/** Chronological, then by message */
export function compareMeetings(a: Meeting, b: Meeting): number {
  return a.start.compare(b.start) || a.message.value.localeCompare(b.message.value);
}

export function formatMeeting(meeting: Meeting): string {
  return `${meeting.message.value} with ${meeting.person.name.value}; `
    + `Start: ${meeting.start.toString()}; Duration: ${meeting.duration.toString()}`;
}
