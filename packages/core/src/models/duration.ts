import { AddressBookErrorCode } from '../errors/codes';
import { rejectValue } from './string-value';

/**
 * Length of a meeting in whole minutes
 */
export class Duration {
  static readonly MIN_MINUTES = 1;
  static readonly MAX_MINUTES = 24 * 60;
  static readonly MESSAGE_CONSTRAINTS =
    `Duration should be a whole number of minutes from ${Duration.MIN_MINUTES} to ${Duration.MAX_MINUTES}`;

  private constructor(public readonly minutes: number) {}

  static isValid(minutes: number): boolean {
    return Number.isInteger(minutes) && minutes >= Duration.MIN_MINUTES && minutes <= Duration.MAX_MINUTES;
  }

  static of(minutes: number): Duration {
    if (!Duration.isValid(minutes)) {
      rejectValue(AddressBookErrorCode.InvalidDuration, Duration.MESSAGE_CONSTRAINTS, 'duration');
    }
    return new Duration(minutes);
  }

  static parse(raw: string): Duration {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidDuration, Duration.MESSAGE_CONSTRAINTS, 'duration');
    }
    return Duration.of(Number(trimmed));
  }

  equals(other: unknown): boolean {
    return other instanceof Duration && other.minutes === this.minutes;
  }

  hashKey(): string {
    return String(this.minutes);
  }

  toString(): string {
    return `${this.minutes} min`;
  }

  toJSON(): number {
    return this.minutes;
  }
}
