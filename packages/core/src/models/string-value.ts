/**
 * @fileoverview Shared base for value objects wrapping a single string
 */

import { AddressBookErrorCode } from '../errors/codes';
import { ValidationError } from '../errors/addressbook-error';

export abstract class StringValue {
  protected constructor(public readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof StringValue
      && other.constructor === this.constructor
      && other.value === this.value;
  }

  hashKey(): string {
    return this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/**
 * Throw the validation error for a value object field
 */
export function rejectValue(code: AddressBookErrorCode, constraint: string, field: string): never {
  throw new ValidationError(code, constraint, { field });
}
