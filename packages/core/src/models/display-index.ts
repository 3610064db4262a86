/**
 * @fileoverview Position of a record in a displayed list
 *
 * Users see one-based positions; lists are addressed zero-based. Index keeps
 * both readings and refuses anything below the first position.
 */

import { AddressBookErrorCode } from '../errors/codes';
import { rejectValue } from './string-value';

export class Index {
  static readonly MESSAGE_CONSTRAINTS = 'Index is not a non-zero unsigned integer.';

  private constructor(private readonly zeroBasedValue: number) {}

  static fromZeroBased(value: number): Index {
    if (!Number.isSafeInteger(value) || value < 0) {
      rejectValue(AddressBookErrorCode.InvalidIndex, Index.MESSAGE_CONSTRAINTS, 'index');
    }
    return new Index(value);
  }

  static fromOneBased(value: number): Index {
    if (!Number.isSafeInteger(value) || value < 1) {
      rejectValue(AddressBookErrorCode.InvalidIndex, Index.MESSAGE_CONSTRAINTS, 'index');
    }
    return new Index(value - 1);
  }

  static parse(raw: string): Index {
    const trimmed = raw.trim();
    if (!/^\+?\d+$/.test(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidIndex, Index.MESSAGE_CONSTRAINTS, 'index');
    }
    return Index.fromOneBased(Number(trimmed));
  }

  get zeroBased(): number {
    return this.zeroBasedValue;
  }

  get oneBased(): number {
    return this.zeroBasedValue + 1;
  }

  equals(other: unknown): boolean {
    return other instanceof Index && other.zeroBasedValue === this.zeroBasedValue;
  }

  toString(): string {
    return String(this.oneBased);
  }
}
