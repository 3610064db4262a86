/**
 * @fileoverview Sale quantity value object
 */

import { AddressBookErrorCode } from '../errors/codes';
import { rejectValue } from './string-value';

export class Quantity {
  static readonly MIN = 1;
  static readonly MAX = 9_999_999;
  static readonly MESSAGE_CONSTRAINTS =
    `Quantity should be a whole number from ${Quantity.MIN} to ${Quantity.MAX}`;

  private constructor(public readonly value: number) {}

  static isValid(test: number): boolean {
    return Number.isInteger(test) && test >= Quantity.MIN && test <= Quantity.MAX;
  }

  static of(value: number): Quantity {
    if (!Quantity.isValid(value)) {
      rejectValue(AddressBookErrorCode.InvalidQuantity, Quantity.MESSAGE_CONSTRAINTS, 'quantity');
    }
    return new Quantity(value);
  }

  static parse(raw: string): Quantity {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidQuantity, Quantity.MESSAGE_CONSTRAINTS, 'quantity');
    }
    return Quantity.of(Number(trimmed));
  }

  equals(other: unknown): boolean {
    return other instanceof Quantity && other.value === this.value;
  }

  hashKey(): string {
    return String(this.value);
  }

  toString(): string {
    return String(this.value);
  }

  toJSON(): number {
    return this.value;
  }
}
