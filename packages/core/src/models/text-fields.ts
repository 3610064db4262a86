/**
 * @fileoverview Free-text value objects for meetings, reminders and sales
 */

import { AddressBookErrorCode } from '../errors/codes';
import { StringValue, rejectValue } from './string-value';

export class Message extends StringValue {
  static readonly MAX_LENGTH = 256;
  static readonly MESSAGE_CONSTRAINTS =
    `Messages should not be blank and should be at most ${Message.MAX_LENGTH} characters long`;

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return test.trim().length > 0 && test.length <= Message.MAX_LENGTH;
  }

  static of(raw: string): Message {
    const trimmed = raw.trim();
    if (!Message.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidMessage, Message.MESSAGE_CONSTRAINTS, 'message');
    }
    return new Message(trimmed);
  }
}

export class ItemName extends StringValue {
  static readonly MAX_LENGTH = 64;
  static readonly MESSAGE_CONSTRAINTS =
    'Item names should only contain alphanumeric characters and spaces, should not be blank, '
    + `and should be at most ${ItemName.MAX_LENGTH} characters long`;

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return /^[\p{L}\p{N}][\p{L}\p{N} ]*$/u.test(test) && test.length <= ItemName.MAX_LENGTH;
  }

  static of(raw: string): ItemName {
    const trimmed = raw.trim();
    if (!ItemName.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidItemName, ItemName.MESSAGE_CONSTRAINTS, 'item name');
    }
    return new ItemName(trimmed);
  }
}
