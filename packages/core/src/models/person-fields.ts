/**
 * @fileoverview Value objects for contact details
 *
 * Each class guarantees that any instance holds a valid, trimmed value.
 * Construction goes through `of`, which throws a ValidationError naming the
 * field when the input breaks the constraint.
 */

import { AddressBookErrorCode } from '../errors/codes';
import { StringValue, rejectValue } from './string-value';

const WORDS_PATTERN = /^[\p{L}\p{N}][\p{L}\p{N} ]*$/u;

export class Name extends StringValue {
  static readonly MAX_LENGTH = 64;
  static readonly MESSAGE_CONSTRAINTS =
    'Names should only contain alphanumeric characters and spaces, should not be blank, '
    + `and should be at most ${Name.MAX_LENGTH} characters long`;

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return WORDS_PATTERN.test(test) && test.length <= Name.MAX_LENGTH;
  }

  static of(raw: string): Name {
    const trimmed = raw.trim();
    if (!Name.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidName, Name.MESSAGE_CONSTRAINTS, 'name');
    }
    return new Name(trimmed);
  }

  /**
   * Case-insensitive ordering used by the default person sort
   */
  compare(other: Name): number {
    return this.value.toLowerCase().localeCompare(other.value.toLowerCase());
  }
}

export class Phone extends StringValue {
  static readonly MESSAGE_CONSTRAINTS =
    'Phone numbers should only contain numbers, and it should be at least 3 digits long';

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return /^\d{3,}$/.test(test);
  }

  static of(raw: string): Phone {
    const trimmed = raw.trim();
    if (!Phone.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidPhone, Phone.MESSAGE_CONSTRAINTS, 'phone');
    }
    return new Phone(trimmed);
  }
}

const EMAIL_LOCAL_PART = '[A-Za-z0-9]+(?:[+_.-][A-Za-z0-9]+)*';
const EMAIL_DOMAIN_LABEL = '[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?';
const EMAIL_LAST_LABEL = '[A-Za-z0-9][A-Za-z0-9-]*[A-Za-z0-9]';
const EMAIL_PATTERN = new RegExp(
  `^${EMAIL_LOCAL_PART}@(?:${EMAIL_DOMAIN_LABEL}\\.)*${EMAIL_LAST_LABEL}$`
);

export class Email extends StringValue {
  static readonly MESSAGE_CONSTRAINTS =
    'Emails should be of the format local-part@domain. The local-part should only contain '
    + 'alphanumeric characters and the special characters +_.- and may not start or end with them. '
    + 'The domain is made of labels separated by periods; each label starts and ends with an '
    + 'alphanumeric character and the last label is at least 2 characters long';

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return EMAIL_PATTERN.test(test);
  }

  static of(raw: string): Email {
    const trimmed = raw.trim();
    if (!Email.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidEmail, Email.MESSAGE_CONSTRAINTS, 'email');
    }
    return new Email(trimmed);
  }
}

export class Address extends StringValue {
  static readonly MAX_LENGTH = 256;
  static readonly MESSAGE_CONSTRAINTS =
    `Addresses can take any values, should not be blank, and should be at most ${Address.MAX_LENGTH} characters long`;

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return test.trim().length > 0 && test.length <= Address.MAX_LENGTH;
  }

  static of(raw: string): Address {
    const trimmed = raw.trim();
    if (!Address.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidAddress, Address.MESSAGE_CONSTRAINTS, 'address');
    }
    return new Address(trimmed);
  }
}

export class Remark extends StringValue {
  static readonly MAX_LENGTH = 512;
  static readonly MESSAGE_CONSTRAINTS = `Remarks should be at most ${Remark.MAX_LENGTH} characters long`;
  static readonly EMPTY = new Remark('');

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return test.length <= Remark.MAX_LENGTH;
  }

  static of(raw: string): Remark {
    const trimmed = raw.trim();
    if (!Remark.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidRemark, Remark.MESSAGE_CONSTRAINTS, 'remark');
    }
    return trimmed === '' ? Remark.EMPTY : new Remark(trimmed);
  }

  get isEmpty(): boolean {
    return this.value === '';
  }
}
