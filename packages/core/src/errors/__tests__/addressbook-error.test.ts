/**
 * @fileoverview Tests for the address book error taxonomy
 */

import { describe, it, expect } from '@jest/globals';
import {
  AddressBookError,
  ValidationError,
  ParseError,
  NotFoundError,
  StorageError,
  isAddressBookError,
  toFeedback,
  wrapError,
} from '../addressbook-error';
import { AddressBookErrorCode, ErrorCategory, getErrorCategory } from '../codes';

describe('getErrorCategory', () => {
  it('derives the category from the code range', () => {
    expect(getErrorCategory(AddressBookErrorCode.InvalidName)).toBe(ErrorCategory.Validation);
    expect(getErrorCategory(AddressBookErrorCode.MissingPrefix)).toBe(ErrorCategory.Parse);
    expect(getErrorCategory(AddressBookErrorCode.DuplicateRecord)).toBe(ErrorCategory.Command);
    expect(getErrorCategory(AddressBookErrorCode.TagNotFound)).toBe(ErrorCategory.NotFound);
    expect(getErrorCategory(AddressBookErrorCode.SnapshotCorrupted)).toBe(ErrorCategory.Storage);
    expect(getErrorCategory(AddressBookErrorCode.InternalError)).toBe(ErrorCategory.General);
  });
});

describe('AddressBookError', () => {
  it('keeps the subclass identity through the prototype chain', () => {
    const error = new ValidationError(AddressBookErrorCode.InvalidPhone, 'bad phone', { field: 'phone' });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(AddressBookError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.message).toBe('bad phone');
    expect(error.field).toBe('phone');
    expect(error.isCategory(ErrorCategory.Validation)).toBe(true);
  });

  it('describes itself with code, category, field and operation', () => {
    const error = new ParseError(AddressBookErrorCode.MissingPrefix, 'Missing n/', {
      field: 'n/',
      context: { operation: 'contact add' },
    });

    expect(error.getDescription()).toBe('[2002] Parse: Missing n/ | Field: n/ | Operation: contact add');
  });

  it('serializes the cause by name and message', () => {
    const error = new StorageError(AddressBookErrorCode.StorageSaveFailed, 'save failed', {
      cause: new RangeError('disk full'),
    });

    const json = error.toJSON();
    expect(json.code).toBe(5002);
    expect(json.category).toBe('Storage');
    expect(json.cause).toEqual({ name: 'RangeError', message: 'disk full' });
  });
});

describe('wrapError', () => {
  it('returns address book errors unchanged', () => {
    const original = new NotFoundError(AddressBookErrorCode.TagNotFound, 'no such tag');
    expect(wrapError(original, AddressBookErrorCode.InternalError)).toBe(original);
  });

  it('wraps foreign errors and keeps them as the cause', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause, AddressBookErrorCode.InternalError);

    expect(wrapped.code).toBe(AddressBookErrorCode.InternalError);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
  });

  it('wraps thrown non-errors', () => {
    const wrapped = wrapError('plain text', AddressBookErrorCode.Unknown, 'Something failed');

    expect(wrapped.message).toBe('Something failed');
    expect(isAddressBookError(wrapped)).toBe(true);
  });
});

describe('toFeedback', () => {
  it('uses the error message', () => {
    expect(toFeedback(new ParseError(AddressBookErrorCode.UnknownCommand, 'Unknown command'))).toBe('Unknown command');
    expect(toFeedback(42)).toBe('42');
  });
});
