import { describe, it, expect } from '@jest/globals';
import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { tokenize } from '../argument-tokenizer';
import { Prefix } from '../cli-syntax';

describe('tokenize', () => {
  it('splits values on prefixes and keeps the preamble', () => {
    const map = tokenize(' 1 n/Amy Bee  p/123 ', Prefix.Name, Prefix.Phone);
    expect(map.getPreamble()).toBe('1');
    expect(map.getValue(Prefix.Name)).toBe('Amy Bee');
    expect(map.getValue(Prefix.Phone)).toBe('123');
  });

  it('collects repeated prefixes in order', () => {
    const map = tokenize(' t/friends t/colleagues t/', Prefix.Tag);
    expect(map.getAllValues(Prefix.Tag)).toEqual(['friends', 'colleagues', '']);
    expect(map.getValue(Prefix.Tag)).toBe('');
  });

  it('recognises a prefix at the very start', () => {
    const map = tokenize('i/2 m/Call', Prefix.ContactIndex, Prefix.Message);
    expect(map.getPreamble()).toBe('');
    expect(map.getValue(Prefix.ContactIndex)).toBe('2');
  });

  it('ignores prefixes inside words', () => {
    const map = tokenize(' m/hi/there mo/3', Prefix.ContactIndex, Prefix.Message, Prefix.Months);
    expect(map.has(Prefix.ContactIndex)).toBe(false);
    expect(map.getValue(Prefix.Message)).toBe('hi/there');
    expect(map.getValue(Prefix.Months)).toBe('3');
  });

  it('keeps du/ apart from d/', () => {
    const map = tokenize(' d/2023-08-01 14:00 du/90', Prefix.Date, Prefix.Duration);
    expect(map.getValue(Prefix.Date)).toBe('2023-08-01 14:00');
    expect(map.getValue(Prefix.Duration)).toBe('90');
  });

  it('reports prefixes given twice', () => {
    const map = tokenize(' n/Amy n/Bob', Prefix.Name);
    try {
      map.verifyNoDuplicatePrefixesFor('usage', Prefix.Name);
      throw new Error('expected a ParseError');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.code).toBe(AddressBookErrorCode.InvalidCommandFormat);
        expect(error.message).toBe(
          'Invalid command format! Multiple values specified for the following single-valued field(s): n/\nusage'
        );
      }
    }
  });
});
