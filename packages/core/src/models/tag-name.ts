/**
 * @fileoverview Tag name value object
 *
 * Tags are compared case-sensitively; `Friends` and `friends` are two tags.
 */

import { AddressBookErrorCode } from '../errors/codes';
import { StringValue, rejectValue } from './string-value';

export class TagName extends StringValue {
  static readonly MAX_LENGTH = 32;
  static readonly MESSAGE_CONSTRAINTS =
    `Tag names should be alphanumeric, without spaces, and at most ${TagName.MAX_LENGTH} characters long`;

  private constructor(value: string) {
    super(value);
  }

  static isValid(test: string): boolean {
    return /^[\p{L}\p{N}]+$/u.test(test) && test.length <= TagName.MAX_LENGTH;
  }

  static of(raw: string): TagName {
    const trimmed = raw.trim();
    if (!TagName.isValid(trimmed)) {
      rejectValue(AddressBookErrorCode.InvalidTagName, TagName.MESSAGE_CONSTRAINTS, 'tag');
    }
    return new TagName(trimmed);
  }

  compare(other: TagName): number {
    return this.value < other.value ? -1 : this.value > other.value ? 1 : 0;
  }
}

/**
 * Deduplicate tags by name and order them for stable display and equality
 */
export function normalizeTags(tags: Iterable<TagName>): readonly TagName[] {
  const byName = new Map<string, TagName>();
  for (const tag of tags) {
    byName.set(tag.hashKey(), tag);
  }
  return Array.from(byName.values()).sort((a, b) => a.compare(b));
}

/**
 * Set equality over tag lists
 */
export function sameTags(a: readonly TagName[], b: readonly TagName[]): boolean {
  const left = normalizeTags(a);
  const right = normalizeTags(b);
  return left.length === right.length && left.every((tag, i) => tag.equals(right[i]));
}
