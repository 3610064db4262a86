import { AddressBookErrorCode, ParseError } from '@salesbook/core';
import { invalidFormat } from '../commands/messages';
import type { Prefix } from './cli-syntax';

/**
 * Values found for each prefix, in the order they appeared, plus the
 * preamble (the text before the first prefix)
 */
export class ArgumentMultimap {
  private readonly values = new Map<Prefix, string[]>();
  private preamble = '';

  put(prefix: Prefix, value: string): void {
    const existing = this.values.get(prefix);
    if (existing) {
      existing.push(value);
    } else {
      this.values.set(prefix, [value]);
    }
  }

  setPreamble(preamble: string): void {
    this.preamble = preamble;
  }

  /**
   * Last value given for the prefix
   */
  getValue(prefix: Prefix): string | undefined {
    const values = this.values.get(prefix);
    return values ? values[values.length - 1] : undefined;
  }

  getAllValues(prefix: Prefix): string[] {
    return [...(this.values.get(prefix) ?? [])];
  }

  getPreamble(): string {
    return this.preamble;
  }

  has(prefix: Prefix): boolean {
    return this.values.has(prefix);
  }

  /**
   * Reject prefixes that take a single value but were given more than once
   */
  verifyNoDuplicatePrefixesFor(usage: string, ...prefixes: Prefix[]): void {
    const duplicated = [...new Set(prefixes)].filter((prefix) => (this.values.get(prefix)?.length ?? 0) > 1);
    if (duplicated.length > 0) {
      throw new ParseError(
        AddressBookErrorCode.InvalidCommandFormat,
        invalidFormat(usage, `Multiple values specified for the following single-valued field(s): ${duplicated.join(' ')}`),
        { field: duplicated[0] }
      );
    }
  }
}
