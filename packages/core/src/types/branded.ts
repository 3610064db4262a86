/**
 * @fileoverview Branded types for SalesBook
 *
 * Branded types keep logically different values that share a primitive type
 * from being mixed up.
 */

// Base brand infrastructure using unique symbols
declare const __brand: unique symbol;
export type Brand<T, B> = T & { readonly [__brand]: B };

// Utility type for creating branded types
export type Branded<T, B extends string> = Brand<T, B>;

/** Money amount in integer cents */
export type Cents = Branded<number, 'Cents'>;

/** Wall-clock minutes since 1970-01-01 00:00, without a time zone */
export type EpochMinutes = Branded<number, 'EpochMinutes'>;

export function isCents(value: number): value is Cents {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isEpochMinutes(value: number): value is EpochMinutes {
  return Number.isSafeInteger(value);
}

/**
 * Brand a value after checking it with its guard
 */
export function toBranded<T extends number | string, B extends T>(
  value: T,
  guard: (value: T) => value is B,
  message = 'Value does not satisfy brand constraint'
): B {
  if (!guard(value)) {
    throw new TypeError(message);
  }
  return value;
}
