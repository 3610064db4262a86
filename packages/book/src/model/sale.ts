/**
 * @fileoverview Sale records
 */

import {
  type DateTime,
  type ItemName,
  type PriceFormatOptions,
  type Quantity,
  type TagName,
  type UnitPrice,
  formatCents,
  normalizeTags,
} from '@salesbook/core';
import { type Person, formatTags, personKey } from './person';

export interface Sale {
  readonly buyer: Person;
  readonly itemName: ItemName;
  readonly datetime: DateTime;
  readonly unitPrice: UnitPrice;
  readonly quantity: Quantity;
  readonly tags: readonly TagName[];
}

export function createSale(fields: Sale): Sale {
  return Object.freeze({ ...fields, tags: normalizeTags(fields.tags) });
}

export function saleKey(sale: Sale): string {
  return JSON.stringify([
    personKey(sale.buyer),
    sale.itemName.value,
    sale.datetime.toString(),
    sale.unitPrice.cents,
    sale.quantity.value,
    normalizeTags(sale.tags).map((tag) => tag.value),
  ]);
}

/**
 * Unit price times quantity, in cents
 */
export function saleTotalCents(sale: Sale): bigint {
  return BigInt(sale.unitPrice.cents) * BigInt(sale.quantity.value);
}

export function saleHasTag(sale: Sale, tag: TagName): boolean {
  return sale.tags.some((own) => own.equals(tag));
}

export function withSaleTags(sale: Sale, tags: Iterable<TagName>): Sale {
  return createSale({ ...sale, tags: Array.from(tags) });
}

export function compareSales(a: Sale, b: Sale): number {
  return a.datetime.compare(b.datetime) || a.itemName.value.localeCompare(b.itemName.value);
}

export function formatSale(sale: Sale, options: PriceFormatOptions = {}): string {
  const parts = [
    `${sale.itemName.value} sold to ${sale.buyer.name.value}`,
    `Date: ${sale.datetime.toString()}`,
    `Unit price: ${sale.unitPrice.format(options)}`,
    `Quantity: ${sale.quantity.value}`,
    `Total: ${formatCents(saleTotalCents(sale), options)}`,
  ];
  if (sale.tags.length > 0) {
    parts.push(`Tags: ${formatTags(sale.tags)}`);
  }
  return parts.join('; ');
}
