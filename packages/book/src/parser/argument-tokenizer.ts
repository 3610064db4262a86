/**
 * @fileoverview Splits an argument string on prefixes
 *
 * A prefix counts only at the start of the string or right after whitespace,
 * so `mo/` is never read as `m/` and `hi/` contains no `i/`. Each value runs
 * up to the next recognised prefix and is trimmed.
 */

import { ArgumentMultimap } from './argument-multimap';
import type { Prefix } from './cli-syntax';

interface PrefixPosition {
  prefix: Prefix;
  start: number;
}

function findPrefixPositions(args: string, prefixes: readonly Prefix[]): PrefixPosition[] {
  const positions: PrefixPosition[] = [];
  for (const prefix of new Set(prefixes)) {
    let start = args.indexOf(prefix);
    while (start !== -1) {
      if (start === 0 || /\s/.test(args.charAt(start - 1))) {
        positions.push({ prefix, start });
      }
      start = args.indexOf(prefix, start + 1);
    }
  }
  return positions.sort((a, b) => a.start - b.start);
}

export function tokenize(args: string, ...prefixes: Prefix[]): ArgumentMultimap {
  const positions = findPrefixPositions(args, prefixes);
  const multimap = new ArgumentMultimap();

  const preambleEnd = positions.length > 0 ? positions[0].start : args.length;
  multimap.setPreamble(args.slice(0, preambleEnd).trim());

  positions.forEach(({ prefix, start }, i) => {
    const end = i + 1 < positions.length ? positions[i + 1].start : args.length;
    multimap.put(prefix, args.slice(start + prefix.length, end).trim());
  });

  return multimap;
}
