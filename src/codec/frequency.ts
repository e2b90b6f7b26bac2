/**
 * frequency.ts - Symbol frequency counting
 */

import { toSymbols } from './symbols.js';

/**
 * Map from codec symbol to occurrence count.
 * Keys are in first-occurrence order, which tree construction relies on
 * for its tie-break.
 */
export type FrequencyTable = ReadonlyMap<string, number>;

/**
 * Count symbol occurrences in text. Spaces are counted under the
 * placeholder symbol. Empty text yields an empty table.
 */
export function countFrequencies(text: string): FrequencyTable {
  const frequencies = new Map<string, number>();
  for (const symbol of toSymbols(text)) {
    frequencies.set(symbol, (frequencies.get(symbol) ?? 0) + 1);
  }
  return frequencies;
}

/** Sum of all counts, equal to the number of symbols counted. */
export function totalCount(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}
