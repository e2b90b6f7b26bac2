/**
 * symbols.ts - Boundary substitution between text and codec symbols
 *
 * A literal space is awkward in aligned table output, so it is carried
 * through the codec as a visible placeholder and restored on decode.
 * The placeholder is reserved: it may not appear in the input text.
 */

import { ReservedSymbolError } from './errors.js';

/** U+2423 OPEN BOX, stand-in for the ASCII space */
export const SPACE_PLACEHOLDER = '␣';

/**
 * Map one input code point to its codec symbol.
 * @param index Code point index, reported if the character is reserved
 */
export function toSymbol(ch: string, index: number): string {
  if (ch === ' ') return SPACE_PLACEHOLDER;
  if (ch === SPACE_PLACEHOLDER) {
    throw new ReservedSymbolError(ch, index);
  }
  return ch;
}

/** Inverse of toSymbol. */
export function fromSymbol(symbol: string): string {
  return symbol === SPACE_PLACEHOLDER ? ' ' : symbol;
}

/**
 * Split text into codec symbols, one per code point.
 */
export function toSymbols(text: string): string[] {
  const symbols: string[] = [];
  let index = 0;
  for (const ch of text) {
    symbols.push(toSymbol(ch, index++));
  }
  return symbols;
}
