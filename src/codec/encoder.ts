/**
 * encoder.ts - Text to bit string
 */

import type { CodeTable } from './codes.js';
import { UnknownSymbolError } from './errors.js';
import { toSymbol } from './symbols.js';

/**
 * Concatenate the code of every symbol of the text, in order.
 *
 * The table must have been built from the same text (or from text with a
 * superset of its symbols).
 *
 * @throws UnknownSymbolError if a symbol has no code
 */
export function encode(text: string, codes: CodeTable): string {
  const parts: string[] = [];
  let index = 0;

  for (const ch of text) {
    const symbol = toSymbol(ch, index);
    const code = codes.get(symbol);
    if (code === undefined) {
      throw new UnknownSymbolError(symbol, index);
    }
    parts.push(code);
    index++;
  }

  return parts.join('');
}
