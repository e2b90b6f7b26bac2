/**
 * session.ts - One input's codec pipeline
 *
 * A session counts one text's symbols, builds its tree and code table, and
 * keeps them for encoding and decoding. Nothing is shared between sessions.
 *
 * Usage:
 *   const result = compress('abacabad');
 *   result.encoded;                 // '01001100100111'
 *   result.stats.compressionRatio;  // 64 / 14
 */

import { assignCodes, weightedLength, type CodeTable } from './codes.js';
import { decode } from './decoder.js';
import { encode } from './encoder.js';
import { EmptyAlphabetError } from './errors.js';
import { countFrequencies, totalCount, type FrequencyTable } from './frequency.js';
import { buildHuffmanTree, type HuffmanTree } from './tree.js';

/** Bits per symbol in the uncompressed baseline */
export const BITS_PER_SYMBOL = 8;

export interface CodecStats {
  /** Symbols in the input (code points) */
  symbolCount: number;
  distinctSymbols: number;
  /** symbolCount x 8 */
  originalBits: number;
  encodedBits: number;
  /** originalBits / encodedBits; null when nothing was encoded */
  compressionRatio: number | null;
  /** Mean bits per input symbol; 0 for empty input */
  averageCodeLength: number;
}

export interface CodecResult {
  input: string;
  frequencies: FrequencyTable;
  /** null for empty input, where no tree can be built */
  tree: HuffmanTree | null;
  codes: CodeTable;
  encoded: string;
  decoded: string;
  /** decoded === input */
  verified: boolean;
  stats: CodecStats;
}

export class HuffmanSession {
  readonly frequencies: FrequencyTable;
  readonly tree: HuffmanTree | null;
  readonly codes: CodeTable;

  private constructor(frequencies: FrequencyTable, tree: HuffmanTree | null, codes: CodeTable) {
    this.frequencies = frequencies;
    this.tree = tree;
    this.codes = codes;
  }

  /**
   * Build a session from the symbol statistics of a text.
   * Empty text gives a session with no tree and an empty code table.
   */
  static build(text: string): HuffmanSession {
    const frequencies = countFrequencies(text);
    if (frequencies.size === 0) {
      return new HuffmanSession(frequencies, null, new Map());
    }
    const tree = buildHuffmanTree(frequencies);
    return new HuffmanSession(frequencies, tree, assignCodes(tree));
  }

  encode(text: string): string {
    return encode(text, this.codes);
  }

  /**
   * @throws EmptyAlphabetError for non-empty bits on a session built from empty text
   */
  decode(bits: string): string {
    if (this.tree === null) {
      if (bits.length > 0) throw new EmptyAlphabetError();
      return '';
    }
    return decode(bits, this.tree);
  }

  /**
   * Sizes for the text this session was built from. The encoded size comes
   * from the code table, so it does not depend on any later encode() call.
   */
  get stats(): CodecStats {
    const symbolCount = totalCount(this.frequencies);
    const originalBits = symbolCount * BITS_PER_SYMBOL;
    const encodedBits = weightedLength(this.frequencies, this.codes);

    return {
      symbolCount,
      distinctSymbols: this.frequencies.size,
      originalBits,
      encodedBits,
      compressionRatio: encodedBits > 0 ? originalBits / encodedBits : null,
      averageCodeLength: symbolCount > 0 ? encodedBits / symbolCount : 0,
    };
  }
}

/**
 * Run the full pipeline on one text: count, build, assign, encode, decode
 * and verify.
 */
export function compress(text: string): CodecResult {
  const session = HuffmanSession.build(text);
  const encoded = session.encode(text);
  const decoded = session.decode(encoded);

  return {
    input: text,
    frequencies: session.frequencies,
    tree: session.tree,
    codes: session.codes,
    encoded,
    decoded,
    verified: decoded === text,
    stats: session.stats,
  };
}
