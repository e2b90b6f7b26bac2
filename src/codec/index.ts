/**
 * codec/index.ts - Huffman text codec
 *
 * Usage:
 *   import { compress, HuffmanSession } from './codec/index.js';
 *   const { encoded, verified, stats } = compress('hello world');
 *
 *   const session = HuffmanSession.build(text);
 *   const bits = session.encode(text);
 *   session.decode(bits) === text;
 */

// Pipeline stages
export { SPACE_PLACEHOLDER, toSymbol, fromSymbol, toSymbols } from './symbols.js';
export { countFrequencies, totalCount } from './frequency.js';
export type { FrequencyTable } from './frequency.js';
export { buildHuffmanTree, isLeaf, leafDepths } from './tree.js';
export type { HuffmanTree, TreeNode, LeafNode, InternalNode } from './tree.js';
export { assignCodes, isPrefixFree, codeLengths, weightedLength, SINGLE_SYMBOL_CODE } from './codes.js';
export type { CodeTable } from './codes.js';
export { encode } from './encoder.js';
export { decode } from './decoder.js';

// Whole-pipeline session
export { compress, HuffmanSession, BITS_PER_SYMBOL } from './session.js';
export type { CodecResult, CodecStats } from './session.js';

// Byte packing of encoded streams
export { packBits, unpackBits, BitWriter, BitReader } from './bits.js';
export type { PackedBits } from './bits.js';

export { MinPriorityQueue } from './priority-queue.js';
export type { Comparator } from './priority-queue.js';

export {
  HuffmanError,
  EmptyAlphabetError,
  UnknownSymbolError,
  TruncatedStreamError,
  InvalidBitError,
  ReservedSymbolError,
} from './errors.js';
export type { HuffmanErrorCode } from './errors.js';
