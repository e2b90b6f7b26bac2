/**
 * errors.ts - Error types raised by the codec pipeline
 *
 * Every error is a contract violation between pipeline stages (or bad input
 * at the boundary). None of them is retried or defaulted.
 */

export type HuffmanErrorCode =
  | 'EMPTY_ALPHABET'
  | 'UNKNOWN_SYMBOL'
  | 'TRUNCATED_STREAM'
  | 'INVALID_BIT'
  | 'RESERVED_SYMBOL';

/**
 * Base class for codec errors. `code` is stable and safe to switch on.
 */
export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(code: HuffmanErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Tree construction was asked to build from a table with no symbols. */
export class EmptyAlphabetError extends HuffmanError {
  constructor() {
    super('EMPTY_ALPHABET', 'Cannot build a Huffman tree from an empty frequency table');
  }
}

export class UnknownSymbolError extends HuffmanError {
  readonly symbol: string;
  /** Code point index of the symbol in the text being encoded */
  readonly index: number;

  constructor(symbol: string, index: number) {
    super('UNKNOWN_SYMBOL', `Symbol ${JSON.stringify(symbol)} at index ${index} is not in the code table`);
    this.symbol = symbol;
    this.index = index;
  }
}

/**
 * The bit stream ended in the middle of a codeword.
 */
export class TruncatedStreamError extends HuffmanError {
  /** Offset of the first bit of the unfinished codeword */
  readonly codewordStart: number;
  /** Symbols decoded before the stream ran out */
  readonly decodedCount: number;

  constructor(codewordStart: number, decodedCount: number) {
    super(
      'TRUNCATED_STREAM',
      `Bit stream ended inside a codeword starting at bit ${codewordStart} (after ${decodedCount} symbols)`
    );
    this.codewordStart = codewordStart;
    this.decodedCount = decodedCount;
  }
}

export class InvalidBitError extends HuffmanError {
  readonly offset: number;
  readonly value: string;

  constructor(value: string, offset: number) {
    super('INVALID_BIT', `Invalid bit ${JSON.stringify(value)} at offset ${offset}; expected '0' or '1'`);
    this.value = value;
    this.offset = offset;
  }
}

export class ReservedSymbolError extends HuffmanError {
  readonly index: number;

  constructor(symbol: string, index: number) {
    super('RESERVED_SYMBOL', `Input contains reserved placeholder ${JSON.stringify(symbol)} at index ${index}`);
    this.index = index;
  }
}
