/**
 * bits.ts - Packing '0'/'1' bit strings into bytes
 *
 * The codec works on bit strings for readability. These helpers pack them
 * MSB-first into bytes and unpack them again. The bit length must be kept
 * alongside the bytes: the final byte is zero-padded and the padding is
 * indistinguishable from real bits.
 */

import { InvalidBitError } from './errors.js';

/**
 * Accumulates encoded bits into bytes, most significant bit first.
 */
export class BitWriter {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit (0 or 1).
   */
  writeBit(bit: 0 | 1): void {
    this.currentByte = (this.currentByte << 1) | bit;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Bytes written so far; a partial last byte is zero-filled on the right.
   * Leaves the writer open for more bits.
   */
  toBytes(): Uint8Array {
    const bytes = [...this.buffer];
    if (this.bitPosition > 0) {
      bytes.push(this.currentByte << (8 - this.bitPosition));
    }
    return new Uint8Array(bytes);
  }

  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }
}

/**
 * Reads back bits packed by BitWriter, in the same order.
 */
export class BitReader {
  private data: Uint8Array;
  private bytePos: number = 0;
  private bitPos: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit.
   * @throws RangeError past the end of the data
   */
  readBit(): 0 | 1 {
    if (this.bytePos >= this.data.length) {
      throw new RangeError('BitReader: end of data');
    }

    const bit = (this.data[this.bytePos] >> (7 - this.bitPos)) & 1;
    this.bitPos++;

    if (this.bitPos === 8) {
      this.bitPos = 0;
      this.bytePos++;
    }

    return bit === 0 ? 0 : 1;
  }
}

export interface PackedBits {
  bytes: Uint8Array;
  /** Number of meaningful bits; the rest of the last byte is padding */
  bitLength: number;
}

/**
 * Pack a bit string into bytes.
 * @throws InvalidBitError on a character other than '0' or '1'
 */
export function packBits(bits: string): PackedBits {
  const writer = new BitWriter();
  for (let i = 0; i < bits.length; i++) {
    const c = bits[i];
    if (c !== '0' && c !== '1') {
      throw new InvalidBitError(c, i);
    }
    writer.writeBit(c === '1' ? 1 : 0);
  }
  return { bytes: writer.toBytes(), bitLength: writer.bitCount };
}

/**
 * Unpack the first bitLength bits of a buffer into a bit string.
 * @throws RangeError if the buffer holds fewer than bitLength bits
 */
export function unpackBits(bytes: Uint8Array, bitLength: number): string {
  if (bitLength < 0 || bitLength > bytes.length * 8) {
    throw new RangeError(`Bit length ${bitLength} out of range [0, ${bytes.length * 8}]`);
  }

  const reader = new BitReader(bytes);
  let s = '';
  for (let i = 0; i < bitLength; i++) {
    s += reader.readBit() === 1 ? '1' : '0';
  }
  return s;
}
