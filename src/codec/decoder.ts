/**
 * decoder.ts - Bit string to text
 *
 * Walks the tree from the root one bit at a time ('0' left, '1' right).
 * Reaching a leaf emits its symbol and resets the cursor to the root.
 */

import { InvalidBitError, TruncatedStreamError } from './errors.js';
import { fromSymbol } from './symbols.js';
import type { HuffmanTree, InternalNode, TreeNode } from './tree.js';

/**
 * Decode a bit string produced with the codes of this tree.
 *
 * @throws InvalidBitError on a character other than '0' or '1'
 * @throws TruncatedStreamError if the bits end inside a codeword
 */
export function decode(bits: string, tree: HuffmanTree): string {
  const { root } = tree;
  const out: string[] = [];

  // Single-leaf tree: no edges, every bit is one symbol
  if (root.kind === 'leaf') {
    const ch = fromSymbol(root.symbol);
    for (let i = 0; i < bits.length; i++) {
      readBit(bits, i);
      out.push(ch);
    }
    return out.join('');
  }

  let node: InternalNode = root;
  let codewordStart = 0;

  for (let i = 0; i < bits.length; i++) {
    const next: TreeNode = readBit(bits, i) === 0 ? node.left : node.right;

    if (next.kind === 'leaf') {
      out.push(fromSymbol(next.symbol));
      node = root;
      codewordStart = i + 1;
    } else {
      node = next;
    }
  }

  if (node !== root) {
    throw new TruncatedStreamError(codewordStart, out.length);
  }

  return out.join('');
}

function readBit(bits: string, i: number): 0 | 1 {
  const c = bits[i];
  if (c === '0') return 0;
  if (c === '1') return 1;
  throw new InvalidBitError(c, i);
}
