/**
 * codes.ts - Code table assignment
 *
 * Walks the tree depth-first, appending '0' for each left edge and '1' for
 * each right edge. Only leaves receive codes, and no leaf lies on the path
 * to another, so the table is prefix-free.
 */

import type { FrequencyTable } from './frequency.js';
import type { HuffmanTree, TreeNode } from './tree.js';

/** Map from codec symbol to its bit string ('0'/'1' characters) */
export type CodeTable = ReadonlyMap<string, string>;

/** Code given to the only symbol of a single-leaf tree */
export const SINGLE_SYMBOL_CODE = '0';

/**
 * Assign a code to every leaf of the tree.
 */
export function assignCodes(tree: HuffmanTree): CodeTable {
  const codes = new Map<string, string>();
  const { root } = tree;

  if (root.kind === 'leaf') {
    codes.set(root.symbol, SINGLE_SYMBOL_CODE);
    return codes;
  }

  const stack: Array<{ node: TreeNode; path: string }> = [{ node: root, path: '' }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const { node, path } = entry;

    if (node.kind === 'leaf') {
      codes.set(node.symbol, path);
    } else {
      // Right pushed first so the left subtree is visited first
      stack.push({ node: node.right, path: path + '1' });
      stack.push({ node: node.left, path: path + '0' });
    }
  }

  return codes;
}

/**
 * Check that no code is a prefix of another.
 *
 * After sorting, any code that prefixes another is immediately followed by
 * a code it prefixes, so only neighbours need comparing.
 */
export function isPrefixFree(codes: CodeTable): boolean {
  const sorted = [...codes.values()].sort();
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].startsWith(sorted[i - 1])) {
      return false;
    }
  }
  return true;
}

/** Bit length of every code, keyed by symbol. */
export function codeLengths(codes: CodeTable): Map<string, number> {
  const lengths = new Map<string, number>();
  for (const [symbol, code] of codes) {
    lengths.set(symbol, code.length);
  }
  return lengths;
}

/**
 * Total bits needed to encode the counted text with this table.
 */
export function weightedLength(frequencies: FrequencyTable, codes: CodeTable): number {
  let bits = 0;
  for (const [symbol, count] of frequencies) {
    bits += count * (codes.get(symbol)?.length ?? 0);
  }
  return bits;
}
