/**
 * tree.ts - Huffman tree construction
 *
 * Builds the code tree by greedy merging: the two lowest-frequency nodes
 * are repeatedly combined under a new internal node until one node is left.
 *
 * Ties are broken by insertion order. Leaves are inserted in the frequency
 * table's key order (first occurrence in the text), and each merged node is
 * inserted after everything before it, so the same table always gives the
 * same tree.
 */

import { EmptyAlphabetError } from './errors.js';
import type { FrequencyTable } from './frequency.js';
import { MinPriorityQueue } from './priority-queue.js';

/**
 * Leaf node: the only kind of node that carries a symbol.
 */
export interface LeafNode {
  readonly kind: 'leaf';
  readonly symbol: string;
  readonly freq: number;
}

/**
 * Internal node created by a merge. freq = left.freq + right.freq.
 */
export interface InternalNode {
  readonly kind: 'internal';
  readonly freq: number;
  readonly left: TreeNode;
  readonly right: TreeNode;
}

export type TreeNode = LeafNode | InternalNode;

export interface HuffmanTree {
  readonly root: TreeNode;
  /** Number of leaves (distinct symbols) */
  readonly leafCount: number;
  /** Total symbol count, equal to root.freq */
  readonly symbolCount: number;
}

/** Queue entry: a node and the order it was queued in */
interface QueuedNode {
  node: TreeNode;
  seq: number;
}

const byFrequencyThenSequence = (a: QueuedNode, b: QueuedNode): number =>
  a.node.freq - b.node.freq || a.seq - b.seq;

export function isLeaf(node: TreeNode): node is LeafNode {
  return node.kind === 'leaf';
}

function leaf(symbol: string, freq: number): LeafNode {
  const node: LeafNode = { kind: 'leaf', symbol, freq };
  return Object.freeze(node);
}

function merge(left: TreeNode, right: TreeNode): InternalNode {
  const node: InternalNode = { kind: 'internal', freq: left.freq + right.freq, left, right };
  return Object.freeze(node);
}

/**
 * Build a Huffman tree from a frequency table.
 *
 * A table with a single symbol yields a tree whose root is that symbol's
 * leaf; code assignment and decoding special-case it.
 *
 * @throws EmptyAlphabetError if the table is empty
 */
export function buildHuffmanTree(frequencies: FrequencyTable): HuffmanTree {
  if (frequencies.size === 0) {
    throw new EmptyAlphabetError();
  }

  const queue = new MinPriorityQueue<QueuedNode>(byFrequencyThenSequence);
  let seq = 0;

  for (const [symbol, freq] of frequencies) {
    queue.push({ node: leaf(symbol, freq), seq: seq++ });
  }

  while (queue.size > 1) {
    const first = queue.pop();
    const second = queue.pop();
    if (first === undefined || second === undefined) break;

    // First removed goes left
    queue.push({ node: merge(first.node, second.node), seq: seq++ });
  }

  const last = queue.pop();
  if (last === undefined) {
    throw new EmptyAlphabetError();
  }

  return Object.freeze({
    root: last.node,
    leafCount: frequencies.size,
    symbolCount: last.node.freq,
  });
}

/**
 * Depth of every leaf, keyed by symbol. The sole leaf of a single-symbol
 * tree has depth 0.
 */
export function leafDepths(tree: HuffmanTree): Map<string, number> {
  const depths = new Map<string, number>();
  const stack: Array<[TreeNode, number]> = [[tree.root, 0]];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [node, depth] = entry;

    if (isLeaf(node)) {
      depths.set(node.symbol, depth);
    } else {
      stack.push([node.right, depth + 1], [node.left, depth + 1]);
    }
  }

  return depths;
}
