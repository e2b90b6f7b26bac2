import { describe, test } from 'node:test';
import * as assert from 'node:assert';
import { assignCodes, codeLengths, isPrefixFree, weightedLength, SINGLE_SYMBOL_CODE } from './codes.js';
import { buildHuffmanTree } from './tree.js';
import { countFrequencies } from './frequency.js';
import { SPACE_PLACEHOLDER } from './symbols.js';

function codesFor(text: string) {
  return assignCodes(buildHuffmanTree(countFrequencies(text)));
}

describe('assignCodes', () => {
  test('abacabad codes', () => {
    assert.deepStrictEqual([...codesFor('abacabad')], [
      ['a', '0'],
      ['b', '10'],
      ['c', '110'],
      ['d', '111'],
    ]);
  });

  test('space is coded under the placeholder', () => {
    const codes = codesFor('a b');
    assert.strictEqual(codes.get('b'), '0');
    assert.strictEqual(codes.get('a'), '10');
    assert.strictEqual(codes.get(SPACE_PLACEHOLDER), '11');
    assert.strictEqual(codes.has(' '), false);
  });

  test('single symbol gets a one-bit code', () => {
    const codes = codesFor('aaaa');
    assert.strictEqual(codes.size, 1);
    assert.strictEqual(codes.get('a'), SINGLE_SYMBOL_CODE);
    assert.strictEqual(SINGLE_SYMBOL_CODE.length, 1);
  });

  test('every symbol gets exactly one nonempty code', () => {
    const text = 'Pack my box with five dozen liquor jugs.';
    const table = countFrequencies(text);
    const codes = codesFor(text);
    assert.strictEqual(codes.size, table.size);
    for (const symbol of table.keys()) {
      const code = codes.get(symbol);
      assert.ok(code !== undefined && code.length > 0, `missing code for ${symbol}`);
      assert.match(code, /^[01]+$/);
    }
  });

  test('all-distinct symbols give a balanced code', () => {
    const codes = codesFor('abcdefgh');
    for (const code of codes.values()) {
      assert.strictEqual(code.length, 3);
    }
  });
});

describe('isPrefixFree', () => {
  test('assigned codes are prefix-free', () => {
    for (const text of ['ab', 'abacabad', 'hello world', 'aaaa', '0123456789 ,.;!?']) {
      assert.ok(isPrefixFree(codesFor(text)), text);
    }
  });

  test('detects a prefix', () => {
    assert.strictEqual(isPrefixFree(new Map([['x', '0'], ['y', '01']])), false);
    assert.strictEqual(isPrefixFree(new Map([['x', '110'], ['y', '0'], ['z', '11']])), false);
  });

  test('accepts disjoint codes', () => {
    assert.strictEqual(isPrefixFree(new Map([['x', '0'], ['y', '10'], ['z', '11']])), true);
  });
});

describe('codeLengths', () => {
  test('abacabad lengths', () => {
    assert.deepStrictEqual(Object.fromEntries(codeLengths(codesFor('abacabad'))), { a: 1, b: 2, c: 3, d: 3 });
  });

  test('single symbol has length 1', () => {
    assert.deepStrictEqual([...codeLengths(codesFor('aaaa'))], [['a', 1]]);
  });

  test('empty table', () => {
    assert.strictEqual(codeLengths(new Map()).size, 0);
  });
});

describe('weightedLength', () => {
  test('abacabad needs 14 bits', () => {
    const table = countFrequencies('abacabad');
    assert.strictEqual(weightedLength(table, codesFor('abacabad')), 14);
  });

  test('single symbol costs one bit per occurrence', () => {
    assert.strictEqual(weightedLength(countFrequencies('aaaa'), codesFor('aaaa')), 4);
  });
});
