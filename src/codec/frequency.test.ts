/**
 * frequency.test.ts - Tests for symbol substitution and frequency counting
 */

import { describe, test } from 'node:test';
import * as assert from 'node:assert';
import { countFrequencies, totalCount } from './frequency.js';
import { SPACE_PLACEHOLDER, fromSymbol, toSymbol, toSymbols } from './symbols.js';
import { HuffmanError, ReservedSymbolError } from './errors.js';

describe('Space substitution', () => {
  test('space maps to the placeholder and back', () => {
    assert.strictEqual(toSymbol(' ', 0), SPACE_PLACEHOLDER);
    assert.strictEqual(fromSymbol(SPACE_PLACEHOLDER), ' ');
  });

  test('other characters map to themselves', () => {
    for (const ch of ['a', '-', '\t', '\n', '0', '😀']) {
      assert.strictEqual(toSymbol(ch, 0), ch);
      assert.strictEqual(fromSymbol(ch), ch);
    }
  });

  test('toSymbols splits by code point', () => {
    assert.deepStrictEqual(toSymbols('a b😀'), ['a', SPACE_PLACEHOLDER, 'b', '😀']);
  });

  test('placeholder in input is rejected with its index', () => {
    assert.throws(
      () => toSymbols(`ab${SPACE_PLACEHOLDER}`),
      (err: unknown) => {
        assert.ok(err instanceof ReservedSymbolError);
        assert.ok(err instanceof HuffmanError);
        assert.strictEqual(err.code, 'RESERVED_SYMBOL');
        assert.strictEqual(err.index, 2);
        return true;
      }
    );
  });
});

describe('countFrequencies', () => {
  test('empty input gives an empty table', () => {
    assert.strictEqual(countFrequencies('').size, 0);
  });

  test('counts each symbol once, in first-occurrence order', () => {
    const table = countFrequencies('hello world');
    assert.deepStrictEqual([...table], [
      ['h', 1],
      ['e', 1],
      ['l', 3],
      ['o', 2],
      [SPACE_PLACEHOLDER, 1],
      ['w', 1],
      ['r', 1],
      ['d', 1],
    ]);
  });

  test('spaces are counted under the placeholder only', () => {
    const table = countFrequencies('a  b ');
    assert.strictEqual(table.get(SPACE_PLACEHOLDER), 3);
    assert.strictEqual(table.has(' '), false);
  });

  test('hyphen is an ordinary symbol', () => {
    const table = countFrequencies('a-b c');
    assert.strictEqual(table.get('-'), 1);
    assert.strictEqual(table.get(SPACE_PLACEHOLDER), 1);
  });

  test('surrogate pairs count as one symbol', () => {
    const table = countFrequencies('a😀😀');
    assert.strictEqual(table.size, 2);
    assert.strictEqual(table.get('😀'), 2);
  });

  test('all counts are positive', () => {
    for (const count of countFrequencies('mississippi river').values()) {
      assert.ok(count > 0);
    }
  });

  test('total count equals input length', () => {
    for (const text of ['', 'a', 'aaaa', 'hello world', 'abacabad', 'The quick, brown fox! 42']) {
      assert.strictEqual(totalCount(countFrequencies(text)), text.length, text);
    }
  });
});
