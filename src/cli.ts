#!/usr/bin/env node
/**
 * cli.ts - Compress one text with a Huffman code and print the result
 *
 * Prints the symbol/frequency/code table, the encoded and decoded strings,
 * the round-trip check and the size statistics. Exits 1 if the round trip
 * fails.
 */

import { compress } from './codec/index.js';
import { parseArgs, readInput, USAGE } from './options.js';
import { formatReport, toJSON } from './report.js';

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const text = readInput(options);
  const result = compress(text);

  if (options.json) {
    console.log(JSON.stringify(toJSON(result), null, 2));
  } else {
    for (const line of formatReport(result)) {
      console.log(line);
    }
  }

  if (!result.verified) {
    console.error('Error: decoded text does not match the input');
    process.exitCode = 1;
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
