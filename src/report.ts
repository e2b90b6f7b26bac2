/**
 * report.ts - Text and JSON rendering of a codec result
 */

import type { CodecResult, CodecStats } from './codec/index.js';

const RULE = '='.repeat(50);

/**
 * Render a result as aligned text lines: the symbol table (in first
 * occurrence order) followed by the strings and size statistics.
 */
export function formatReport(result: CodecResult): string[] {
  const { stats } = result;
  const lines: string[] = [];

  lines.push(RULE);
  lines.push('Huffman Codes:');
  lines.push(RULE);
  lines.push('Symbol  Frequency  Code');
  lines.push('-'.repeat(50));
  for (const [symbol, count] of result.frequencies) {
    const code = result.codes.get(symbol) ?? '';
    lines.push(escapeControl(symbol).padEnd(8) + String(count).padEnd(11) + code);
  }
  lines.push(RULE);

  const rows: [string, string][] = [
    ['Original', escapeControl(result.input)],
    ['Encoded', result.encoded],
    ['Decoded', escapeControl(result.decoded)],
    ['Verification', result.verified ? 'passed' : 'FAILED'],
    ['Original size', `${stats.originalBits} bits`],
    ['Compressed size', `${stats.encodedBits} bits`],
    ['Ratio', formatRatio(stats)],
  ];
  for (const [label, value] of rows) {
    lines.push(`${label}:`.padEnd(17) + value);
  }
  lines.push(RULE);

  return lines;
}

const NAMED_ESCAPES: Record<string, string> = { '\n': '\\n', '\r': '\\r', '\t': '\\t' };

/**
 * Show control characters escaped (\n, \t, \u0000) so each report row
 * stays on one line.
 */
export function escapeControl(text: string): string {
  return text.replace(
    /\p{Cc}/gu,
    c => NAMED_ESCAPES[c] ?? '\\u' + c.charCodeAt(0).toString(16).padStart(4, '0')
  );
}

export function formatRatio(stats: CodecStats): string {
  return stats.compressionRatio === null ? 'n/a' : stats.compressionRatio.toFixed(2);
}

export interface ReportJSON {
  input: string;
  frequencies: [string, number][];
  codes: [string, string][];
  encoded: string;
  decoded: string;
  verified: boolean;
  stats: CodecStats;
}

/**
 * Plain-object form of a result for JSON output. The tree is left out.
 */
export function toJSON(result: CodecResult): ReportJSON {
  return {
    input: result.input,
    frequencies: [...result.frequencies],
    codes: [...result.codes],
    encoded: result.encoded,
    decoded: result.decoded,
    verified: result.verified,
    stats: result.stats,
  };
}
