/**
 * options.ts - Command line options for the huffman-text CLI
 */

import * as fs from 'fs';

export interface CliOptions {
  /** Print the result as JSON instead of the text report */
  json: boolean;
  /** Read input from this file */
  file: string | null;
  /** Input given directly on the command line (words joined by spaces) */
  text: string | null;
  help: boolean;
}

export const USAGE = `Usage:
  huffman-text [options] <text...>
  huffman-text [options] --file=<path>
  echo "text" | huffman-text [options]

Options:
  --file=<path>   Read input text from a file
  --json          Print the result as JSON
  --help          Show this message`;

/**
 * Parse command line arguments.
 * @throws Error on an unknown flag
 */
export function parseArgs(args: string[]): CliOptions {
  let json = false;
  let file: string | null = null;
  let help = false;
  const words: string[] = [];

  for (const arg of args) {
    if (arg === '--json') {
      json = true;
    } else if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('--file=')) {
      file = arg.slice(7);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      words.push(arg);
    }
  }

  return { json, file, text: words.length > 0 ? words.join(' ') : null, help };
}

/**
 * Resolve the input text: command line text, then file, then stdin.
 * One trailing newline is dropped from file and stdin input.
 */
export function readInput(options: CliOptions): string {
  if (options.text !== null) {
    return options.text;
  }
  const raw = fs.readFileSync(options.file ?? 0, 'utf-8');
  return stripTrailingNewline(raw);
}

export function stripTrailingNewline(s: string): string {
  return s.replace(/\r?\n$/, '');
}
