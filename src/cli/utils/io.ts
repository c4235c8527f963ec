/**
 * Input and output for CLI commands. Commands never touch the console or
 * stdin directly so tests can drive them in-process.
 */

import { readFile } from 'node:fs/promises';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Reads a file, or all of stdin when no path is given */
  readText: (file?: string) => Promise<string>;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readText: (file) => (file && file !== '-' ? readFile(file, 'utf8') : readStdin()),
};
