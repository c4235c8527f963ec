/**
 * `normalize [file]`
 *
 * Rewrites a raw model answer (a file, or stdin) into the normalized
 * markdown the API stores and prints it.
 */

import { Command } from 'commander';
import { detectContentKind, normalizeResponse } from '../../core/formatting';
import type { CliIO } from '../utils/io';

interface NormalizeOptions {
  kind?: boolean;
}

export function createNormalizeCommand(io: CliIO): Command {
  return new Command('normalize')
    .description('Normalize a raw model answer into clean markdown')
    .argument('[file]', 'Answer file (reads stdin when omitted)')
    .option('-k, --kind', 'Print the detected content kind before the answer')
    .action(async (file: string | undefined, options: NormalizeOptions) => {
      const raw = await io.readText(file);
      if (options.kind) {
        io.out(`kind: ${detectContentKind(raw)}`);
      }
      io.out(normalizeResponse(raw));
    });
}
