/**
 * `repair-diagram [file]`
 *
 * Runs Mermaid source (a file, or stdin) through the repair pipeline and
 * prints the result. Offline; nothing is rendered.
 *
 * ```bash
 * npm run cli -- repair-diagram diagram.mmd --preset polished
 * cat diagram.mmd | npm run cli -- repair-diagram --check
 * ```
 */

import { Command } from 'commander';
import { prepareDiagram } from '../../core/rendering';
import { normalizeDiagramText, stripDiagramFences } from '../../core/diagrams';
import type { CliIO } from '../utils/io';

interface RepairDiagramOptions {
  theme?: string;
  preset?: string;
  check?: boolean;
}

export function createRepairDiagramCommand(io: CliIO): Command {
  return new Command('repair-diagram')
    .description('Repair Mermaid diagram source and print it')
    .argument('[file]', 'Mermaid source file (reads stdin when omitted)')
    .option('-t, --theme <theme>', 'Mermaid theme (default, dark, forest, neutral, base)')
    .option('-p, --preset <preset>', 'Style preset (default, polished, compact)')
    .option('--check', 'Only report whether the source would change; exit 1 if it would')
    .action(async (file: string | undefined, options: RepairDiagramOptions) => {
      const source = await io.readText(file);
      const repaired = prepareDiagram(source, { theme: options.theme, stylePreset: options.preset });

      if (options.check) {
        const unchanged = normalizeDiagramText(stripDiagramFences(source)) === repaired;
        io.out(unchanged ? 'unchanged' : 'would change');
        if (!unchanged) process.exitCode = 1;
        return;
      }

      io.out(repaired);
    });
}
