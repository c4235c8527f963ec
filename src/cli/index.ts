/**
 * CLI Entry Point
 *
 * Commands:
 * - `repair-diagram [file]` - Repair Mermaid source
 * - `normalize [file]`      - Normalize a raw model answer
 * - `classify <question>`   - Classification, overrides and token estimate
 * - `sessions`              - List stored sessions
 *
 * Usage:
 * ```bash
 * npm run cli -- classify "compare redis vs memcached"
 * npm run cli -- sessions --limit 5
 * ```
 */

import { config } from '../config';
import { DomainError } from '../core/errors';
import { createProgram } from './program';
import { consoleIO } from './utils/io';
import { dim, red } from './utils/terminal';

async function main(): Promise<void> {
  const program = createProgram({ io: consoleIO, config });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof DomainError) {
    console.error(red(`Error: ${error.message}`));
  } else {
    console.error(red('\nFatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));
    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack ?? ''));
    }
  }
  process.exit(1);
});
