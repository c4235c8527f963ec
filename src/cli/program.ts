/**
 * Builds the commander program. Separate from the entry point so tests can
 * run commands in-process with captured IO.
 */

import { Command } from 'commander';
import type { Config } from '../config';
import { APP_VERSION } from '../api/routes/health';
import { openSessionStore } from '../bootstrap';
import { createRepairDiagramCommand } from './commands/repair-diagram';
import { createNormalizeCommand } from './commands/normalize';
import { createClassifyCommand } from './commands/classify';
import { createSessionsCommand, type StoreOpener } from './commands/sessions';
import type { CliIO } from './utils/io';

export interface ProgramOptions {
  io: CliIO;
  config: Config;
  openStore?: StoreOpener;
}

export function createProgram({ io, config, openStore = openSessionStore }: ProgramOptions): Command {
  const program = new Command('interview-copilot')
    .description('Offline tools for the interview copilot backend')
    .version(APP_VERSION)
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program.addCommand(createRepairDiagramCommand(io));
  program.addCommand(createNormalizeCommand(io));
  program.addCommand(
    createClassifyCommand(io, {
      tokenBudget: config.tokenBudget,
      maxTokens: config.anthropic.maxTokens,
      exclusiveOverrides: config.prompts.exclusiveOverrides,
    })
  );
  program.addCommand(createSessionsCommand(io, openStore, config.database.path));

  return program;
}
