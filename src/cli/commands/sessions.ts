/**
 * `sessions`
 *
 * Lists stored sessions, most recently updated first, straight from the
 * database file.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { OpenedStore } from '../../bootstrap';
import type { CliIO } from '../utils/io';
import { bold, formatAge, formatSeparator } from '../utils/terminal';

export type StoreOpener = (databasePath: string) => Promise<OpenedStore>;

interface SessionsOptions {
  db: string;
  limit: number;
  json?: boolean;
}

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}

export function createSessionsCommand(io: CliIO, open: StoreOpener, defaultDbPath: string): Command {
  return new Command('sessions')
    .description('List stored sessions')
    .option('--db <path>', 'SQLite database file', defaultDbPath)
    .option('-n, --limit <count>', 'Maximum sessions to show', parseLimit, 10)
    .option('--json', 'Print the list as JSON')
    .action(async (options: SessionsOptions) => {
      const { db, store, report } = await open(options.db);
      try {
        const sessions = (await store.list()).slice(0, options.limit);

        if (options.json) {
          io.out(
            JSON.stringify(
              sessions.map((s) => ({
                sessionId: s.id,
                lastUpdate: s.lastUpdate.toISOString(),
                turnCount: s.turnCount,
              })),
              null,
              2
            )
          );
          return;
        }

        if (sessions.length === 0) {
          io.out('No sessions found.');
          return;
        }

        io.out(bold(`Sessions (${sessions.length})`));
        io.out(formatSeparator(60));
        for (const session of sessions) {
          const turns = `${session.turnCount} turn${session.turnCount === 1 ? '' : 's'}`;
          io.out(`${session.id}  ${turns}  ${formatAge(session.lastUpdate)}`);
        }
        if (report.skipped > 0) {
          io.err(`${report.skipped} unreadable record(s) skipped`);
        }
      } finally {
        db.$client.close();
      }
    });
}
