/**
 * CLI Tests: Commands
 *
 * Runs the commander program in-process with captured output, canned
 * input and an in-memory session store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Command } from 'commander';
import { z } from 'zod';
import { createDatabase, ensureSchema, SessionRecordRepository } from '../../src/storage';
import { SessionStore } from '../../src/core/session';
import { createProgram } from '../../src/cli/program';
import type { CliIO } from '../../src/cli/utils/io';
import type { OpenedStore } from '../../src/bootstrap';
import { createTestConfig } from '../setup';
import { steppingClock } from '../helpers';

interface CapturedIO extends CliIO {
  lines: string[];
  errors: string[];
  files: string[];
}

function captureIO(input: string = ''): CapturedIO {
  const lines: string[] = [];
  const errors: string[] = [];
  const files: string[] = [];
  return {
    lines,
    errors,
    files,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
    readText: async (file) => {
      files.push(file ?? '-');
      return input;
    },
  };
}

async function run(program: Command, ...args: string[]): Promise<void> {
  program.exitOverride();
  for (const command of program.commands) command.exitOverride();
  await program.parseAsync(args, { from: 'user' });
}

describe('CLI', () => {
  describe('classify', () => {
    it('should print tags, selected overrides and the token estimate', async () => {
      const io = captureIO();

      await run(createProgram({ io, config: createTestConfig() }), 'classify', 'thanks!');

      expect(io.lines).toEqual(['Tags: greeting, ambiguous', 'Overrides: greeting', 'Max tokens: 550']);
    });

    it('should follow the configured exclusive overrides', async () => {
      const io = captureIO();
      const config = createTestConfig({ PROMPT_EXCLUSIVE_OVERRIDES: '' });

      await run(createProgram({ io, config }), 'classify', 'thanks!');

      expect(io.lines[1]).toBe('Overrides: greeting, ambiguous, contextFallback');
    });

    it('should print a JSON report for a multi-word question', async () => {
      const io = captureIO();

      await run(
        createProgram({ io, config: createTestConfig() }),
        'classify',
        '--json',
        'Compare',
        'Redis',
        'vs',
        'Memcached',
        'for',
        'caching'
      );

      expect(JSON.parse(io.lines.join('\n'))).toEqual({
        question: 'Compare Redis vs Memcached for caching',
        tags: ['needsComparison', 'systemDesign'],
        overrides: ['comparison', 'contextFallback', 'systemDesign'],
        maxTokens: 1200,
      });
    });
  });

  describe('repair-diagram', () => {
    afterEach(() => {
      process.exitCode = undefined;
    });

    it('should print the repaired source', async () => {
      const io = captureIO('```mermaid\nflowchart LR\nA -- 1. Send Request --> B\n```');

      await run(createProgram({ io, config: createTestConfig() }), 'repair-diagram', 'diagram.mmd');

      expect(io.files).toEqual(['diagram.mmd']);
      expect(io.lines).toEqual(['flowchart LR\nA -- 1 --> B']);
    });

    it('should apply the theme option', async () => {
      const io = captureIO('flowchart LR\nA --> B');

      await run(createProgram({ io, config: createTestConfig() }), 'repair-diagram', '--theme', 'dark');

      expect(io.files).toEqual(['-']);
      expect(io.lines).toEqual(["%%{init: { 'theme': 'dark' } }%%\nflowchart LR\nA --> B"]);
    });

    it('should report whether the source would change in check mode', async () => {
      const clean = captureIO('flowchart LR\nA --> B');
      const dirty = captureIO('flowchart LR\nA -->|2. Reply| B');

      await run(createProgram({ io: clean, config: createTestConfig() }), 'repair-diagram', '--check');
      expect(clean.lines).toEqual(['unchanged']);
      expect(process.exitCode).toBeUndefined();

      await run(createProgram({ io: dirty, config: createTestConfig() }), 'repair-diagram', '--check');
      expect(dirty.lines).toEqual(['would change']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('normalize', () => {
    it('should print the normalized answer', async () => {
      const io = captureIO('Pick [[Team] Size] now');

      await run(createProgram({ io, config: createTestConfig() }), 'normalize', 'answer.md');

      expect(io.lines).toEqual(['Pick team size now']);
    });

    it('should print the detected kind first when asked', async () => {
      const io = captureIO('Hello there');

      await run(createProgram({ io, config: createTestConfig() }), 'normalize', '--kind');

      expect(io.lines).toEqual(['kind: general', 'Hello there']);
    });
  });

  describe('sessions', () => {
    let opened: OpenedStore;
    let openedPaths: string[];

    beforeEach(() => {
      const db = createDatabase(':memory:');
      ensureSchema(db);
      const store = new SessionStore(new SessionRecordRepository(db), {
        now: steppingClock(),
        generateId: (() => {
          let next = 0;
          return () => `session-${++next}`;
        })(),
      });
      opened = { db, store, report: { loaded: 0, skipped: 0 } };
      openedPaths = [];
    });

    const opener = async (path: string): Promise<OpenedStore> => {
      openedPaths.push(path);
      return opened;
    };

    it('should list sessions as JSON, most recent first', async () => {
      // Arrange
      const first = await opened.store.create();
      const second = await opened.store.create();
      await opened.store.appendTurn(first.id, 'q', 'a');
      const io = captureIO();

      // Act
      await run(
        createProgram({ io, config: createTestConfig(), openStore: opener }),
        'sessions',
        '--json',
        '--db',
        'copy.db'
      );

      // Assert
      expect(openedPaths).toEqual(['copy.db']);
      expect(JSON.parse(io.lines.join('\n'))).toEqual([
        { sessionId: first.id, lastUpdate: '2026-01-01T00:00:02.000Z', turnCount: 1 },
        { sessionId: second.id, lastUpdate: '2026-01-01T00:00:01.000Z', turnCount: 0 },
      ]);
      expect(opened.db.$client.open).toBe(false);
    });

    it('should honor the limit and default to the configured database', async () => {
      await opened.store.create();
      await opened.store.create();
      await opened.store.create();
      const io = captureIO();

      await run(
        createProgram({ io, config: createTestConfig({ DATABASE_PATH: 'sessions.db' }), openStore: opener }),
        'sessions',
        '--json',
        '--limit',
        '2'
      );

      expect(openedPaths).toEqual(['sessions.db']);
      const listed = z.array(z.object({ sessionId: z.string() })).parse(JSON.parse(io.lines.join('\n')));
      expect(listed.map((s) => s.sessionId)).toEqual(['session-3', 'session-2']);
    });

    it('should say so when there are no sessions', async () => {
      const io = captureIO();

      await run(createProgram({ io, config: createTestConfig(), openStore: opener }), 'sessions');

      expect(io.lines).toEqual(['No sessions found.']);
    });

    it('should reject a limit that is not a positive integer', async () => {
      const io = captureIO();
      const program = createProgram({ io, config: createTestConfig(), openStore: opener });

      await expect(run(program, 'sessions', '--limit', '0')).rejects.toThrow('Limit must be a positive integer.');
      expect(openedPaths).toEqual([]);
    });
  });
});
