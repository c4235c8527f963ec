/**
 * JSONL Audit Sink
 *
 * Appends one `{"ts": <iso>, ...entry}` line per record. Writes go through a
 * promise chain so concurrent records never interleave within the file.
 * Write failures are logged and dropped; auditing never fails a request.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AuditEntry, AuditSink } from './types';

export class JsonlAuditSink implements AuditSink {
  private tail: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    readonly path: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(entry: AuditEntry): Promise<void> {
    const line = JSON.stringify({ ts: this.now().toISOString(), ...entry }) + '\n';
    this.tail = this.tail.then(() => this.append(line));
    return this.tail;
  }

  private async append(line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(this.path, line, 'utf8');
    } catch (err) {
      console.warn(
        `[Audit] Failed to write audit record to ${this.path}:`,
        err instanceof Error ? err.message : err
      );
    }
  }
}

export class NoopAuditSink implements AuditSink {
  async record(): Promise<void> {
    // auditing disabled
  }
}
