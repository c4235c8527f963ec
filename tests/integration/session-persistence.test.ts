/**
 * Integration Tests: Session Persistence
 *
 * The SessionStore on top of the Drizzle repository and an in-memory
 * SQLite database: what one store writes, a fresh store loads.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDatabase, ensureSchema, SessionRecordRepository, type AppDatabase } from '../../src/storage';
import { SessionStore } from '../../src/core/session';
import { steppingClock } from '../helpers';

describe('session persistence', () => {
  let db: AppDatabase;
  let repository: SessionRecordRepository;

  beforeEach(() => {
    db = createDatabase(':memory:');
    ensureSchema(db);
    repository = new SessionRecordRepository(db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.$client.close();
  });

  it('should restore sessions in a new store', async () => {
    // Arrange
    const writer = new SessionStore(repository, { now: steppingClock() });
    const { id } = await writer.create();
    await writer.appendTurn(id, 'What is CAP?', 'Consistency, availability, partition tolerance.');
    await writer.setProfile(id, 'Backend engineer');
    await writer.appendTranscriptChunk(id, 'partial words');

    // Act
    const reader = new SessionStore(repository);
    const report = await reader.load();

    // Assert
    expect(report).toEqual({ loaded: 1, skipped: 0 });
    expect(await reader.require(id)).toEqual(await writer.require(id));
  });

  it('should upsert one row per session', async () => {
    const store = new SessionStore(repository);
    const { id } = await store.create();
    await store.appendTurn(id, 'q', 'a');

    const rows = await repository.findAll();

    expect(rows).toHaveLength(1);
    expect(rows[0]?.id).toBe(id);
  });

  it('should skip corrupt rows on load', async () => {
    // Arrange
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new SessionStore(repository);
    const { id } = await store.create();
    await repository.saveRaw('corrupt', '{"qna": 42}');

    // Act
    const reader = new SessionStore(repository);
    const report = await reader.load();

    // Assert
    expect(report).toEqual({ loaded: 1, skipped: 1 });
    expect(await reader.get(id)).not.toBeNull();
  });

  it('should delete the row with the session', async () => {
    const store = new SessionStore(repository);
    const { id } = await store.create();

    await store.delete(id);

    expect(await repository.findById(id)).toBeNull();
  });
});
