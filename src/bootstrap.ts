/**
 * Dependency wiring shared by the HTTP server and the CLI.
 *
 * Everything that touches configuration, the database or the network is
 * built here, once, and handed to `createApp` or a CLI command.
 */

import type { Config } from './config';
import { createDatabase, ensureSchema, SessionRecordRepository, type AppDatabase } from './storage';
import { SessionStore, type LoadReport } from './core/session';
import { createModelClient } from './llm';
import { createAuditSink } from './core/audit';
import { createDiagramRenderer } from './core/rendering';
import { ProfileTextExtractor } from './core/extraction';
import { CodeEvaluator, EvaluationCache } from './core/evaluation';
import { AnswerService } from './core/answering';
import { createOverridePolicy } from './core/prompting';
import { DeepgramTokenIssuer } from './core/voice';
import type { AppDependencies } from './api/app';

export interface OpenedStore {
  db: AppDatabase;
  store: SessionStore;
  report: LoadReport;
}

/**
 * Opens the database, creates the schema if needed and loads every stored
 * session into memory.
 */
export async function openSessionStore(databasePath: string): Promise<OpenedStore> {
  const db = createDatabase(databasePath);
  ensureSchema(db);

  const store = new SessionStore(new SessionRecordRepository(db));
  const report = await store.load();
  return { db, store, report };
}

export interface Runtime {
  db: AppDatabase;
  deps: AppDependencies;
  report: LoadReport;
}

export async function buildRuntime(config: Config): Promise<Runtime> {
  const { db, store, report } = await openSessionStore(config.database.path);

  const model = createModelClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    timeoutMs: config.anthropic.timeoutMs,
  });
  const audit = createAuditSink(config.audit.path);

  const evaluator = new CodeEvaluator({
    model,
    audit,
    cache: new EvaluationCache({
      maxEntries: config.evaluationCache.maxEntries,
      ttlMs: config.evaluationCache.ttlMs,
      policy: config.evaluationCache.policy,
    }),
  });

  const answers = new AnswerService({
    store,
    model,
    audit,
    evaluator,
    settings: {
      temperature: config.anthropic.temperature,
      topP: config.anthropic.topP,
      maxTokens: config.anthropic.maxTokens,
      tokenBudget: config.tokenBudget,
      policy: createOverridePolicy(config.prompts.exclusiveOverrides),
    },
  });

  const deps: AppDependencies = {
    config,
    model,
    store,
    answers,
    evaluator,
    audit,
    renderer: createDiagramRenderer(config.rendering),
    extractor: new ProfileTextExtractor(),
    voice: config.deepgram.apiKey ? new DeepgramTokenIssuer(config.deepgram.apiKey) : null,
  };

  return { db, deps, report };
}
