/**
 * `classify <question...>`
 *
 * Shows how a question would be handled: the classification tags that
 * fire, the override blocks the prompt would carry and the output token
 * estimate.
 *
 * ```bash
 * npm run cli -- classify "design a url shortener"
 * npm run cli -- classify --history --json "what about the cache?"
 * ```
 */

import { Command } from 'commander';
import { classifyQuestion, type ClassificationResult } from '../../core/classification';
import {
  createOverridePolicy,
  estimateMaxTokens,
  firedOverrides,
  selectOverrides,
  type OverrideKind,
  type TokenBudget,
} from '../../core/prompting';
import type { CliIO } from '../utils/io';

export interface ClassifySettings {
  tokenBudget: TokenBudget;
  maxTokens?: number;
  exclusiveOverrides: readonly OverrideKind[];
}

interface ClassifyOptions {
  history?: boolean;
  profile?: boolean;
  json?: boolean;
}

export interface ClassificationReport {
  question: string;
  tags: string[];
  overrides: OverrideKind[];
  maxTokens: number;
}

function activeTags(result: ClassificationResult): string[] {
  return Object.entries(result)
    .filter(([, value]) => value)
    .map(([tag]) => tag);
}

export function buildClassificationReport(
  question: string,
  settings: ClassifySettings,
  options: { history?: boolean; profile?: boolean } = {}
): ClassificationReport {
  const classification = classifyQuestion(question, options.history ?? false);
  const overrides = selectOverrides(
    firedOverrides(classification, options.profile ?? false),
    createOverridePolicy(settings.exclusiveOverrides)
  );

  return {
    question,
    tags: activeTags(classification),
    overrides,
    maxTokens: estimateMaxTokens(question, settings.tokenBudget, settings.maxTokens),
  };
}

export function createClassifyCommand(io: CliIO, settings: ClassifySettings): Command {
  return new Command('classify')
    .description('Show the classification, prompt overrides and token estimate for a question')
    .argument('<question...>', 'The question text')
    .option('--history', 'Treat the session as having prior turns')
    .option('--profile', 'Treat the session as having a profile loaded')
    .option('--json', 'Print the report as JSON')
    .action((words: string[], options: ClassifyOptions) => {
      const report = buildClassificationReport(words.join(' '), settings, options);

      if (options.json) {
        io.out(JSON.stringify(report, null, 2));
        return;
      }

      io.out(`Tags: ${report.tags.join(', ') || '(none)'}`);
      io.out(`Overrides: ${report.overrides.join(', ') || '(none)'}`);
      io.out(`Max tokens: ${report.maxTokens}`);
    });
}
