/**
 * Code Evaluation Route
 *
 * POST /evaluate scores a candidate's code: static signals plus a model
 * critique, answered from the evaluation cache when the same code was
 * already evaluated in the same conversational context.
 */

import { Hono } from 'hono';
import type { SessionStore } from '../../core/session';
import { renderEvaluationContext, type CodeEvaluator } from '../../core/evaluation';
import { success, badRequest } from '../utils/response';
import { validate, getValidatedBody } from '../middleware/validate';
import { evaluateSchema } from '../types';

export interface EvaluationRouteDeps {
  store: SessionStore;
  evaluator: CodeEvaluator;
}

export function evaluationRoutes({ store, evaluator }: EvaluationRouteDeps): Hono {
  const router = new Hono();

  router.post('/evaluate', validate(evaluateSchema), async (c) => {
    const body = getValidatedBody(c, evaluateSchema);
    const session = await store.require(body.sessionId);

    if (!body.code.trim()) {
      return badRequest(c, 'Empty code');
    }

    const result = await evaluator.evaluate({
      sessionId: body.sessionId,
      problem: body.problem,
      code: body.code,
      language: body.language,
      context: renderEvaluationContext(session.turns),
    });

    return success(c, result);
  });

  return router;
}
