import type { ModelMessage } from '../../llm/types';

/** Number of prior turns replayed to the model. */
export const HISTORY_WINDOW = 5;

export interface QuestionAnswerPair {
  question: string;
  answer: string;
}

/**
 * Replays the most recent turns as alternating user/assistant messages and
 * ends with the new question.
 */
export function buildMessages(history: readonly QuestionAnswerPair[], question: string): ModelMessage[] {
  const messages: ModelMessage[] = [];
  for (const turn of history.slice(-HISTORY_WINDOW)) {
    messages.push({ role: 'user', content: turn.question });
    messages.push({ role: 'assistant', content: turn.answer });
  }
  messages.push({ role: 'user', content: question });
  return messages;
}
