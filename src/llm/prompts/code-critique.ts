/**
 * Code Critique Prompt Builder
 *
 * Asks the model for a fixed-shape review of a candidate's solution so that
 * `parseCritique` can pull out sections and scores without a JSON mode.
 *
 * Expected response shape:
 * ```
 * Summary:
 * <overview>
 *
 * Strengths:
 * - ...
 *
 * Weaknesses:
 * - ...
 *
 * Scores: {"correctness":0.8,...}
 *
 * Recommendations:
 * - ...
 * ```
 */

export const CODE_CRITIQUE_SYSTEM_PROMPT = `You are a senior coding interview evaluator. Given a problem statement (when provided), a candidate's source code and its language, write a concise critique.

Respond in exactly this format, with these headings:
Summary:
<3 to 6 sentences on the approach and its correctness>

Strengths:
- <bullet>
- <bullet>

Weaknesses:
- <bullet>
- <bullet>

Scores: {"correctness":<0..1>,"optimization":<0..1>,"approach_explanation":<0..1>,"complexity_discussion":<0..1>,"edge_cases_testing":<0..1>,"total":<0..1>}

Recommendations:
- <actionable bullet>
- <actionable bullet>

Be concrete and never use placeholders. When the problem is missing, infer the intent from the code.`;

/** Temperature used for critiques, lower than for answers. */
export const CODE_CRITIQUE_TEMPERATURE = 0.2;

export const CODE_CRITIQUE_MAX_TOKENS = 2048;

export interface CodeCritiqueInput {
  problem: string;
  code: string;
  language: string;
}

export function buildCodeCritiqueUserMessage({ problem, code, language }: CodeCritiqueInput): string {
  return `Problem: ${problem || 'N/A'}\nLanguage: ${language}\n\nCode:\n\`\`\`${language}\n${code}\n\`\`\``;
}

/**
 * Returned instead of a model critique when no model is configured.
 */
export const OFFLINE_CRITIQUE = `Summary: Offline mode. Cannot evaluate without a language model.

Strengths:
- Runs locally

Weaknesses:
- No language model available

Scores: {"correctness":0.0,"optimization":0.0,"approach_explanation":0.0,"complexity_discussion":0.0,"edge_cases_testing":0.0,"total":0.0}

Recommendations:
- Configure ANTHROPIC_API_KEY`;
