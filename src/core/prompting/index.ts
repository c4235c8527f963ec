/**
 * Prompt assembly: system prompt layering, style block, message history
 * and token budgeting.
 */

export { assemblePrompt, firedOverrides, type PromptInput } from './prompt-assembler';
export {
  OVERRIDE_KINDS,
  DEFAULT_EXCLUSIVE_OVERRIDES,
  DEFAULT_OVERRIDE_POLICY,
  CONCATENATE_ALL_POLICY,
  createOverridePolicy,
  selectOverrides,
  type OverrideKind,
  type OverridePolicy,
} from './override-policy';
export {
  STYLE_MODES,
  PRESET_CANDIDATES,
  DEFAULT_TONE_RULE,
  DEFAULT_LAYOUT_RULE,
  buildStyleBlock,
  resolveStyleMode,
  mulberry32,
  type StyleMode,
  type StylePreset,
  type StyleOptions,
} from './style';
export { buildMessages, HISTORY_WINDOW, type QuestionAnswerPair } from './messages';
export { estimateMaxTokens, estimateResponseTokens, type TokenBudget } from './token-budget';
