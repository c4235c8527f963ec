/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt text for the two model calls the service makes:
 *
 * 1. **Interview answers**: the default system prompt, the profile header and
 *    the override blocks the prompt assembler layers on top.
 * 2. **Code critiques**: the fixed-format evaluator prompt and the offline
 *    stand-in critique.
 */

export {
  DEFAULT_SYSTEM_PROMPT,
  PROFILE_CONTEXT_HEADER,
  OVERRIDE_BLOCKS,
} from './interview-assistant';

export {
  CODE_CRITIQUE_SYSTEM_PROMPT,
  CODE_CRITIQUE_TEMPERATURE,
  CODE_CRITIQUE_MAX_TOKENS,
  OFFLINE_CRITIQUE,
  buildCodeCritiqueUserMessage,
  type CodeCritiqueInput,
} from './code-critique';
