/**
 * Prompt Assembler
 *
 * Builds the system prompt for one question from four layers:
 *
 * 1. The caller's system prompt, or the default one
 * 2. The candidate profile block, when a profile was uploaded
 * 3. Override blocks for every classification tag that fired, filtered
 *    through the override policy
 * 4. The style/tone/layout block, which is always last
 *
 * Assembly is pure: the same input (including the style seed) always yields
 * the same prompt.
 */

import type { ClassificationResult } from '../classification';
import { DEFAULT_SYSTEM_PROMPT, OVERRIDE_BLOCKS, PROFILE_CONTEXT_HEADER } from '../../llm/prompts';
import { DEFAULT_OVERRIDE_POLICY, selectOverrides, type OverrideKind, type OverridePolicy } from './override-policy';
import { buildStyleBlock, type StyleOptions } from './style';

export interface PromptInput {
  basePrompt?: string | null;
  profileText?: string | null;
  classification: ClassificationResult;
  style?: StyleOptions;
  policy?: OverridePolicy;
}

/**
 * Maps classification tags to the override kinds they trigger. The persona
 * override only applies when there is a profile to speak from.
 */
export function firedOverrides(classification: ClassificationResult, hasProfile: boolean): Set<OverrideKind> {
  const fired = new Set<OverrideKind>();
  if (hasProfile && classification.needsFirstPerson) fired.add('persona');
  if (classification.needsComparison) fired.add('comparison');
  if (classification.greeting) fired.add('greeting');
  if (classification.offTopic) fired.add('offTopic');
  if (classification.ambiguous) fired.add('ambiguous');
  if (!classification.hasSufficientContext) fired.add('contextFallback');
  if (classification.systemDesign) fired.add('systemDesign');
  if (classification.databaseSchema) fired.add('databaseSchema');
  if (classification.uiDesign) fired.add('uiDesign');
  if (classification.algorithm) fired.add('algorithm');
  if (classification.technicalStrategy) fired.add('technicalStrategy');
  return fired;
}

export function assemblePrompt(input: PromptInput): string {
  const base = input.basePrompt && input.basePrompt.trim() ? input.basePrompt : DEFAULT_SYSTEM_PROMPT;
  const profile = input.profileText?.trim() ?? '';
  const policy = input.policy ?? DEFAULT_OVERRIDE_POLICY;

  let prompt = base;
  if (profile) {
    prompt += `\n\n${PROFILE_CONTEXT_HEADER}${profile}`;
  }

  for (const kind of selectOverrides(firedOverrides(input.classification, profile !== ''), policy)) {
    prompt += OVERRIDE_BLOCKS[kind];
  }

  return prompt + buildStyleBlock(input.style ?? {});
}
