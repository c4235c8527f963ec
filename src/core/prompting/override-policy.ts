/**
 * Override Policy
 *
 * Each override block in the system prompt belongs to one `OverrideKind`.
 * `OVERRIDE_KINDS` is the assembly order. A policy may mark some kinds as
 * exclusive: when any exclusive kind fires, the first of them in `order` is
 * the only override block emitted.
 */

export const OVERRIDE_KINDS = [
  'persona',
  'comparison',
  'greeting',
  'offTopic',
  'ambiguous',
  'contextFallback',
  'systemDesign',
  'databaseSchema',
  'uiDesign',
  'algorithm',
  'technicalStrategy',
] as const;

export type OverrideKind = (typeof OVERRIDE_KINDS)[number];

export const DEFAULT_EXCLUSIVE_OVERRIDES = ['greeting', 'offTopic'] as const satisfies readonly OverrideKind[];

export interface OverridePolicy {
  order: readonly OverrideKind[];
  exclusive: readonly OverrideKind[];
}

export const DEFAULT_OVERRIDE_POLICY: OverridePolicy = {
  order: OVERRIDE_KINDS,
  exclusive: DEFAULT_EXCLUSIVE_OVERRIDES,
};

/** Concatenates every fired override in order. */
export const CONCATENATE_ALL_POLICY: OverridePolicy = {
  order: OVERRIDE_KINDS,
  exclusive: [],
};

export function createOverridePolicy(exclusive: readonly OverrideKind[]): OverridePolicy {
  return { order: OVERRIDE_KINDS, exclusive };
}

/**
 * Narrows the fired kinds to what the policy lets through, preserving
 * `order`.
 */
export function selectOverrides(fired: ReadonlySet<OverrideKind>, policy: OverridePolicy): OverrideKind[] {
  const ordered = policy.order.filter((kind) => fired.has(kind));
  const exclusive = ordered.find((kind) => policy.exclusive.includes(kind));
  return exclusive ? [exclusive] : ordered;
}
