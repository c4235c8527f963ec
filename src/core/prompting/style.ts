/**
 * Style, tone and layout block appended to every system prompt.
 *
 * `auto` and `varied` pick a preset at random when variability is above
 * zero. The PRNG is mulberry32 seeded from the request, so the same seed
 * always yields the same preset.
 */

export const STYLE_MODES = [
  'auto',
  'varied',
  'concise',
  'deep-dive',
  'mentor',
  'executive',
  'faq',
  'qa',
  'checklist',
  'narrative',
] as const;

export type StyleMode = (typeof STYLE_MODES)[number];

/** Presets that `auto`/`varied` may choose from, in draw order. */
export const PRESET_CANDIDATES = [
  'concise',
  'deep-dive',
  'mentor',
  'executive',
  'faq',
  'qa',
  'checklist',
  'narrative',
] as const;

export type StylePreset = (typeof PRESET_CANDIDATES)[number];

const PRESET_RULES: Record<StylePreset, string> = {
  concise: 'Keep it tight. 4 to 6 bullets at most, subheadings only when needed.',
  'deep-dive': "Use full sections including 'Why it matters', 'Trade-offs' and a short example.",
  mentor: "Use a coaching voice and add 'Pitfalls' and 'What to practice' when useful.",
  executive: "Lead with outcomes and impact. Short paragraphs and a closing 'Bottom line'.",
  faq: 'Answer as 4 to 6 question and answer pairs.',
  qa: 'Walk through the key points as a Q and A dialogue, then summarize briefly.',
  checklist: 'Give an actionable checklist with clear steps and acceptance criteria.',
  narrative: "Tell it as a walkthrough: 'Context', then 'Decision', then 'Result'.",
};

const TONE_RULES: Record<string, string> = {
  neutral: 'Neutral, precise, professional.',
  friendly: 'Warm, approachable, but still professional.',
  mentor: 'Supportive, coaching tone with practical tips.',
  executive: 'Crisp, outcome-focused, confident.',
  academic: 'Formal, with rigorous definitions.',
  coaching: 'Encouraging, step-by-step guidance.',
};

const LAYOUT_RULES: Record<string, string> = {
  bullets: 'Prefer bullets with minimal headings.',
  narrative: 'Short paragraphs, minimal headings.',
  qa: 'Q and A pairs.',
  faq: 'FAQ format.',
  checklist: 'Checklist of steps.',
  'pros-cons': 'Include a Pros/Cons section.',
  steps: 'Numbered steps first, details after.',
};

export const DEFAULT_TONE_RULE = 'Neutral, precise, professional.';
export const DEFAULT_LAYOUT_RULE = 'Use judgement for best readability.';

export interface StyleOptions {
  styleMode?: string;
  tone?: string;
  layout?: string;
  /** 0..1; values outside are clamped */
  variability?: number;
  seed?: number;
}

/**
 * mulberry32: a small 32-bit seeded PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function isStyleMode(value: string): value is StyleMode {
  return STYLE_MODES.some((mode) => mode === value);
}

/**
 * Resolves the concrete preset for a request. Unknown modes behave like
 * `auto`.
 */
export function resolveStyleMode(options: StyleOptions): StylePreset {
  const requested = (options.styleMode ?? 'auto').toLowerCase();
  const mode: StyleMode = isStyleMode(requested) ? requested : 'auto';

  if (mode !== 'auto' && mode !== 'varied') {
    return mode;
  }

  const variability = Math.min(1, Math.max(0, options.variability ?? 0));
  if (variability <= 0) {
    return 'executive';
  }

  const random = options.seed !== undefined ? mulberry32(options.seed) : Math.random;
  const index = Math.floor(random() * PRESET_CANDIDATES.length);
  return PRESET_CANDIDATES[index] ?? 'executive';
}

export function buildStyleBlock(options: StyleOptions): string {
  const preset = resolveStyleMode(options);
  const toneRule = TONE_RULES[(options.tone ?? '').toLowerCase()] ?? DEFAULT_TONE_RULE;
  const layoutRule = LAYOUT_RULES[(options.layout ?? '').toLowerCase()] ?? DEFAULT_LAYOUT_RULE;

  return [
    '\n\nStyle & Tone Overrides:',
    `- Tone: ${toneRule}`,
    `- Layout preference: ${layoutRule}`,
    `- Style preset: ${preset}: ${PRESET_RULES[preset]}`,
    '- Vary headings and bullet density between answers; use the lightest structure that stays clear.',
    '- Skip the template sections from above when a short or narrative answer works better.',
  ].join('\n');
}
