/**
 * Theme and style preset injection.
 *
 * A non-default style preset prepends a full `%%{init}%%` directive and
 * appends its classDef lines. Otherwise a non-default theme gets the minimal
 * theme directive. Diagrams that already carry a directive are left as is.
 */

import { isFlowchartLike } from './syntax';

export const DIAGRAM_STYLE_PRESETS = ['default', 'polished', 'compact'] as const;
export type DiagramStylePreset = (typeof DIAGRAM_STYLE_PRESETS)[number];

type DirectiveValue = string | number | boolean | { [key: string]: DirectiveValue };

interface PresetDefinition {
  theme: string;
  themeVariables: Record<string, DirectiveValue>;
  flowchart: Record<string, DirectiveValue>;
  classDefs: string[];
}

const PRESETS: Record<Exclude<DiagramStylePreset, 'default'>, PresetDefinition> = {
  polished: {
    theme: 'base',
    themeVariables: {
      fontFamily: 'Inter, Helvetica, Arial, sans-serif',
      fontSize: '14px',
      primaryColor: '#eef2ff',
      primaryBorderColor: '#6366f1',
      lineColor: '#64748b',
    },
    flowchart: { curve: 'basis', nodeSpacing: 50, rankSpacing: 60, htmlLabels: true },
    classDefs: [
      'classDef primary fill:#eef2ff,stroke:#6366f1,color:#1e1b4b',
      'classDef storage fill:#ecfdf5,stroke:#10b981,color:#064e3b',
      'classDef external fill:#fff7ed,stroke:#f97316,color:#7c2d12',
    ],
  },
  compact: {
    theme: 'neutral',
    themeVariables: {
      fontFamily: 'Helvetica, Arial, sans-serif',
      fontSize: '12px',
    },
    flowchart: { curve: 'linear', nodeSpacing: 30, rankSpacing: 35, htmlLabels: true },
    classDefs: [
      'classDef primary fill:#f8fafc,stroke:#334155,color:#0f172a',
      'classDef muted fill:#f1f5f9,stroke:#94a3b8,color:#475569',
    ],
  },
};

export interface DiagramStyleOptions {
  theme?: string;
  stylePreset?: string;
}

function formatDirectiveValue(value: DirectiveValue): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  const entries = Object.entries(value).map(([key, inner]) => `'${key}': ${formatDirectiveValue(inner)}`);
  return `{${entries.join(', ')}}`;
}

export function buildPresetDirective(preset: PresetDefinition, theme: string): string {
  return `%%{init: ${formatDirectiveValue({
    theme,
    themeVariables: preset.themeVariables,
    flowchart: preset.flowchart,
  })}}%%`;
}

export function buildThemeDirective(theme: string): string {
  return `%%{init: { 'theme': '${theme}' } }%%`;
}

function isStylePreset(value: string): value is Exclude<DiagramStylePreset, 'default'> {
  return value === 'polished' || value === 'compact';
}

export function applyDiagramStyle(source: string, options: DiagramStyleOptions = {}): string {
  if (source.includes('%%{init')) {
    return source;
  }

  const theme = options.theme?.trim() || 'default';
  const presetName = options.stylePreset?.trim().toLowerCase() ?? 'default';

  if (isStylePreset(presetName)) {
    const preset = PRESETS[presetName];
    const directive = buildPresetDirective(preset, theme === 'default' ? preset.theme : theme);
    const lines = source.split('\n');
    // classDef statements are only valid in flowcharts
    const missing = isFlowchartLike(source)
      ? preset.classDefs.filter((classDef) => !lines.some((line) => line.trim() === classDef))
      : [];
    return [directive, source, ...missing].join('\n');
  }

  if (theme !== 'default') {
    return `${buildThemeDirective(theme)}\n${source}`;
  }

  return source;
}
