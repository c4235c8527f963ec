/**
 * Static Code Signals
 *
 * Reads approach signals (recursion, memoization, loop nesting and so on)
 * straight from the source text. Python is analysed by line structure,
 * using indentation to find function bodies and loop nesting. Every other
 * language falls back to keyword and brace heuristics.
 *
 * None of this executes or fully parses the code; the signals feed the
 * evaluation report as hints only.
 */

import type { StaticSignals } from './types';

const PYTHON_LANGUAGES = new Set(['python', 'py']);

const PY_DEF = /^(\s*)(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(([^)]*)/;
const PY_LOOP = /^(?:async\s+)?(?:for|while)\b.*:\s*(?:#.*)?$/;
const PY_MEMO_DECORATOR = /^\s*@(?:functools\.)?(?:lru_cache|cache)\b/;
const MEMO_NAME = /\b(?:memo|cache|dp)\b/i;
const CHAINED_SUBSCRIPT = /[\w\]]\s*\[[^\[\]\n]*\]\s*\[/;
const PY_COMPREHENSION = /[\[{][^\[\]{}\n]*\bfor\s+[\w, ()]+\s+in\b/;

const SLICING_COLON_THRESHOLD = 10;

export function isPythonLanguage(language: string): boolean {
  return PYTHON_LANGUAGES.has(language.trim().toLowerCase());
}

export function analyzeStaticSignals(code: string, language: string): StaticSignals {
  const structural = isPythonLanguage(language)
    ? analyzePython(code)
    : analyzeGeneric(code);

  return {
    ...structural,
    usesSlicingHeavily: countOccurrences(code, ':') > SLICING_COLON_THRESHOLD,
    commentDensity: commentDensity(code, language),
    estimatedTimeComplexityHint: complexityHint(structural),
  };
}

type StructuralSignals = Omit<
  StaticSignals,
  'usesSlicingHeavily' | 'commentDensity' | 'estimatedTimeComplexityHint'
>;

// =============================================================================
// Python
// =============================================================================

function indentOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  // Tabs count as four columns
  return match ? match[0].replace(/\t/g, '    ').length : 0;
}

function stripPythonComment(line: string): string {
  const hash = line.indexOf('#');
  return hash === -1 ? line : line.slice(0, hash);
}

function analyzePython(code: string): StructuralSignals {
  const lines = code.split('\n').map((line) => stripPythonComment(line.replace(/\r$/, '')));
  const functions: string[] = [];
  let usesRecursion = false;
  let usesMemoization = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (PY_MEMO_DECORATOR.test(line)) {
      usesMemoization = true;
    }

    const def = PY_DEF.exec(line);
    if (!def) continue;

    const indent = (def[1] ?? '').length;
    const name = def[2] ?? '';
    functions.push(name);
    if (MEMO_NAME.test(def[3] ?? '')) {
      usesMemoization = true;
    }

    const selfCall = new RegExp(`\\b${name}\\s*\\(`);
    for (let j = i + 1; j < lines.length; j++) {
      const body = lines[j] ?? '';
      if (!body.trim()) continue;
      if (indentOf(body) <= indent) break;
      if (selfCall.test(body)) {
        usesRecursion = true;
        break;
      }
    }
  }

  let usesDynamicProgramming = false;
  let usesComprehension = false;
  let loopNestingDepth = 0;
  const openLoops: number[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    if (/^(?:memo|cache|dp)\s*(?:=|:)/i.test(trimmed)) usesMemoization = true;
    if (CHAINED_SUBSCRIPT.test(trimmed)) usesDynamicProgramming = true;
    if (PY_COMPREHENSION.test(trimmed)) usesComprehension = true;

    const indent = indentOf(line);
    while (openLoops.length > 0 && (openLoops[openLoops.length - 1] ?? 0) >= indent) {
      openLoops.pop();
    }
    if (PY_LOOP.test(trimmed)) {
      openLoops.push(indent);
      loopNestingDepth = Math.max(loopNestingDepth, openLoops.length);
    }
  }

  return {
    usesRecursion,
    usesMemoization,
    usesDynamicProgramming,
    loopNestingDepth,
    usesListOrSetComprehension: usesComprehension,
    functionCount: functions.length,
  };
}

// =============================================================================
// Other languages
// =============================================================================

const GENERIC_FUNCTION_NAMES = [
  /\bfunction\s+([A-Za-z_$][\w$]*)\s*\(/g,
  /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*=\s*(?:async\s*)?(?:function\b|\([^)]*\)\s*=>)/g,
  /\b(?:def|fn|func)\s+([A-Za-z_]\w*)\s*\(/g,
  /^[ \t]*(?:(?:public|private|protected|static|final)\s+)*[\w<>\[\],]+[ \t]+([A-Za-z_]\w*)\s*\([^;{}\n]*\)\s*\{/gm,
];

const CONTROL_WORDS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'else']);

function declaredFunctionNames(code: string): string[] {
  const names = new Set<string>();
  for (const pattern of GENERIC_FUNCTION_NAMES) {
    for (const match of code.matchAll(pattern)) {
      const name = match[1];
      if (name && !CONTROL_WORDS.has(name)) names.add(name);
    }
  }
  return [...names];
}

function analyzeGeneric(code: string): StructuralSignals {
  const names = declaredFunctionNames(code);

  let loopNestingDepth = 0;
  let braceDepth = 0;
  // Brace depth at which each open loop started; a brace-less loop closes on its own line
  const openLoops: number[] = [];
  for (const line of code.split('\n')) {
    if (/\b(?:for|while)\s*\(|\bfor\s+\w+\s+(?:in|:=)|\bloop\s*\{/.test(line)) {
      openLoops.push(braceDepth);
      loopNestingDepth = Math.max(loopNestingDepth, openLoops.length);
    }
    braceDepth += countOccurrences(line, '{') - countOccurrences(line, '}');
    while (openLoops.length > 0 && (openLoops[openLoops.length - 1] ?? 0) >= braceDepth) {
      openLoops.pop();
    }
  }

  return {
    usesRecursion: names.some((name) => callsItself(code, name)),
    usesMemoization: /memo|cache/i.test(code),
    usesDynamicProgramming: /\bdp\b|\btable\b/i.test(code),
    loopNestingDepth,
    usesListOrSetComprehension: /\.(?:map|filter|flatMap)\s*\(/.test(code) || /\.stream\(\)/.test(code),
    functionCount: names.length,
  };
}

/**
 * True when a braced body declared for `name` contains a call to `name`.
 */
function callsItself(code: string, name: string): boolean {
  const escaped = name.replace(/\$/g, '\\$');
  const call = new RegExp(`(?<![\\w$])${escaped}\\s*\\(`);
  const declaration = new RegExp(`(?<![\\w$.])${escaped}\\b[^{;\\n]*?\\{`, 'g');

  for (const match of code.matchAll(declaration)) {
    const open = (match.index ?? 0) + match[0].length - 1;
    const body = bracedBody(code, open);
    if (body !== null && call.test(body)) return true;
  }
  return false;
}

/** Text between the `{` at `open` and its matching `}`, or null when unbalanced. */
function bracedBody(code: string, open: number): string | null {
  let depth = 0;
  for (let i = open; i < code.length; i++) {
    const ch = code[i];
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return code.slice(open + 1, i);
    }
  }
  return null;
}

// =============================================================================
// Shared
// =============================================================================

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function isCommentLine(trimmed: string, python: boolean): boolean {
  if (trimmed.startsWith('#')) return true;
  if (python) return false;
  return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
}

export function commentDensity(code: string, language: string): number {
  const python = isPythonLanguage(language);
  let comments = 0;
  let codeLines = 0;
  for (const line of code.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    if (isCommentLine(trimmed, python)) comments++;
    else codeLines++;
  }
  if (codeLines === 0) return 0;
  return Math.round(Math.min(1, comments / codeLines) * 1000) / 1000;
}

function complexityHint(signals: StructuralSignals): string | null {
  if (signals.loopNestingDepth >= 2 && !signals.usesRecursion) {
    return 'Likely O(n^2) due to nested loops';
  }
  if (signals.usesRecursion && !signals.usesMemoization) {
    return 'Recursive without memoization; may be exponential';
  }
  if (signals.usesRecursion && signals.usesMemoization) {
    return 'Recursive with memoization; likely polynomial';
  }
  return null;
}
