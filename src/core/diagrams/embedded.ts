/**
 * Diagram handling inside chat answers: every ```mermaid block is repaired
 * in place, and a bare diagram (a keyword line through the next blank line)
 * is repaired and fenced.
 */

import { repairDiagram } from './repair-pipeline';
import { MAX_DIAGRAM_CHARS } from './sanitize';
import { DIAGRAM_START_PATTERN } from './syntax';

const MERMAID_FENCE = /^\s*```mermaid\b/;

export function containsDiagram(text: string): boolean {
  if (text.includes('```mermaid')) return true;
  return text.split('\n').some((line) => DIAGRAM_START_PATTERN.test(line));
}

function repairBody(body: string): string {
  // Oversized blocks pass through untouched
  return body.length > MAX_DIAGRAM_CHARS ? body : repairDiagram(body);
}

function repairFencedBlocks(lines: readonly string[]): string[] {
  const out: string[] = [];
  let buffer: string[] | null = null;
  let opening = '';

  for (const line of lines) {
    if (buffer === null) {
      if (MERMAID_FENCE.test(line)) {
        buffer = [];
        opening = line;
      } else {
        out.push(line);
      }
      continue;
    }
    if (line.trim().startsWith('```')) {
      out.push(opening, repairBody(buffer.join('\n')), line);
      buffer = null;
      continue;
    }
    buffer.push(line);
  }

  // Unclosed fence: keep what was there
  if (buffer !== null) {
    out.push(opening, ...buffer);
  }
  return out;
}

function fenceBareDiagrams(lines: readonly string[]): string[] {
  const out: string[] = [];
  let inFence = false;
  let index = 0;

  while (index < lines.length) {
    const line = lines[index] ?? '';
    if (line.trim().startsWith('```')) {
      inFence = !inFence;
      out.push(line);
      index++;
      continue;
    }
    if (inFence || !DIAGRAM_START_PATTERN.test(line)) {
      out.push(line);
      index++;
      continue;
    }

    const body: string[] = [];
    while (index < lines.length) {
      const current = lines[index] ?? '';
      if (!current.trim() || current.trim().startsWith('```')) break;
      body.push(current);
      index++;
    }
    out.push('```mermaid', repairBody(body.join('\n')), '```');
  }
  return out;
}

export function normalizeEmbeddedDiagrams(text: string): string {
  const lines = text.split('\n');
  const repaired = text.includes('```mermaid') ? repairFencedBlocks(lines) : lines;
  return fenceBareDiagrams(repaired).join('\n');
}
