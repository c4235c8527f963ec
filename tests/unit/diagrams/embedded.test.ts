/**
 * Unit Tests: Diagrams Inside Answers
 */

import { describe, it, expect } from 'vitest';
import { containsDiagram, normalizeEmbeddedDiagrams } from '../../../src/core/diagrams';

describe('normalizeEmbeddedDiagrams', () => {
  it('should repair fenced mermaid blocks in place', () => {
    const text = 'Here:\n```mermaid\nflowchart LR\nA -- 1. Go --> B\n```\nDone';

    expect(normalizeEmbeddedDiagrams(text)).toBe('Here:\n```mermaid\nflowchart LR\nA -- 1 --> B\n```\nDone');
  });

  it('should fence a bare diagram up to the next blank line', () => {
    const text = 'Intro\nflowchart LR\nA --> B\n\nAfter';

    expect(normalizeEmbeddedDiagrams(text)).toBe('Intro\n```mermaid\nflowchart LR\nA --> B\n```\n\nAfter');
  });

  it('should leave diagram keywords inside other code fences alone', () => {
    const text = '```text\nflowchart LR\n```';

    expect(normalizeEmbeddedDiagrams(text)).toBe(text);
  });

  it('should keep an unclosed mermaid fence as it was', () => {
    const text = '```mermaid\nflowchart LR\nA-->B';

    expect(normalizeEmbeddedDiagrams(text)).toBe(text);
  });

  it('should pass oversized blocks through untouched', () => {
    const body = `flowchart LR\nA -- 1. Go --> B\n${'%% filler\n'.repeat(4_500)}`;
    const text = `\`\`\`mermaid\n${body}\n\`\`\``;

    expect(normalizeEmbeddedDiagrams(text)).toBe(text);
  });
});

describe('containsDiagram', () => {
  it('should detect fenced and bare diagrams', () => {
    expect(containsDiagram('```mermaid\nA-->B\n```')).toBe(true);
    expect(containsDiagram('see below\nsequenceDiagram\nA->>B: hi')).toBe(true);
    expect(containsDiagram('a plain answer')).toBe(false);
  });
});
