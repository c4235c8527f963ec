/**
 * Picks the code block worth auto-evaluating out of a model answer: the
 * largest fenced block that is not a diagram.
 */

export interface FencedBlock {
  language: string;
  body: string;
}

const FENCED_BLOCK = /^[ \t]*```[ \t]*([\w+#.-]*)[^\n]*\n([\s\S]*?)^[ \t]*```[ \t]*$/gm;

export function extractFencedBlocks(text: string): FencedBlock[] {
  return [...text.matchAll(FENCED_BLOCK)].map((match) => ({
    language: (match[1] ?? '').toLowerCase(),
    body: (match[2] ?? '').replace(/\n$/, ''),
  }));
}

export function largestCodeBlock(text: string): FencedBlock | null {
  let best: FencedBlock | null = null;
  for (const block of extractFencedBlocks(text)) {
    if (block.language === 'mermaid' || !block.body.trim()) continue;
    if (!best || block.body.length > best.body.length) {
      best = block;
    }
  }
  return best;
}
