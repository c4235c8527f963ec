/**
 * Explanation answers (complexity analysis, feature rundowns) read better as
 * labelled lines than as tables. `| Time | O(n) |` becomes
 * `**Time Complexity:** O(n)`.
 */

const METRIC_KEYWORDS = ['time', 'space', 'complexity', 'feature', 'input', 'output', 'error'];
const SEPARATOR_LINE = /^\s*\|[\s\-:]+\|/;

const CANONICAL_METRICS: ReadonlyArray<[string, string]> = [
  ['time', 'Time Complexity'],
  ['space', 'Space Complexity'],
  ['feature', 'Key Features'],
  ['input', 'Input'],
  ['output', 'Output'],
  ['error', 'Error Handling'],
];

export function canonicalMetricName(metric: string): string {
  const plain = metric.replace(/\*/g, '').trim();
  const lower = plain.toLowerCase();
  const canonical = CANONICAL_METRICS.find(([keyword]) => lower.includes(keyword));
  return canonical ? canonical[1] : plain;
}

export function cleanExplanationFormatting(text: string): string {
  const out: string[] = [];
  for (const line of text.split('\n')) {
    const lower = line.toLowerCase();
    if (line.includes('|') && METRIC_KEYWORDS.some((keyword) => lower.includes(keyword))) {
      const parts = line
        .split('|')
        .map((part) => part.trim())
        .filter(Boolean);
      const [metric, value] = parts;
      out.push(metric !== undefined && value !== undefined ? `**${canonicalMetricName(metric)}:** ${value}` : line);
      continue;
    }
    if (SEPARATOR_LINE.test(line)) {
      continue;
    }
    out.push(line);
  }
  return out.join('\n');
}
