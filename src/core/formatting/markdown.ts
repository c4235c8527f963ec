/**
 * Line-level markdown clean-ups. All of them leave fenced code alone.
 */

import { mapLinesOutsideFences, mapOutsideInlineCode } from '../text/transform-pipeline';

const HEADING = /^(#{2,4})(?!#)\s*(.+)$/;

/** `## Title` becomes `## **Title**` for levels 2 to 4. */
export function boldHeadings(text: string): string {
  return mapLinesOutsideFences(text, (line) => {
    const match = HEADING.exec(line.trim());
    if (!match) return line;
    const [, hashes = '', heading = ''] = match;
    const title = heading.trim();
    if (title.length > 4 && title.startsWith('**') && title.endsWith('**')) return line;
    return `${hashes} **${title}**`;
  });
}

/** Drops `$...$`, `\(...\)` and `\[...\]` delimiters, keeping the inner text. */
export function stripMathMarkers(text: string): string {
  return mapLinesOutsideFences(text, (line) =>
    mapOutsideInlineCode(line, (segment) =>
      segment
        .replace(/\$([^$\n]*?)\$/g, '$1')
        .replace(/\\\((.*?)\\\)/g, '$1')
        .replace(/\\\[(.*?)\\\]/g, '$1')
    )
  );
}

const SUMMARY_HEADING =
  /^#+\s*((?:\*\*)?\s*(?:complete\s+answer|comprehensive\s+answer|summary|overview|quick\s+(?:answer|summary))\b.*)$/i;

/** Summary-style headings (`# Summary`, `### Complete Answer`) become level 2. */
export function formatSummaryHeadings(text: string): string {
  return mapLinesOutsideFences(text, (line) => {
    const match = SUMMARY_HEADING.exec(line.trim());
    return match ? `## ${match[1] ?? ''}` : line;
  });
}

const BULLET_LABEL = /^(\s*[-*]\s+)(?:\*\*[^*\n]{1,40}?:\*\*\s*|\*\*[^*\n]{1,40}\*\*:\s*|[^*:\n]{1,40}:(?:\s+|$))/;

/**
 * Inside a `## ... Complete Answer` section, removes leading labels from
 * bullets so each reads as a plain statement.
 */
export function stripCompleteAnswerLabels(text: string): string {
  let inSection = false;
  return mapLinesOutsideFences(text, (line) => {
    const trimmed = line.trim();
    if (/^##\s/.test(trimmed)) {
      inSection = trimmed.toLowerCase().includes('complete answer');
      return line;
    }
    return inSection ? line.replace(BULLET_LABEL, '$1') : line;
  });
}
