/**
 * Undoes table formatting that leaked into code: a line such as
 * `| total = 0 | # running sum |` goes back to `    total = 0 # running sum`.
 */

import { mapLinesOutsideFences } from '../text/transform-pipeline';

const PIPE_WRAPPED = /^\s*\|.*\|\s*$/;
const TOP_LEVEL_KEYWORDS = ['def ', 'class ', 'if ', 'while ', 'for ', 'else:', 'elif '];
const BODY_KEYWORDS = ['return', 'yield', 'break', 'continue', 'pass'];

export function unpipeCodeLine(line: string): string {
  if (!PIPE_WRAPPED.test(line) || !(line.includes('=') || line.includes('#'))) {
    return line;
  }

  const plain = line
    .replace(/^\s*\|\s*/, '')
    .replace(/\s*\|\s*$/, '')
    .replace(/\s*\|\s*/g, ' ');

  if (TOP_LEVEL_KEYWORDS.some((keyword) => plain.startsWith(keyword))) {
    return plain;
  }
  if (BODY_KEYWORDS.some((keyword) => plain.startsWith(keyword))) {
    return `    ${plain}`;
  }
  if (plain.includes('=') && !plain.startsWith('#')) {
    return `    ${plain}`;
  }
  return plain;
}

export function repairPipeFormattedCode(text: string): string {
  return mapLinesOutsideFences(text, unpipeCodeLine);
}
