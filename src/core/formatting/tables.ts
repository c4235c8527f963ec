/**
 * Pipe table canonicalization. Only blocks that are already pipe tables are
 * touched: at least two consecutive pipe rows whose first row is a
 * well-formed header, or a header row followed by a separator row when the
 * table has no outer pipes (`a | b` then `--- | ---`). Free text never
 * becomes a table.
 */

const WELL_FORMED_HEADER = /^\|?\s*[^|]+\s*(\|[^|]+)+\|?$/;
const SEPARATOR_CELL = /^:?-{1,}:?$/;

export function isPipeRow(line: string): boolean {
  return (line.match(/\|/g) ?? []).length >= 2;
}

function hasPipe(line: string): boolean {
  return line.includes('|');
}

export function splitRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|')) row = row.slice(0, -1);
  return row.split('|').map((cell) => stripEmphasis(cell.trim()));
}

function stripEmphasis(cell: string): string {
  return cell
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .trim();
}

function isSeparatorRow(cells: readonly string[]): boolean {
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL.test(cell));
}

/** A header row with a separator row under it, outer pipes optional. */
function startsSeparatedTable(lines: readonly string[], index: number): boolean {
  const header = lines[index] ?? '';
  const separator = lines[index + 1] ?? '';
  return hasPipe(header) && hasPipe(separator) && isSeparatorRow(splitRow(separator));
}

function formatRow(cells: readonly string[]): string {
  return `| ${cells.join(' | ')} |`;
}

/**
 * Rebuilds one table block: header, a regenerated separator, then the data
 * rows padded to the header width.
 */
export function canonicalizeTable(rows: readonly string[]): string[] {
  const [headerLine, ...rest] = rows;
  if (headerLine === undefined) return [];

  const header = splitRow(headerLine);
  const width = header.length;
  const body = rest
    .map(splitRow)
    .filter((cells) => !isSeparatorRow(cells))
    .map((cells) => (cells.length < width ? [...cells, ...Array<string>(width - cells.length).fill('')] : cells));

  return [formatRow(header), formatRow(Array<string>(width).fill('---')), ...body.map(formatRow)];
}

export function formatPipeTables(text: string): string {
  const lines = text.split('\n');
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

    const separated = !inFence && startsSeparatedTable(lines, index);
    if (inFence || !(separated || isPipeRow(line))) {
      out.push(line);
      index++;
      continue;
    }

    // Rows of a table without outer pipes may hold a single pipe
    const inTable = separated ? hasPipe : isPipeRow;
    let end = index;
    while (end < lines.length && inTable(lines[end] ?? '') && !(lines[end] ?? '').trim().startsWith('```')) {
      end++;
    }
    const block = lines.slice(index, end);
    const header = block[0]?.trim() ?? '';
    const tableLike = block.length >= 2 && WELL_FORMED_HEADER.test(header) && !isSeparatorRow(splitRow(header));

    out.push(...(tableLike ? canonicalizeTable(block) : block));
    index = end;
  }

  return out.join('\n');
}
