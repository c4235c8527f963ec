/**
 * Terminal Formatting Utilities
 *
 * ANSI color helpers and small layout helpers for CLI output. Colors are
 * dropped when NO_COLOR is set.
 *
 * @example
 * ```typescript
 * io.out(bold('Sessions'));
 * io.out(formatSeparator(60));
 * ```
 */

// ============================================================================
// Colors
// ============================================================================

const colorEnabled = (): boolean => !process.env.NO_COLOR;

function paint(code: string, s: string): string {
  return colorEnabled() ? `\x1b[${code}m${s}\x1b[0m` : s;
}

export const bold = (s: string): string => paint('1', s);
export const dim = (s: string): string => paint('2', s);
export const red = (s: string): string => paint('31', s);

// ============================================================================
// Layout
// ============================================================================

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Relative age such as "3m ago", "2h ago" or "5d ago".
 */
export function formatAge(date: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}
