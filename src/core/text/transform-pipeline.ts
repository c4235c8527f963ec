/**
 * Text Transform Pipeline
 *
 * Response normalization and diagram repair are both expressed as an ordered
 * list of pure `text -> text` steps. `runTransforms` applies them in order;
 * when a step throws, that step's fallback (its own input, unchanged) is used
 * and the failure is recorded in the report instead of aborting the run.
 *
 * @example
 * ```typescript
 * const steps: TextTransform[] = [
 *   { name: 'trim', apply: (text) => text.trim() },
 *   { name: 'upper', apply: (text) => text.toUpperCase() },
 * ];
 * const { text, failures } = runTransforms('  hi ', steps);
 * // text === 'HI', failures === []
 * ```
 */

export interface TextTransform {
  /** Stable step name, used in failure reports */
  readonly name: string;
  readonly apply: (text: string) => string;
}

export interface TransformFailure {
  step: string;
  message: string;
}

export interface TransformReport {
  text: string;
  failures: TransformFailure[];
}

export function runTransforms(input: string, transforms: readonly TextTransform[]): TransformReport {
  const failures: TransformFailure[] = [];
  let text = input;

  for (const transform of transforms) {
    try {
      text = transform.apply(text);
    } catch (err) {
      // Fallback: the step's input passes through untouched
      failures.push({
        step: transform.name,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { text, failures };
}

/**
 * Runs the transforms and logs any step failures under the given prefix,
 * returning only the text.
 */
export function applyTransforms(
  input: string,
  transforms: readonly TextTransform[],
  logPrefix: string
): string {
  const report = runTransforms(input, transforms);
  for (const failure of report.failures) {
    console.warn(`${logPrefix} step '${failure.step}' failed, kept its input: ${failure.message}`);
  }
  return report.text;
}

// ============================================================================
// Fenced-region helpers
// ============================================================================

/**
 * Applies `fn` to every line outside triple-backtick fences. Fence lines
 * themselves and fenced content are passed through.
 */
export function mapLinesOutsideFences(text: string, fn: (line: string) => string): string {
  let inFence = false;
  return text
    .split('\n')
    .map((line) => {
      if (line.trim().startsWith('```')) {
        inFence = !inFence;
        return line;
      }
      return inFence ? line : fn(line);
    })
    .join('\n');
}

/**
 * Applies `fn` to the parts of a line that are not inline code spans.
 */
export function mapOutsideInlineCode(line: string, fn: (segment: string) => string): string {
  return line
    .split(/(`[^`\n]*`)/)
    .map((segment) => (segment.startsWith('`') && segment.endsWith('`') && segment.length > 1 ? segment : fn(segment)))
    .join('');
}

export function hasFence(text: string): boolean {
  return text.includes('```');
}
