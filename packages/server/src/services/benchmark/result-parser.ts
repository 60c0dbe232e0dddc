import type { TestResult } from '@benchmark-gateway/shared';
import { ParseError } from '../../lib/errors.js';

/** Prefix of the line a benchmark run reports its timings on */
export const TIMING_MARKER = 'BENCHMARK_TIMING=';

/**
 * Parse one numeric field. Empty or non-numeric fields are absent, not errors.
 */
function parseField(field: string | undefined): number | null {
  if (field === undefined) {
    return null;
  }
  const trimmed = field.trim();
  if (trimmed === '') {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a single timing line.
 *
 * Field order is the one the benchmark tool prints:
 * `elapsed;max_rss;user;system`.
 *
 * @returns null when the line does not carry the timing marker
 *
 * @example
 * parseTimingLine('BENCHMARK_TIMING=1.12;42;1.10;0.02', 1)
 * // { runIndex: 1, wallTime: 1.12, maxMemory: 42, userTime: 1.1, systemTime: 0.02 }
 */
export function parseTimingLine(line: string, runIndex: number): TestResult | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(TIMING_MARKER)) {
    return null;
  }

  const [elapsed, maxRss, user, system] = trimmed.slice(TIMING_MARKER.length).split(';');
  return {
    runIndex,
    wallTime: parseField(elapsed),
    userTime: parseField(user),
    systemTime: parseField(system),
    maxMemory: parseField(maxRss),
  };
}

/**
 * Extract every timing line from raw benchmark output, in output order.
 * `runIndex` is the 1-based position of discovery. Other lines are ignored.
 *
 * A result count different from `runs` is returned as is; callers decide
 * how to report it.
 *
 * @throws ParseError when runs were expected but no timing line exists
 */
export function parseTestResults(output: Buffer | Uint8Array | string, runs: number): TestResult[] {
  const text = typeof output === 'string' ? output : Buffer.from(output).toString('utf8');

  const results: TestResult[] = [];
  for (const line of text.split('\n')) {
    const result = parseTimingLine(line, results.length + 1);
    if (result) {
      results.push(result);
    }
  }

  if (results.length === 0 && runs > 0) {
    throw new ParseError(`No ${TIMING_MARKER} line found in benchmark output (expected ${runs})`);
  }

  return results;
}
