/**
 * Lock duration estimation.
 */

/** Rows scanned or rewritten per millisecond of lock */
export const ROWS_PER_MS = 10_000;

/**
 * Estimate how long a statement holds its lock, in milliseconds.
 *
 * Without a row-count hint the rule's baseline is returned as-is (null when
 * the rule has none). With one, the size-driven term is added to the
 * baseline, and the result never drops below the baseline or 1ms.
 */
export function estimateLockMs(baseMs: number | null, rows: number): number | null {
  if (rows <= 0) {
    return baseMs;
  }
  return Math.max(baseMs || 1, Math.trunc(rows / ROWS_PER_MS) + (baseMs || 0));
}
