export const TAIL_PERCENT = {
  p90: 10,
  p95: 5,
  p99: 1,
} as const;

export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
}

/**
 * Nearest-rank percentile over the worst tail: values sorted descending, index ceil(n * tail%) - 1.
 * The rank is computed in integers so n = 30 at 10% lands on index 2, not 3.
 */
export function tailPercentile(values: readonly number[], tailPercent: number): number | null {
  if (values.length === 0) {
    return null;
  }
  if (!Number.isInteger(tailPercent) || tailPercent <= 0 || tailPercent > 100) {
    throw new Error(`Tail percent must be an integer in (0, 100], got ${tailPercent}`);
  }
  const descending = [...values].sort((a, b) => b - a);
  const rank = Math.ceil((descending.length * tailPercent) / 100);
  const index = Math.min(descending.length - 1, Math.max(0, rank - 1));
  return descending[index] ?? null;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
