/**
 * Scan utilities over fixed-size count arrays.
 *
 * A counts array holds one non-negative integer per bucket. Every scan walks
 * the buckets in index order and only replaces its current best on a strict
 * improvement, so ties always resolve to the lowest index.
 */

/**
 * Read-only view of a counts array.
 */
export type Counts = readonly number[];

/**
 * Returned by {@link indexOfMinNonZero} when no bucket has a non-zero count.
 */
export const NO_BUCKET = -1;

/**
 * Create a new counts array initialized to zeros.
 *
 * @param size - Number of buckets
 */
export function createCounters(size: number): number[] {
  return new Array<number>(size).fill(0);
}

/**
 * Reset every bucket of a counts array to zero in place.
 */
export function resetCounters(counts: number[]): void {
  counts.fill(0);
}

/**
 * Sum of all buckets.
 */
export function sumCounts(counts: Counts): number {
  let total = 0;
  for (const count of counts) {
    total += count;
  }
  return total;
}

/**
 * Index of the largest bucket.
 *
 * @returns The lowest index holding the maximum, or 0 when every bucket is zero
 */
export function indexOfMax(counts: Counts): number {
  let best = 0;
  let bestCount = 0;
  for (let i = 0; i < counts.length; i++) {
    if (counts[i] > bestCount) {
      best = i;
      bestCount = counts[i];
    }
  }
  return best;
}

/**
 * Index of the smallest non-zero bucket. Empty buckets are ignored.
 *
 * @returns The lowest index holding the non-zero minimum, or {@link NO_BUCKET}
 */
export function indexOfMinNonZero(counts: Counts): number {
  let best = NO_BUCKET;
  let bestCount = Number.POSITIVE_INFINITY;
  for (let i = 0; i < counts.length; i++) {
    const count = counts[i];
    if (count !== 0 && count < bestCount) {
      best = i;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Sum of `width` consecutive buckets starting at `start`, wrapping past the
 * last bucket back to the first.
 */
export function windowSum(counts: Counts, start: number, width: number): number {
  let total = 0;
  for (let offset = 0; offset < width; offset++) {
    total += counts[(start + offset) % counts.length];
  }
  return total;
}

/**
 * Start index of the busiest circular window of `width` buckets.
 *
 * With 24 hourly buckets and a width of 2, the window starting at 23 covers
 * buckets 23 and 0.
 *
 * @returns The lowest start index holding the maximum sum, or 0 when every
 *   window sums to zero
 * @throws Error if width is not an integer in [1, counts.length]
 */
export function indexOfBusiestWindow(counts: Counts, width: number): number {
  if (!Number.isInteger(width) || width < 1 || width > counts.length) {
    throw new Error(
      `width must be an integer in range [1, ${counts.length}], got ${width}`,
    );
  }

  let best = 0;
  let bestSum = 0;
  for (let start = 0; start < counts.length; start++) {
    const sum = windowSum(counts, start, width);
    if (sum > bestSum) {
      best = start;
      bestSum = sum;
    }
  }
  return best;
}

/**
 * Mean bucket count using truncating integer division.
 *
 * @returns 0 for an empty counts array
 */
export function averageCount(counts: Counts): number {
  if (counts.length === 0) {
    return 0;
  }
  return Math.trunc(sumCounts(counts) / counts.length);
}
