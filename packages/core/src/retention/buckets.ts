export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days between `timestamp` and `now`, truncated.
 * Returns null for timestamps in the future; such files are left out of
 * every bucket.
 */
export function ageInDays(now: Date, timestamp: Date): number | null {
  const elapsed = now.getTime() - timestamp.getTime();
  if (elapsed < 0) {
    return null;
  }
  return Math.floor(elapsed / MS_PER_DAY);
}

/**
 * Exponential bucket for an age in days: the smallest power of two that is
 * >= days, with age 0 sharing bucket 1. Boundaries run 1, 2, 4, 8, 16, ...
 */
export function bucketFor(days: number): number {
  if (!Number.isSafeInteger(days) || days < 0) {
    throw new RangeError(`Age must be a non-negative whole number of days, got ${days}`);
  }
  let bucket = 1;
  while (bucket < days) {
    bucket *= 2;
  }
  return bucket;
}

/** Lower edge of a bucket as printed in the report (integer division). */
export function bucketLowerBound(bucketId: number): number {
  return Math.floor(bucketId / 2);
}
