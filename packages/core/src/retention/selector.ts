import type { RetainPolicy } from "../schemas/prune-config.js";
import type { BucketMap, FileRecord } from "./grouper.js";

export interface BucketSelection {
  bucketId: number;
  /** Survivors, oldest first. */
  keep: FileRecord[];
  /** Files slated for removal, oldest first. */
  delete: FileRecord[];
}

export interface SelectionResult {
  buckets: BucketSelection[];
  keep: FileRecord[];
  delete: FileRecord[];
}

export interface SelectOptions {
  /** Which end of each bucket survives. Defaults to "newest". */
  retain?: RetainPolicy;
}

/**
 * Oldest first. Equal timestamps fall back to path order so a tie group
 * is always cut at the same place.
 */
export function compareRecords(a: FileRecord, b: FileRecord): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

/**
 * Splits every bucket into `keep` files to retain and the rest to delete.
 * Buckets are handled independently; a bucket with `keep` or fewer files
 * loses nothing, and `keep = 0` empties every bucket.
 */
export function selectRetention(
  buckets: BucketMap,
  keep: number,
  options: SelectOptions = {},
): SelectionResult {
  if (!Number.isSafeInteger(keep) || keep < 0) {
    throw new RangeError(`Keep count must be a non-negative integer, got ${keep}`);
  }
  const retain = options.retain ?? "newest";

  const result: SelectionResult = { buckets: [], keep: [], delete: [] };
  const bucketIds = [...buckets.keys()].sort((a, b) => a - b);

  for (const bucketId of bucketIds) {
    const sorted = [...(buckets.get(bucketId) ?? [])].sort(compareRecords);
    const count = Math.min(keep, sorted.length);

    const selection: BucketSelection =
      retain === "newest"
        ? {
            bucketId,
            keep: sorted.slice(sorted.length - count),
            delete: sorted.slice(0, sorted.length - count),
          }
        : {
            bucketId,
            keep: sorted.slice(0, count),
            delete: sorted.slice(count),
          };

    result.buckets.push(selection);
    result.keep.push(...selection.keep);
    result.delete.push(...selection.delete);
  }

  return result;
}
