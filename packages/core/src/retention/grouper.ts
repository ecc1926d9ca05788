import { lstat, readdir } from "node:fs/promises";
import { join, sep } from "node:path";
import type { Logger } from "../logger/index.js";
import { EmptyResultError, toPathError } from "../errors/catalog.js";
import type { SortMode } from "../schemas/prune-config.js";
import { ageInDays, bucketFor } from "./buckets.js";
import { selectTimestamp } from "./time.js";

export interface FileRecord {
  path: string;
  timestamp: Date;
}

/** Bucket id -> files, iterated in ascending bucket order. */
export type BucketMap = Map<number, FileRecord[]>;

/** Directory -> that directory's own buckets, in ascending path order. */
export type GroupingResult = Map<string, BucketMap>;

export interface GroupOptions {
  /** Reference point for ages. Defaults to the time of the call. */
  now?: Date;
  logger?: Logger;
}

export interface GroupTreeOptions extends GroupOptions {
  /** Called for every directory that holds no eligible files. */
  onSkip?: (directory: string) => void;
}

/**
 * Buckets the regular files directly inside `directory`.
 * Subdirectories, symlinks and special files are ignored. Any listing or
 * metadata failure aborts the whole directory.
 */
export async function groupDirectory(
  directory: string,
  mode: SortMode,
  options: GroupOptions = {},
): Promise<BucketMap> {
  const now = options.now ?? new Date();
  const entries = await readdir(directory, { withFileTypes: true }).catch(
    (err: unknown) => {
      throw toPathError(directory, err);
    },
  );

  const groups: BucketMap = new Map();
  let skippedFuture = 0;

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const path = join(directory, entry.name);
    const stats = await lstat(path).catch((err: unknown) => {
      throw toPathError(path, err);
    });
    // Replaced by something else between readdir and lstat.
    if (!stats.isFile()) continue;

    const timestamp = selectTimestamp(stats, mode);
    const days = ageInDays(now, timestamp);
    if (days === null) {
      skippedFuture++;
      continue;
    }

    const bucketId = bucketFor(days);
    const bucket = groups.get(bucketId);
    if (bucket) {
      bucket.push({ path, timestamp });
    } else {
      groups.set(bucketId, [{ path, timestamp }]);
    }
  }

  if (groups.size === 0) {
    throw new EmptyResultError(directory);
  }

  options.logger?.debug(
    { directory, buckets: groups.size, skippedFuture },
    "Directory grouped",
  );

  return new Map([...groups.entries()].sort(([a], [b]) => a - b));
}

/**
 * Buckets every directory of the tree rooted at `root` independently.
 * Empty directories are skipped; the call fails only when none has files.
 */
export async function groupTree(
  root: string,
  mode: SortMode,
  options: GroupTreeOptions = {},
): Promise<GroupingResult> {
  const now = options.now ?? new Date();
  const directories = await listDirectories(root);
  const result: GroupingResult = new Map();

  for (const directory of directories) {
    try {
      result.set(
        directory,
        await groupDirectory(directory, mode, { ...options, now }),
      );
    } catch (err) {
      if (err instanceof EmptyResultError) {
        options.onSkip?.(directory);
        continue;
      }
      throw err;
    }
  }

  if (result.size === 0) {
    throw new EmptyResultError(root, { recursive: true });
  }
  return result;
}

/**
 * Orders paths component by component, so a directory's subtree sorts
 * directly after it (`a`, `a/b`, `a-b` rather than `a`, `a-b`, `a/b`).
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(sep);
  const right = b.split(sep);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * All directories under `root`, root included, sorted by path components.
 * Symlinked directories are not followed.
 */
export async function listDirectories(root: string): Promise<string[]> {
  const found = [root];
  for (let i = 0; i < found.length; i++) {
    const directory = found[i];
    const entries = await readdir(directory, { withFileTypes: true }).catch(
      (err: unknown) => {
        throw toPathError(directory, err);
      },
    );
    for (const entry of entries) {
      if (entry.isDirectory()) {
        found.push(join(directory, entry.name));
      }
    }
  }
  return found.sort(comparePaths);
}
