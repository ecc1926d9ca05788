import type { SortMode } from "../schemas/prune-config.js";

/** The slice of `fs.Stats` the selector needs. */
export interface FileTimes {
  mtimeMs: number;
  atimeMs: number;
  birthtimeMs: number;
}

export interface ParsedSortMode {
  mode: SortMode;
  /** False when the raw value was not recognised and ctime was substituted. */
  valid: boolean;
}

const SORT_MODE_LABELS: Record<SortMode, string> = {
  mtime: "MTime",
  ctime: "CTime",
  atime: "ATime",
};

export function parseSortMode(raw: string | undefined): ParsedSortMode {
  if (raw === undefined) {
    return { mode: "ctime", valid: true };
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "mtime" || normalized === "ctime" || normalized === "atime") {
    return { mode: normalized, valid: true };
  }
  return { mode: "ctime", valid: false };
}

export function sortModeLabel(mode: SortMode): string {
  return SORT_MODE_LABELS[mode];
}

/**
 * Picks the timestamp a file is aged by.
 *
 * `ctime` reads the creation (birth) time. Filesystems that do not record it
 * report zero, and any kind the platform cannot supply comes back as the
 * epoch instead of an error.
 */
export function selectTimestamp(stats: FileTimes, mode: SortMode): Date {
  const ms = rawTimestamp(stats, mode);
  return new Date(Number.isFinite(ms) ? ms : 0);
}

function rawTimestamp(stats: FileTimes, mode: SortMode): number {
  switch (mode) {
    case "mtime":
      return stats.mtimeMs;
    case "atime":
      return stats.atimeMs;
    case "ctime":
      return stats.birthtimeMs > 0 ? stats.birthtimeMs : 0;
  }
}
