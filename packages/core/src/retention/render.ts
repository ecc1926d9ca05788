import dayjs from "dayjs";
import type { SortMode } from "../schemas/prune-config.js";
import { bucketLowerBound } from "./buckets.js";
import type { FileRecord } from "./grouper.js";
import type { SelectionResult } from "./selector.js";
import { sortModeLabel } from "./time.js";

export const TIMESTAMP_FORMAT = "YYYY-MM-DD HH:mm:ss";
export const DELETE_MARKER = "<-- to be deleted";

export interface RenderOptions {
  sort: SortMode;
  keep: number;
}

/** Local-time rendering used in every report line. */
export function formatTimestamp(timestamp: Date): string {
  return dayjs(timestamp).format(TIMESTAMP_FORMAT);
}

export function formatRecord(record: FileRecord, marked: boolean): string {
  const line = `${record.path} | ${formatTimestamp(record.timestamp)}`;
  return marked ? `${line} ${DELETE_MARKER}` : line;
}

/**
 * Report lines for one directory's selection. Empty strings are blank
 * separator lines.
 */
export function renderSelection(
  directory: string,
  selection: SelectionResult,
  options: RenderOptions,
): string[] {
  const lines = [
    "",
    `Opening ${directory}, sorting by ${sortModeLabel(options.sort)} and keeping ${options.keep} files`,
  ];

  for (const bucket of selection.buckets) {
    lines.push(
      "",
      `Younger than ${bucket.bucketId} days but older than ${bucketLowerBound(bucket.bucketId)} days:`,
    );
    if (bucket.delete.length === 0) {
      lines.push("No files to delete in this group.");
    }
    for (const record of bucket.keep) {
      lines.push(formatRecord(record, false));
    }
    for (const record of bucket.delete) {
      lines.push(formatRecord(record, true));
    }
  }

  return lines;
}
