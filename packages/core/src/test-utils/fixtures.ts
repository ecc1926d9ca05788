/**
 * Test helpers shared by the core unit tests and the CLI end-to-end suite:
 * throwaway directories, files with chosen timestamps, and a reporter that
 * records what it was told.
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Writable } from "node:stream";
import type { Reporter } from "../retention/reporter.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface RecordingReporter extends Reporter {
  lines: { info: string[]; warn: string[]; error: string[] };
}

export function createRecordingReporter(): RecordingReporter {
  const lines = { info: [] as string[], warn: [] as string[], error: [] as string[] };
  return {
    lines,
    info: (line) => lines.info.push(line),
    warn: (line) => lines.warn.push(line),
    error: (line) => lines.error.push(line),
  };
}

export interface CapturedStream {
  stream: Writable;
  text(): string;
  lines(): string[];
}

/** A writable that keeps everything written to it, for asserting CLI output. */
export function createCapturedStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  const text = () => chunks.join("");
  return {
    stream,
    text,
    lines: () => {
      const all = text().split("\n");
      if (all.at(-1) === "") all.pop();
      return all;
    },
  };
}

/** Runs `fn` inside a fresh temp directory that is removed afterwards. */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  prefix = "bucketprune-test-",
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * A reference "now" on a whole second, so ages computed from it land on
 * exact day counts regardless of filesystem timestamp precision.
 */
export function fixedNow(): Date {
  return new Date(Math.floor(Date.now() / 1000) * 1000);
}

/**
 * Creates `path` (and its parent directories) with both access and
 * modification time set to `timestamp`.
 */
export async function writeFileAt(
  path: string,
  timestamp: Date,
  contents = "test\n",
): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents);
  await utimes(path, timestamp, timestamp);
  return path;
}

/** Creates a file whose mtime/atime lie `days` whole days before `now`. */
export async function writeAgedFile(
  path: string,
  days: number,
  now: Date,
): Promise<string> {
  return writeFileAt(path, new Date(now.getTime() - days * DAY_MS));
}
