import { describe, it, expect } from "vitest";
import { access, stat } from "node:fs/promises";
import { join } from "node:path";
import {
  DAY_MS,
  createCapturedStream,
  createRecordingReporter,
  fixedNow,
  withTempDir,
  writeAgedFile,
} from "./fixtures.js";

describe("createRecordingReporter", () => {
  it("keeps lines per stream", () => {
    const reporter = createRecordingReporter();
    reporter.info("a");
    reporter.warn("b");
    reporter.error("c");
    reporter.info("d");

    expect(reporter.lines).toEqual({ info: ["a", "d"], warn: ["b"], error: ["c"] });
  });
});

describe("withTempDir", () => {
  it("removes the directory afterwards", async () => {
    let seen = "";
    await withTempDir(async (dir) => {
      seen = dir;
      await access(dir);
    });
    await expect(access(seen)).rejects.toThrow();
  });
});

describe("writeAgedFile", () => {
  it("backdates mtime and atime by whole days", async () => {
    await withTempDir(async (dir) => {
      const now = fixedNow();
      const path = await writeAgedFile(join(dir, "nested", "old.txt"), 3, now);
      const stats = await stat(path);

      expect(Math.round(stats.mtimeMs)).toBe(now.getTime() - 3 * DAY_MS);
      expect(Math.round(stats.atimeMs)).toBe(now.getTime() - 3 * DAY_MS);
    });
  });
});

describe("createCapturedStream", () => {
  it("collects writes as text and lines", () => {
    const captured = createCapturedStream();
    captured.stream.write("one\n");
    captured.stream.write("two\nthree\n");

    expect(captured.text()).toBe("one\ntwo\nthree\n");
    expect(captured.lines()).toEqual(["one", "two", "three"]);
  });
});
