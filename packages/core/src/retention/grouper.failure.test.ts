import { describe, it, expect, vi, afterEach } from "vitest";
import { join } from "node:path";
import { IOFailureError } from "../errors/catalog.js";
import { fixedNow, withTempDir, writeAgedFile } from "../test-utils/fixtures.js";
import { groupDirectory, groupTree } from "./grouper.js";

const denied = vi.hoisted(() => ({ path: "" }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    lstat: vi.fn(async (path: string) => {
      if (path === denied.path) {
        throw Object.assign(
          new Error(`EACCES: permission denied, lstat '${path}'`),
          { code: "EACCES" },
        );
      }
      return actual.lstat(path);
    }),
  };
});

afterEach(() => {
  denied.path = "";
});

describe("grouping when file metadata cannot be read", () => {
  it("fails the whole directory instead of returning partial buckets", async () => {
    await withTempDir(async (dir) => {
      const now = fixedNow();
      await writeAgedFile(join(dir, "a.txt"), 0, now);
      denied.path = await writeAgedFile(join(dir, "bad.txt"), 1, now);

      const err = await groupDirectory(dir, "mtime", {
        now: new Date(now.getTime() + 60_000),
      }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(IOFailureError);
      expect(err).toMatchObject({
        kind: "IOFailure",
        message: `Failed to read ${denied.path}: EACCES: permission denied, lstat '${denied.path}'`,
        details: { path: denied.path, code: "EACCES" },
      });
    });
  });

  it("aborts a tree scan rather than skipping the directory", async () => {
    await withTempDir(async (dir) => {
      const now = fixedNow();
      await writeAgedFile(join(dir, "a.txt"), 0, now);
      denied.path = await writeAgedFile(join(dir, "sub", "bad.txt"), 1, now);
      const onSkip = vi.fn();

      await expect(
        groupTree(dir, "mtime", { now: new Date(now.getTime() + 60_000), onSkip }),
      ).rejects.toThrow(IOFailureError);
      expect(onSkip).not.toHaveBeenCalled();
    });
  });
});
