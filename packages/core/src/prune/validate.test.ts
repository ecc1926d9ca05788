import { describe, it, expect } from "vitest";
import { symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  ConfigurationError,
  PathNotADirectoryError,
  PathNotFoundError,
} from "../errors/catalog.js";
import { withTempDir } from "../test-utils/fixtures.js";
import { assertCompatibleModes, assertDirectory, validateOptions } from "./validate.js";

describe("assertCompatibleModes", () => {
  it("accepts every combination without print-only", () => {
    expect(() => assertCompatibleModes({ force: true, quiet: true })).not.toThrow();
    expect(() => assertCompatibleModes({})).not.toThrow();
  });

  it("checks quiet before force", () => {
    expect(() =>
      assertCompatibleModes({ quiet: true, printOnly: true, force: true }),
    ).toThrow("--quiet and --print-only cannot be used together.");
  });
});

describe("validateOptions", () => {
  it("fills defaults", () => {
    expect(validateOptions({ path: "/srv", keep: 3 })).toEqual({
      path: "/srv",
      keep: 3,
      sort: "ctime",
      retain: "newest",
      force: false,
      printOnly: false,
      recursive: false,
      quiet: false,
    });
  });

  it("wraps schema failures in a configuration error", () => {
    let caught: unknown;
    try {
      validateOptions({ path: "/srv", keep: 1.5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      message: expect.stringContaining("Keep count must be a whole number"),
    });
  });
});

describe("assertDirectory", () => {
  it("accepts a directory and a symlink to one", async () => {
    await withTempDir(async (dir) => {
      const link = join(dir, "link");
      await symlink(dir, link);
      await expect(assertDirectory(dir)).resolves.toBeUndefined();
      await expect(assertDirectory(link)).resolves.toBeUndefined();
    });
  });

  it("rejects a file and a missing path", async () => {
    await withTempDir(async (dir) => {
      const file = join(dir, "plain.txt");
      await writeFile(file, "x");
      await expect(assertDirectory(file)).rejects.toThrow(PathNotADirectoryError);
      await expect(assertDirectory(join(dir, "nope"))).rejects.toThrow(PathNotFoundError);
    });
  });
});
