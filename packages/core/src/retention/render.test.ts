import { describe, it, expect } from "vitest";
import { formatRecord, formatTimestamp, renderSelection } from "./render.js";
import type { SelectionResult } from "./selector.js";

// Local-time constructor, so the rendering is timezone-independent.
const t = (day: number, hour: number) => new Date(2026, 0, day, hour, 4, 5);

describe("formatTimestamp", () => {
  it("renders local time as YYYY-MM-DD HH:mm:ss", () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02 03:04:05");
    expect(formatTimestamp(new Date(2025, 11, 31, 23, 59, 59))).toBe(
      "2025-12-31 23:59:59",
    );
  });
});

describe("formatRecord", () => {
  it("appends the marker to delete entries only", () => {
    const r = { path: "/srv/a.tar", timestamp: t(2, 3) };
    expect(formatRecord(r, false)).toBe("/srv/a.tar | 2026-01-02 03:04:05");
    expect(formatRecord(r, true)).toBe(
      "/srv/a.tar | 2026-01-02 03:04:05 <-- to be deleted",
    );
  });
});

describe("renderSelection", () => {
  it("groups lines under bucket headers", () => {
    const selection: SelectionResult = {
      buckets: [
        {
          bucketId: 1,
          keep: [{ path: "/srv/new.tar", timestamp: t(10, 8) }],
          delete: [],
        },
        {
          bucketId: 8,
          keep: [{ path: "/srv/b.tar", timestamp: t(4, 9) }],
          delete: [{ path: "/srv/a.tar", timestamp: t(3, 9) }],
        },
      ],
      keep: [],
      delete: [],
    };

    expect(renderSelection("/srv", selection, { sort: "mtime", keep: 1 })).toEqual([
      "",
      "Opening /srv, sorting by MTime and keeping 1 files",
      "",
      "Younger than 1 days but older than 0 days:",
      "No files to delete in this group.",
      "/srv/new.tar | 2026-01-10 08:04:05",
      "",
      "Younger than 8 days but older than 4 days:",
      "/srv/b.tar | 2026-01-04 09:04:05",
      "/srv/a.tar | 2026-01-03 09:04:05 <-- to be deleted",
    ]);
  });

  it("renders only the header for an empty selection", () => {
    expect(
      renderSelection("/srv", { buckets: [], keep: [], delete: [] }, { sort: "ctime", keep: 0 }),
    ).toEqual(["", "Opening /srv, sorting by CTime and keeping 0 files"]);
  });
});
