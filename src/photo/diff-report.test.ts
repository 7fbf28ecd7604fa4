import { describe, expect, it } from "vitest";
import type { ClassifiedTags } from "./tags/types.js";
import type { ReconcileSummary } from "./types.js";
import { formatDiff, formatRunSummary, formatTagValue } from "./diff-report.js";
import { diffClassifiedTags } from "./tags/diff.js";
import { toDms } from "./tags/gps.js";

function summaryWith(totals: Partial<ReconcileSummary["totals"]>): ReconcileSummary {
  return {
    started_at: "2026-03-14T12:00:00.000Z",
    finished_at: "2026-03-14T12:00:01.000Z",
    totals: {
      file_count: 0,
      written: 0,
      unchanged: 0,
      declined: 0,
      dry_run: 0,
      skipped: 0,
      fetch_failed: 0,
      error: 0,
      ...totals,
    },
    files: [],
  };
}

describe("formatTagValue", () => {
  it("quotes strings and prints numbers and coordinates bare", () => {
    expect(formatTagValue("Nikon F3")).toBe('"Nikon F3"');
    expect(formatTagValue(2.8)).toBe("2.8");
    expect(formatTagValue(toDms("151.2093"))).toBe("151 12 33.48");
  });
});

describe("formatDiff", () => {
  it("marks wanted pairs with + and file-only pairs with -", () => {
    const current: ClassifiedTags = { ifd0: { model: "Nikon F3" }, exif: {}, gps: {} };
    const desired: ClassifiedTags = {
      ifd0: { model: "Nikon FM2" },
      exif: {},
      gps: { gps_latitude: toDms(-33.8688) },
    };

    expect(formatDiff(diffClassifiedTags(current, desired), desired)).toBe(
      [
        "ifd0:",
        '  - model: "Nikon F3"',
        '  + model: "Nikon FM2"',
        "gps:",
        "  + gps_latitude: 33 52 7.68",
      ].join("\n"),
    );
  });
});

describe("formatRunSummary", () => {
  it("lists the non-zero counts in a fixed order", () => {
    expect(
      formatRunSummary(summaryWith({ file_count: 3, fetch_failed: 1, unchanged: 1, written: 1 })),
    ).toBe("3 files: 1 written, 1 unchanged, 1 fetch failed");
  });

  it("uses the singular for one file", () => {
    expect(formatRunSummary(summaryWith({ file_count: 1, dry_run: 1 }))).toBe("1 file: 1 dry run");
  });

  it("prints only the count for an empty run", () => {
    expect(formatRunSummary(summaryWith({}))).toBe("0 files");
  });
});
