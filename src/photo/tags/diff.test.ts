import { describe, expect, it } from "vitest";
import type { ClassifiedTags, TagSet } from "./types.js";
import {
  diffClassifiedTags,
  diffTags,
  isDiffEmpty,
  mergeClassifiedTags,
  mergeTags,
  tagValueKey,
} from "./diff.js";
import { ExactDecimal, toDms } from "./gps.js";

describe("diffTags", () => {
  it("is empty for equal sets", () => {
    const tags: TagSet = { model: "Nikon F3", f_number: 2.8 };

    expect(diffTags(tags, { ...tags })).toEqual([]);
  });

  it("lists both sides of a changed value", () => {
    expect(diffTags({ model: "Nikon F3" }, { model: "Nikon FM2" })).toEqual([
      ["model", "Nikon F3"],
      ["model", "Nikon FM2"],
    ]);
  });

  it("is symmetric", () => {
    const a: TagSet = { model: "Nikon F3", artist: "Ann", iso_speed: 400 };
    const b: TagSet = { model: "Nikon F3", copyright: "CC-BY", iso_speed: 200 };

    expect(diffTags(a, b)).toEqual(diffTags(b, a));
  });

  it("tells numbers and numeric strings apart", () => {
    expect(tagValueKey("400")).not.toBe(tagValueKey(400));
    expect(diffTags({ iso_speed: "400" }, { iso_speed: 400 })).toHaveLength(2);
  });

  it("compares DMS seconds by decimal value", () => {
    const fromCatalog: TagSet = { gps_latitude: toDms("-33.8688") };
    const fromFile: TagSet = { gps_latitude: [33, 52, new ExactDecimal("7.680")] };

    expect(diffTags(fromCatalog, fromFile)).toEqual([]);
  });
});

describe("mergeTags", () => {
  it("applies desired values and keeps tags only the file has", () => {
    const current: TagSet = { model: "Nikon F3", artist: "Ann", copyright: "old" };
    const desired: TagSet = { model: "Nikon F3", copyright: "new", make: "Nikon" };
    const diff = diffTags(current, desired);

    expect(diff).toEqual([
      ["artist", "Ann"],
      ["copyright", "new"],
      ["copyright", "old"],
      ["make", "Nikon"],
    ]);
    expect(mergeTags(current, desired, diff)).toEqual({
      model: "Nikon F3",
      artist: "Ann",
      copyright: "new",
      make: "Nikon",
    });
  });

  it("does not modify its inputs", () => {
    const current: TagSet = { model: "Nikon F3" };
    const desired: TagSet = { model: "Nikon FM2" };

    mergeTags(current, desired, diffTags(current, desired));

    expect(current).toEqual({ model: "Nikon F3" });
  });
});

describe("grouped diffs", () => {
  const current: ClassifiedTags = {
    ifd0: { model: "Nikon F3" },
    exif: { image_unique_id: "c9bf9e57-1685-4c89-bafb-ff5af830be8a" },
    gps: {},
  };

  it("diffs each group on its own", () => {
    const desired: ClassifiedTags = {
      ifd0: { model: "Nikon F3" },
      exif: { image_unique_id: "c9bf9e57-1685-4c89-bafb-ff5af830be8a", f_number: 2.8 },
      gps: { gps_latitude_ref: "S" },
    };
    const diff = diffClassifiedTags(current, desired);

    expect(diff).toEqual({
      ifd0: [],
      exif: [["f_number", 2.8]],
      gps: [["gps_latitude_ref", "S"]],
    });
    expect(isDiffEmpty(diff)).toBe(false);
    expect(mergeClassifiedTags(current, desired, diff)).toEqual(desired);
  });

  it("reports no change for identical tags", () => {
    expect(isDiffEmpty(diffClassifiedTags(current, current))).toBe(true);
  });
});
