import { describe, expect, it } from "vitest";
import { coerceTagValue, formatExifDateTime, formatShutterSpeed } from "./coerce.js";

describe("formatExifDateTime", () => {
  it("rewrites ISO timestamps without their offset", () => {
    expect(formatExifDateTime("2021-06-12T14:30:00Z")).toBe("2021:06:12 14:30:00");
    expect(formatExifDateTime("2021-06-12T14:30:00+02:00")).toBe("2021:06:12 14:30:00");
  });

  it("fills in a missing time or seconds", () => {
    expect(formatExifDateTime("2021-06-12")).toBe("2021:06:12 00:00:00");
    expect(formatExifDateTime("2021-06-12 09:05")).toBe("2021:06:12 09:05:00");
  });

  it("leaves EXIF timestamps as they are", () => {
    expect(formatExifDateTime("2021:06:12 14:30:05")).toBe("2021:06:12 14:30:05");
  });

  it("formats dates in UTC", () => {
    expect(formatExifDateTime(new Date("2021-06-12T14:30:00Z"))).toBe("2021:06:12 14:30:00");
  });

  it("rejects text that is not a date", () => {
    expect(formatExifDateTime("June 2021")).toBeUndefined();
    expect(formatExifDateTime(new Date(Number.NaN))).toBeUndefined();
    expect(formatExifDateTime(20210612)).toBeUndefined();
  });
});

describe("formatShutterSpeed", () => {
  it("writes fractions of a second as 1/N", () => {
    expect(formatShutterSpeed(0.008)).toBe("1/125");
    expect(formatShutterSpeed("0.5")).toBe("1/2");
  });

  it("writes long exposures in seconds", () => {
    expect(formatShutterSpeed(2)).toBe("2");
    expect(formatShutterSpeed(1)).toBe("1");
  });

  it("keeps catalog fractions with whitespace removed", () => {
    expect(formatShutterSpeed("1/125")).toBe("1/125");
    expect(formatShutterSpeed(" 1 / 60 ")).toBe("1/60");
  });

  it("rejects empty and non-positive values", () => {
    expect(formatShutterSpeed("  ")).toBeUndefined();
    expect(formatShutterSpeed(0)).toBeUndefined();
    expect(formatShutterSpeed(null)).toBeUndefined();
  });
});

describe("coerceTagValue", () => {
  it("stringifies scalars for string tags", () => {
    expect(coerceTagValue("string", "Beach")).toBe("Beach");
    expect(coerceTagValue("string", 1234)).toBe("1234");
    expect(coerceTagValue("string", true)).toBe("true");
    expect(coerceTagValue("string", "")).toBeUndefined();
  });

  it("drops trailing whitespace and NUL padding from strings", () => {
    expect(coerceTagValue("string", "Beach ")).toBe("Beach");
    expect(coerceTagValue("string", "Nikon F3\0\0")).toBe("Nikon F3");
    expect(coerceTagValue("string", "  Beach")).toBe("  Beach");
    expect(coerceTagValue("string", " \0")).toBeUndefined();
  });

  it("parses numbers", () => {
    expect(coerceTagValue("number", "2.8")).toBe(2.8);
    expect(coerceTagValue("number", 50)).toBe(50);
    expect(coerceTagValue("aperture", "1.4")).toBe(1.4);
    expect(coerceTagValue("number", "f/2.8")).toBeUndefined();
    expect(coerceTagValue("number", Number.POSITIVE_INFINITY)).toBeUndefined();
  });

  it("only accepts whole numbers for integer tags", () => {
    expect(coerceTagValue("integer", "400")).toBe(400);
    expect(coerceTagValue("integer", 3)).toBe(3);
    expect(coerceTagValue("integer", true)).toBe(1);
    expect(coerceTagValue("integer", false)).toBe(0);
    expect(coerceTagValue("integer", 2.5)).toBeUndefined();
    expect(coerceTagValue("integer", "ISO 400")).toBeUndefined();
  });

  it("normalizes hemisphere references", () => {
    expect(coerceTagValue("ref", " s ")).toBe("S");
    expect(coerceTagValue("ref", "X")).toBeUndefined();
    expect(coerceTagValue("ref", 1)).toBeUndefined();
  });

  it("builds DMS triples from plain numbers", () => {
    const value = coerceTagValue("dms", [33, 52, 7.68]);
    expect(Array.isArray(value)).toBe(true);
    if (!Array.isArray(value)) {
      return;
    }
    expect([value[0], value[1], value[2].toString()]).toEqual([33, 52, "7.68"]);
    expect(coerceTagValue("dms", [33, 52])).toBeUndefined();
    expect(coerceTagValue("dms", "33 52 7.68")).toBeUndefined();
  });
});
