import { describe, expect, it } from "vitest";
import { flattenRecord, joinPath } from "./flatten.js";

describe("flattenRecord", () => {
  it("yields dotted leaves in key order", () => {
    const record = {
      uuid: "c9bf9e57-1685-4c89-bafb-ff5af830be8a",
      negative: { caption: "Beach" },
    };

    expect([...flattenRecord(record)]).toEqual([
      { path: ["uuid"], value: "c9bf9e57-1685-4c89-bafb-ff5af830be8a" },
      { path: ["negative", "caption"], value: "Beach" },
    ]);
  });

  it("never emits null leaves", () => {
    const record = { a: null, b: { c: null, d: 1 }, e: [null, "x"] };

    expect([...flattenRecord(record)]).toEqual([
      { path: ["b", "d"], value: 1 },
      { path: ["e"], value: "x" },
    ]);
  });

  it("gives sequence elements their parent's path", () => {
    const record = { tags: [{ name: "a" }, { name: "b" }], frames: [[1, 2], [3]] };

    expect([...flattenRecord(record)]).toEqual([
      { path: ["tags", "name"], value: "a" },
      { path: ["tags", "name"], value: "b" },
      { path: ["frames"], value: 1 },
      { path: ["frames"], value: 2 },
      { path: ["frames"], value: 3 },
    ]);
  });

  it("yields a bare scalar with an empty path", () => {
    expect([...flattenRecord("solo")]).toEqual([{ path: [], value: "solo" }]);
    expect([...flattenRecord(null)]).toEqual([]);
  });

  it("treats dates and booleans as leaves", () => {
    const taken = new Date("2021-06-12T14:30:00Z");

    expect([...flattenRecord({ negative: { date: taken, flash: false } })]).toEqual([
      { path: ["negative", "date"], value: taken },
      { path: ["negative", "flash"], value: false },
    ]);
  });

  it("can be walked again with the same result", () => {
    const record = { negative: { film: { camera: { serial: "1234" } }, notes: "n" } };

    expect([...flattenRecord(record)]).toEqual([...flattenRecord(record)]);
  });
});

describe("joinPath", () => {
  it("joins segments with dots", () => {
    expect(joinPath(["negative", "lens", "serial"])).toBe("negative.lens.serial");
    expect(joinPath([])).toBe("");
  });
});
