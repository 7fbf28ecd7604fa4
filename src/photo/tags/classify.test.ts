import { describe, expect, it } from "vitest";
import { classifyTags, reassembleTags } from "./classify.js";

describe("classifyTags", () => {
  it("splits tags by the IFD they belong to", () => {
    const tags = { make: "Nikon", image_unique_id: "abc", gps_latitude_ref: "N", iso_speed: 400 };

    expect(classifyTags(tags)).toEqual({
      ifd0: { make: "Nikon" },
      exif: { image_unique_id: "abc", iso_speed: 400 },
      gps: { gps_latitude_ref: "N" },
    });
  });

  it("drops empty values and names outside the vocabulary", () => {
    const tags = { make: "", model: null, artist: undefined, film_title: "Holiday" };

    expect(classifyTags(tags)).toEqual({ ifd0: {}, exif: {}, gps: {} });
  });

  it("is idempotent through reassembly", () => {
    const once = classifyTags({ model: "Nikon F3", f_number: 2.8, gps_longitude_ref: "W" });

    expect(classifyTags(reassembleTags(once))).toEqual(once);
  });
});

describe("reassembleTags", () => {
  it("flattens the groups back into one set", () => {
    expect(
      reassembleTags({ ifd0: { model: "Nikon F3" }, exif: { f_number: 2.8 }, gps: {} }),
    ).toEqual({ model: "Nikon F3", f_number: 2.8 });
  });
});
