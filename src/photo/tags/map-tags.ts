import type { FlatEntry, TagName, TagSet } from "./types.js";
import { coerceTagValue } from "./coerce.js";
import { joinPath } from "./flatten.js";
import { type GpsAxis, gpsRef, parseAngle, toDms } from "./gps.js";
import { lookupTag } from "./vocabulary.js";

/** Catalog dotted paths that map 1:1 onto a tag. */
export const CATALOG_TAG_MAP: ReadonlyMap<string, TagName> = new Map([
  ["uuid", "image_unique_id"],
  ["negative.film.camera.cameramodel.manufacturer.name", "make"],
  ["negative.film.camera.cameramodel.lens_manufacturer", "lens_make"],
  ["negative.film.camera.cameramodel.model", "model"],
  ["negative.film.camera.serial", "body_serial_number"],
  ["negative.film.exposed_at", "iso_speed"],
  ["negative.lens.lensmodel.model", "lens_model"],
  ["negative.lens.lensmodel.manufacturer.name", "lens_make"],
  ["negative.exposure_program", "exposure_program"],
  ["negative.metering_mode", "metering_mode"],
  ["negative.caption", "image_description"],
  ["negative.date", "datetime_original"],
  ["negative.aperture", "f_number"],
  ["negative.notes", "user_comment"],
  ["negative.focal_length", "focal_length"],
  ["negative.flash", "flash"],
  ["negative.photographer.name", "artist"],
  ["negative.lens.serial", "lens_serial_number"],
  ["negative.shutter_speed", "shutter_speed_value"],
  ["negative.lens.lensmodel.max_aperture", "max_aperture_value"],
  ["negative.copyright", "copyright"],
  ["negative.focal_length_35mm", "focal_length_in_35mm_film"],
]);

type GpsSource = { axis: GpsAxis; tag: TagName; ref: TagName };

/** Catalog coordinates that expand into a DMS tag plus its hemisphere reference. */
const GPS_SOURCES: ReadonlyMap<string, GpsSource> = new Map<string, GpsSource>([
  ["negative.latitude", { axis: "latitude", tag: "gps_latitude", ref: "gps_latitude_ref" }],
  ["negative.longitude", { axis: "longitude", tag: "gps_longitude", ref: "gps_longitude_ref" }],
]);

export function catalogPathToTag(key: string): TagName | undefined {
  return CATALOG_TAG_MAP.get(key);
}

/**
 * Translate flattened catalog entries into tags. Unmapped paths are dropped, as are
 * values that cannot be represented in their tag's kind. A later entry for the same
 * tag replaces an earlier one.
 */
export function mapToTags(entries: Iterable<FlatEntry>): TagSet {
  const tags: TagSet = {};
  for (const entry of entries) {
    const key = joinPath(entry.path);

    const gps = GPS_SOURCES.get(key);
    if (gps) {
      const angle = parseAngle(entry.value);
      if (angle) {
        tags[gps.tag] = toDms(angle);
        tags[gps.ref] = gpsRef(gps.axis, angle);
      }
      continue;
    }

    const name = catalogPathToTag(key);
    const def = name ? lookupTag(name) : undefined;
    if (!name || !def) {
      continue;
    }
    const value = coerceTagValue(def.kind, entry.value);
    if (value !== undefined) {
      tags[name] = value;
    }
  }
  return tags;
}
