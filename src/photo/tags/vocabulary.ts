import type { TagGroup, TagName } from "./types.js";

/**
 * How a tag's value is represented on both sides of a comparison.
 * `shutter` and `aperture` are APEX-encoded in the file but compared as
 * `1/N` strings and f-numbers.
 */
export type TagKind =
  | "string"
  | "number"
  | "integer"
  | "datetime"
  | "shutter"
  | "aperture"
  | "dms"
  | "ref";

export type TagDefinition = {
  name: TagName;
  group: TagGroup;
  id: number; // numeric EXIF tag id within its IFD
  tag: string; // ExifTool tag name
  kind: TagKind;
};

const IFD0_TAGS = [
  { name: "image_description", id: 0x010e, tag: "ImageDescription", kind: "string" },
  { name: "make", id: 0x010f, tag: "Make", kind: "string" },
  { name: "model", id: 0x0110, tag: "Model", kind: "string" },
  { name: "orientation", id: 0x0112, tag: "Orientation", kind: "integer" },
  { name: "software", id: 0x0131, tag: "Software", kind: "string" },
  { name: "datetime", id: 0x0132, tag: "ModifyDate", kind: "datetime" },
  { name: "artist", id: 0x013b, tag: "Artist", kind: "string" },
  { name: "copyright", id: 0x8298, tag: "Copyright", kind: "string" },
] as const;

const EXIF_TAGS = [
  { name: "exposure_time", id: 0x829a, tag: "ExposureTime", kind: "number" },
  { name: "f_number", id: 0x829d, tag: "FNumber", kind: "number" },
  { name: "exposure_program", id: 0x8822, tag: "ExposureProgram", kind: "integer" },
  { name: "iso_speed", id: 0x8833, tag: "ISOSpeed", kind: "integer" },
  { name: "datetime_original", id: 0x9003, tag: "DateTimeOriginal", kind: "datetime" },
  { name: "datetime_digitized", id: 0x9004, tag: "CreateDate", kind: "datetime" },
  { name: "shutter_speed_value", id: 0x9201, tag: "ShutterSpeedValue", kind: "shutter" },
  { name: "max_aperture_value", id: 0x9205, tag: "MaxApertureValue", kind: "aperture" },
  { name: "metering_mode", id: 0x9207, tag: "MeteringMode", kind: "integer" },
  { name: "flash", id: 0x9209, tag: "Flash", kind: "integer" },
  { name: "focal_length", id: 0x920a, tag: "FocalLength", kind: "number" },
  { name: "user_comment", id: 0x9286, tag: "UserComment", kind: "string" },
  {
    name: "focal_length_in_35mm_film",
    id: 0xa405,
    tag: "FocalLengthIn35mmFormat",
    kind: "integer",
  },
  { name: "image_unique_id", id: 0xa420, tag: "ImageUniqueID", kind: "string" },
  { name: "body_serial_number", id: 0xa431, tag: "SerialNumber", kind: "string" },
  { name: "lens_make", id: 0xa433, tag: "LensMake", kind: "string" },
  { name: "lens_model", id: 0xa434, tag: "LensModel", kind: "string" },
  { name: "lens_serial_number", id: 0xa435, tag: "LensSerialNumber", kind: "string" },
] as const;

const GPS_TAGS = [
  { name: "gps_latitude_ref", id: 0x0001, tag: "GPSLatitudeRef", kind: "ref" },
  { name: "gps_latitude", id: 0x0002, tag: "GPSLatitude", kind: "dms" },
  { name: "gps_longitude_ref", id: 0x0003, tag: "GPSLongitudeRef", kind: "ref" },
  { name: "gps_longitude", id: 0x0004, tag: "GPSLongitude", kind: "dms" },
  { name: "gps_altitude", id: 0x0006, tag: "GPSAltitude", kind: "number" },
] as const;

export const TAG_VOCABULARY: ReadonlyMap<TagName, TagDefinition> = new Map(
  [
    ...IFD0_TAGS.map((t) => ({ ...t, group: "ifd0" as const })),
    ...EXIF_TAGS.map((t) => ({ ...t, group: "exif" as const })),
    ...GPS_TAGS.map((t) => ({ ...t, group: "gps" as const })),
  ].map((def): [TagName, TagDefinition] => [def.name, def]),
);

const BY_ID = new Map<string, TagDefinition>(
  [...TAG_VOCABULARY.values()].map((def) => [`${def.group}:${def.id}`, def]),
);

export function lookupTag(name: TagName): TagDefinition | undefined {
  return TAG_VOCABULARY.get(name);
}

export function lookupTagById(group: TagGroup, id: number): TagDefinition | undefined {
  return BY_ID.get(`${group}:${id}`);
}
