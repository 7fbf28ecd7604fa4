import type { Decimal } from "decimal.js";

export type CatalogScalar = string | number | boolean | Date;

export type CatalogValue =
  | null
  | undefined
  | CatalogScalar
  | readonly CatalogValue[]
  | { readonly [key: string]: CatalogValue };

export type CatalogRecord = { readonly [key: string]: CatalogValue };

export type FlatEntry = {
  path: readonly string[];
  value: CatalogScalar;
};

export type TagGroup = "ifd0" | "exif" | "gps";

export const TAG_GROUPS: readonly TagGroup[] = ["ifd0", "exif", "gps"];

export type TagName = string;

/** Degrees and minutes are integers; seconds keep their exact decimal value. */
export type DmsTriple = readonly [degrees: number, minutes: number, seconds: Decimal];

export type TagValue = string | number | DmsTriple;

export type TagSet = Record<TagName, TagValue>;

export type ClassifiedTags = Record<TagGroup, TagSet>;

export type TagEntry = readonly [TagName, TagValue];

/** Pairs present in exactly one of two compared tag sets. */
export type Diff = readonly TagEntry[];

export type GroupedDiff = Record<TagGroup, Diff>;
