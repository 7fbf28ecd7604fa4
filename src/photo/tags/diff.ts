import type {
  ClassifiedTags,
  Diff,
  GroupedDiff,
  TagEntry,
  TagName,
  TagSet,
  TagValue,
} from "./types.js";
import { TAG_GROUPS } from "./types.js";

/** Type-tagged string identity of a tag value; DMS seconds compare by exact decimal. */
export function tagValueKey(value: TagValue): string {
  if (typeof value === "string") {
    return `s:${value}`;
  }
  if (typeof value === "number") {
    return `n:${value}`;
  }
  const [degrees, minutes, seconds] = value;
  return `dms:${degrees}:${minutes}:${seconds.toString()}`;
}

function pairKey(name: TagName, value: TagValue): string {
  return `${name}\u0000${tagValueKey(value)}`;
}

function pairsOf(tags: TagSet): Map<string, TagEntry> {
  const pairs = new Map<string, TagEntry>();
  for (const [name, value] of Object.entries(tags)) {
    pairs.set(pairKey(name, value), [name, value]);
  }
  return pairs;
}

export function hasPair(tags: TagSet, [name, value]: TagEntry): boolean {
  const existing = tags[name];
  return existing !== undefined && tagValueKey(existing) === tagValueKey(value);
}

/**
 * Symmetric difference of the `(name, value)` pairs of two tag sets. A tag whose value
 * differs appears twice, once per side. The result does not record which side a pair
 * came from and is sorted so that `diffTags(a, b)` equals `diffTags(b, a)`.
 */
export function diffTags(current: TagSet, desired: TagSet): Diff {
  const a = pairsOf(current);
  const b = pairsOf(desired);
  const diff: { key: string; entry: TagEntry }[] = [];
  for (const [key, entry] of a) {
    if (!b.has(key)) {
      diff.push({ key, entry });
    }
  }
  for (const [key, entry] of b) {
    if (!a.has(key)) {
      diff.push({ key, entry });
    }
  }
  diff.sort((x, y) => (x.key < y.key ? -1 : x.key > y.key ? 1 : 0));
  return diff.map((d) => d.entry);
}

/**
 * Apply the pairs of `diff` that belong to `desired` on top of `current`.
 * Tags that only `current` carries are kept; nothing is ever removed.
 */
export function mergeTags(current: TagSet, desired: TagSet, diff: Diff): TagSet {
  const merged: TagSet = { ...current };
  for (const entry of diff) {
    if (hasPair(desired, entry)) {
      merged[entry[0]] = entry[1];
    }
  }
  return merged;
}

export function diffClassifiedTags(current: ClassifiedTags, desired: ClassifiedTags): GroupedDiff {
  return {
    ifd0: diffTags(current.ifd0, desired.ifd0),
    exif: diffTags(current.exif, desired.exif),
    gps: diffTags(current.gps, desired.gps),
  };
}

export function mergeClassifiedTags(
  current: ClassifiedTags,
  desired: ClassifiedTags,
  diff: GroupedDiff,
): ClassifiedTags {
  return {
    ifd0: mergeTags(current.ifd0, desired.ifd0, diff.ifd0),
    exif: mergeTags(current.exif, desired.exif, diff.exif),
    gps: mergeTags(current.gps, desired.gps, diff.gps),
  };
}

export function isDiffEmpty(diff: GroupedDiff): boolean {
  return TAG_GROUPS.every((group) => diff[group].length === 0);
}
