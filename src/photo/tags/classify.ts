import type { ClassifiedTags, TagSet, TagValue } from "./types.js";
import { lookupTag } from "./vocabulary.js";

export function emptyClassifiedTags(): ClassifiedTags {
  return { ifd0: {}, exif: {}, gps: {} };
}

/**
 * Split a flat tag set into the IFD groups it is written to. Tags outside the
 * vocabulary and empty values are dropped.
 */
export function classifyTags(
  tags: Readonly<Record<string, TagValue | null | undefined>>,
): ClassifiedTags {
  const classified = emptyClassifiedTags();
  for (const [name, value] of Object.entries(tags)) {
    if (value === null || value === undefined || value === "") {
      continue;
    }
    const def = lookupTag(name);
    if (!def) {
      continue;
    }
    classified[def.group][name] = value;
  }
  return classified;
}

export function reassembleTags(classified: ClassifiedTags): TagSet {
  return { ...classified.ifd0, ...classified.exif, ...classified.gps };
}
