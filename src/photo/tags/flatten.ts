import type { CatalogValue, FlatEntry } from "./types.js";

function isSequence(value: CatalogValue): value is readonly CatalogValue[] {
  return Array.isArray(value);
}

function isMapping(value: CatalogValue): value is { readonly [key: string]: CatalogValue } {
  return (
    typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Walk a nested catalog record depth-first and yield one entry per non-null leaf.
 *
 * Mapping keys extend the path; sequence elements share their parent's path, so two
 * elements with the same leaf key produce entries with identical paths.
 */
export function* flattenRecord(
  record: CatalogValue,
  prefix: readonly string[] = [],
): Generator<FlatEntry> {
  if (record === null || record === undefined) {
    return;
  }
  if (isSequence(record)) {
    for (const element of record) {
      yield* flattenRecord(element, prefix);
    }
    return;
  }
  if (isMapping(record)) {
    for (const [key, value] of Object.entries(record)) {
      yield* flattenRecord(value, [...prefix, key]);
    }
    return;
  }
  yield { path: prefix, value: record };
}

export function joinPath(path: readonly string[]): string {
  return path.join(".");
}
