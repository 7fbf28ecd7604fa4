import type { ClassifiedTags, GroupedDiff, TagValue } from "./tags/types.js";
import type { ReconcileStatus, ReconcileSummary } from "./types.js";
import { hasPair } from "./tags/diff.js";
import { formatDms } from "./tags/gps.js";
import { TAG_GROUPS } from "./tags/types.js";

export function formatTagValue(value: TagValue): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number") {
    return String(value);
  }
  return formatDms(value);
}

/**
 * Render a diff for the operator. Pairs the catalog wants are marked `+`, pairs only
 * the file has are marked `-`; a `-` pair is kept unless a `+` pair replaces its tag.
 */
export function formatDiff(diff: GroupedDiff, desired: ClassifiedTags): string {
  const lines: string[] = [];
  for (const group of TAG_GROUPS) {
    if (diff[group].length === 0) {
      continue;
    }
    lines.push(`${group}:`);
    for (const entry of diff[group]) {
      const marker = hasPair(desired[group], entry) ? "+" : "-";
      lines.push(`  ${marker} ${entry[0]}: ${formatTagValue(entry[1])}`);
    }
  }
  return lines.join("\n");
}

const STATUS_ORDER: readonly ReconcileStatus[] = [
  "written",
  "unchanged",
  "dry_run",
  "declined",
  "skipped",
  "fetch_failed",
  "error",
];

const STATUS_LABELS: Record<ReconcileStatus, string> = {
  written: "written",
  unchanged: "unchanged",
  dry_run: "dry run",
  declined: "declined",
  skipped: "skipped",
  fetch_failed: "fetch failed",
  error: "failed",
};

export function formatRunSummary(summary: ReconcileSummary): string {
  const { totals } = summary;
  const parts = STATUS_ORDER.filter((status) => totals[status] > 0).map(
    (status) => `${totals[status]} ${STATUS_LABELS[status]}`,
  );
  const noun = totals.file_count === 1 ? "file" : "files";
  return parts.length > 0
    ? `${totals.file_count} ${noun}: ${parts.join(", ")}`
    : `${totals.file_count} ${noun}`;
}
