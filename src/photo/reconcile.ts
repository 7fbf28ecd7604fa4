import path from "node:path";
import type { CatalogRecord, ClassifiedTags, GroupedDiff } from "./tags/types.js";
import type {
  FileOutcome,
  OnProgress,
  ReconcileDeps,
  ReconcileFailureKind,
  ReconcileOptions,
  ReconcileStatus,
  ReconcileSummary,
} from "./types.js";
import { CatalogError } from "../catalog/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { CodecError } from "./exif-codec.js";
import { guessFilmFrame, isCanonicalUuid, promptFilmFrame, type FilmFrame } from "./identify.js";
import { classifyTags } from "./tags/classify.js";
import { diffClassifiedTags, isDiffEmpty, mergeClassifiedTags } from "./tags/diff.js";
import { flattenRecord } from "./tags/flatten.js";
import { mapToTags } from "./tags/map-tags.js";

const log = createSubsystemLogger("reconcile");

/** A per-file failure: reported on the outcome, never propagated past the file. */
class FileFailure extends Error {
  constructor(
    readonly status: ReconcileStatus,
    readonly kind: ReconcileFailureKind,
    message: string,
  ) {
    super(message);
    this.name = "FileFailure";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Catalog and codec failures become file failures; anything else is a bug and propagates. */
function asFileFailure(err: unknown, status: ReconcileStatus, kind: ReconcileFailureKind): unknown {
  if (err instanceof CatalogError || err instanceof CodecError) {
    return new FileFailure(status, kind, err.message);
  }
  return err;
}

function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Flatten, map and classify a catalog record into the tags it should produce. */
export function desiredTagsFor(record: CatalogRecord): ClassifiedTags {
  return classifyTags(mapToTags(flattenRecord(record)));
}

async function identifyFilmFrame(
  filePath: string,
  deps: ReconcileDeps,
  opts: ReconcileOptions,
): Promise<FilmFrame> {
  const filename = path.basename(filePath);
  const guess = guessFilmFrame(filename);
  if (guess) {
    log.info(`Deduced film ${guess.film} and frame ${guess.frame} from ${filename}`);
    return guess;
  }
  if (opts.auto) {
    throw new FileFailure(
      "skipped",
      "identification",
      `${filename} does not match FILM-FRAME notation`,
    );
  }
  const answer = await promptFilmFrame(deps.prompter, filename);
  if (!answer) {
    throw new FileFailure("skipped", "identification", `No film/frame given for ${filename}`);
  }
  return answer;
}

/**
 * Find the scan a file belongs to: its embedded unique id when it holds a valid one,
 * otherwise a new scan record created for the negative it was identified as.
 */
async function resolveScanId(
  filePath: string,
  existing: ClassifiedTags,
  deps: ReconcileDeps,
  opts: ReconcileOptions,
  onProgress?: OnProgress,
): Promise<{ scanId: string; created: boolean }> {
  const embedded = existing.exif.image_unique_id;
  if (isCanonicalUuid(embedded)) {
    log.info(`${filePath} already has a scan id`);
    onProgress?.({
      type: "reconcile.scan.identified",
      file: filePath,
      scan_id: embedded,
      source: "embedded",
    });
    return { scanId: embedded, created: false };
  }

  const { film, frame } = await identifyFilmFrame(filePath, deps, opts);

  let negative: string;
  try {
    negative = await deps.catalog.resolveNegative(film, frame);
  } catch (err) {
    throw asFileFailure(err, "skipped", "lookup");
  }
  log.info(`${filePath} corresponds to negative ${negative}`);

  let scanId: string;
  try {
    const today = formatLocalDate((deps.now ?? (() => new Date()))());
    scanId = await deps.catalog.createScan(negative, path.basename(filePath), today);
  } catch (err) {
    throw asFileFailure(err, "skipped", "creation");
  }
  log.info(`Created scan ${scanId} for negative ${negative}`);
  onProgress?.({ type: "reconcile.scan.created", file: filePath, negative, scan_id: scanId });
  onProgress?.({
    type: "reconcile.scan.identified",
    file: filePath,
    scan_id: scanId,
    source: "created",
  });
  return { scanId, created: true };
}

async function confirmWrite(
  filePath: string,
  deps: ReconcileDeps,
  opts: ReconcileOptions,
): Promise<boolean> {
  if (opts.yes) {
    return true;
  }
  return deps.prompter.confirm(`Write this metadata to ${path.basename(filePath)}?`);
}

/**
 * Reconcile one file with its catalog record: identify the scan, fetch it, diff the
 * tags it implies against the file's tags, and after confirmation write the merge.
 * Catalog and codec failures end this file only and are returned as its outcome.
 */
export async function reconcileFile(
  filePath: string,
  deps: ReconcileDeps,
  opts: ReconcileOptions,
  onProgress?: OnProgress,
): Promise<FileOutcome> {
  const outcome: FileOutcome = { file: filePath, status: "error" };
  try {
    let existing: ClassifiedTags;
    try {
      existing = await deps.codec.readEmbeddedTags(filePath);
    } catch (err) {
      throw asFileFailure(err, "error", "codec");
    }

    const { scanId, created } = await resolveScanId(filePath, existing, deps, opts, onProgress);
    outcome.scan_id = scanId;
    outcome.created_scan = created;

    let record: CatalogRecord;
    try {
      record = await deps.catalog.fetchScan(scanId);
    } catch (err) {
      throw asFileFailure(err, "fetch_failed", "fetch");
    }
    log.debug(`Got data for scan ${scanId}`);

    const desired = desiredTagsFor(record);
    const diff: GroupedDiff = diffClassifiedTags(existing, desired);
    if (isDiffEmpty(diff)) {
      outcome.status = "unchanged";
      return outcome;
    }
    outcome.diff = diff;
    onProgress?.({ type: "reconcile.diff", file: filePath, diff, desired });

    if (opts.dry_run) {
      outcome.status = "dry_run";
      return outcome;
    }
    if (!(await confirmWrite(filePath, deps, opts))) {
      outcome.status = "declined";
      outcome.failure = { kind: "declined", message: "Write declined by operator" };
      return outcome;
    }

    const merged = mergeClassifiedTags(existing, desired, diff);
    try {
      await deps.codec.writeEmbeddedTags(filePath, merged);
    } catch (err) {
      throw asFileFailure(err, "error", "codec");
    }
    outcome.status = "written";
    return outcome;
  } catch (err) {
    if (!(err instanceof FileFailure)) {
      throw err;
    }
    outcome.status = err.status;
    outcome.failure = { kind: err.kind, message: err.message };
    return outcome;
  }
}

function emptyTotals(): ReconcileSummary["totals"] {
  return {
    file_count: 0,
    written: 0,
    unchanged: 0,
    declined: 0,
    dry_run: 0,
    skipped: 0,
    fetch_failed: 0,
    error: 0,
  };
}

/** Reconcile files one after another; one file's failure never stops the batch. */
export async function reconcileFiles(
  files: readonly string[],
  deps: ReconcileDeps,
  opts: ReconcileOptions,
  onProgress?: OnProgress,
): Promise<ReconcileSummary> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const totals = emptyTotals();
  const outcomes: FileOutcome[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    onProgress?.({ type: "reconcile.file.start", file, index: i, total: files.length });
    const outcome = await reconcileFile(file, deps, opts, onProgress);
    if (outcome.failure && outcome.failure.kind !== "declined") {
      log.warn(`${file}: ${outcome.failure.message}`);
    }
    outcomes.push(outcome);
    totals.file_count++;
    totals[outcome.status]++;
    onProgress?.({ type: "reconcile.file.done", outcome });
  }

  return {
    started_at: startedAt,
    finished_at: now().toISOString(),
    totals,
    files: outcomes,
  };
}
