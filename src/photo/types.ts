import type { CatalogApi } from "../catalog/types.js";
import type { ClassifiedTags, GroupedDiff } from "./tags/types.js";

export type Prompter = {
  text(question: string, defaultValue?: string): Promise<string>;
  secret(question: string): Promise<string>;
  confirm(question: string): Promise<boolean>;
};

/** Reads and writes the EXIF groups of an image file. */
export type ExifCodec = {
  readEmbeddedTags(filePath: string): Promise<ClassifiedTags>;
  writeEmbeddedTags(filePath: string, tags: ClassifiedTags): Promise<void>;
};

export type ReconcileDeps = {
  catalog: CatalogApi;
  codec: ExifCodec;
  prompter: Prompter;
  now?: () => Date;
};

export type ReconcileOptions = {
  auto: boolean; // never prompt for film/frame, rely on the filename
  yes: boolean; // accept every change without asking
  dry_run: boolean;
};

export type ReconcileStatus =
  | "written"
  | "unchanged"
  | "declined"
  | "dry_run"
  | "skipped"
  | "fetch_failed"
  | "error";

export type ReconcileFailureKind =
  | "identification"
  | "lookup"
  | "creation"
  | "fetch"
  | "codec"
  | "declined";

export type ReconcileFailure = {
  kind: ReconcileFailureKind;
  message: string;
};

export type FileOutcome = {
  file: string;
  status: ReconcileStatus;
  scan_id?: string;
  created_scan?: boolean; // true when a new scan record was created for this file
  diff?: GroupedDiff;
  failure?: ReconcileFailure;
};

export type ReconcileSummary = {
  started_at: string; // ISO 8601
  finished_at: string;
  totals: Record<ReconcileStatus, number> & { file_count: number };
  files: FileOutcome[];
};

// Progress events emitted via onProgress callback
export type ReconcileProgressEvent =
  | { type: "reconcile.file.start"; file: string; index: number; total: number }
  | {
      type: "reconcile.scan.identified";
      file: string;
      scan_id: string;
      source: "embedded" | "created";
    }
  | { type: "reconcile.scan.created"; file: string; negative: string; scan_id: string }
  | {
      type: "reconcile.diff";
      file: string;
      diff: GroupedDiff;
      desired: ClassifiedTags;
    }
  | { type: "reconcile.file.done"; outcome: FileOutcome };

export type OnProgress = (event: ReconcileProgressEvent) => void;
