import type { CatalogApi } from "../catalog/types.js";
import type { ReadlinePrompter } from "../cli/prompt.js";
import type { CatalogRecord, ClassifiedTags } from "./tags/types.js";
import type { ExifCodec } from "./types.js";
import { CatalogError } from "../catalog/errors.js";
import { emptyClassifiedTags } from "./tags/classify.js";

export type FakePrompter = ReadlinePrompter & {
  questions: string[];
  closed: boolean;
};

/** Answers prompts from queues; an exhausted queue fails the test loudly. */
export function createFakePrompter(
  answers: { text?: string[]; secret?: string[]; confirm?: boolean[] } = {},
): FakePrompter {
  const text = [...(answers.text ?? [])];
  const secret = [...(answers.secret ?? [])];
  const confirm = [...(answers.confirm ?? [])];
  const prompter: FakePrompter = {
    questions: [],
    closed: false,
    async text(question, defaultValue) {
      prompter.questions.push(question);
      const answer = text.shift();
      if (answer === undefined) {
        throw new Error(`unexpected text prompt: ${question}`);
      }
      return answer === "" && defaultValue !== undefined ? defaultValue : answer;
    },
    async secret(question) {
      prompter.questions.push(question);
      const answer = secret.shift();
      if (answer === undefined) {
        throw new Error(`unexpected secret prompt: ${question}`);
      }
      return answer;
    },
    async confirm(question) {
      prompter.questions.push(question);
      const answer = confirm.shift();
      if (answer === undefined) {
        throw new Error(`unexpected confirm prompt: ${question}`);
      }
      return answer;
    },
    close() {
      prompter.closed = true;
    },
  };
  return prompter;
}

export type FakeCodec = ExifCodec & {
  writes: { filePath: string; tags: ClassifiedTags }[];
  closed: boolean;
  close(): Promise<void>;
};

/**
 * In-memory codec. A file mapped to an Error fails on read; `writeErrors` fail on write.
 * Files that are not listed read as having no EXIF.
 */
export function createFakeCodec(
  files: Record<string, ClassifiedTags | Error> = {},
  writeErrors: Record<string, Error> = {},
): FakeCodec {
  const codec: FakeCodec = {
    writes: [],
    closed: false,
    async readEmbeddedTags(filePath) {
      const entry = files[filePath];
      if (entry instanceof Error) {
        throw entry;
      }
      return entry ?? emptyClassifiedTags();
    },
    async writeEmbeddedTags(filePath, tags) {
      const failure = writeErrors[filePath];
      if (failure) {
        throw failure;
      }
      codec.writes.push({ filePath, tags });
    },
    async close() {
      codec.closed = true;
    },
  };
  return codec;
}

export type FakeCatalog = CatalogApi & {
  created: { negative: string; filename: string; date: string }[];
  fetched: string[];
};

export type FakeCatalogOptions = {
  credentialsOk?: boolean;
  negatives?: Record<string, string>; // "film/frame" -> negative slug
  scans?: Record<string, CatalogRecord>;
  nextScanIds?: string[];
  rejectCreate?: boolean;
  fetchError?: CatalogError;
};

export function createFakeCatalog(options: FakeCatalogOptions = {}): FakeCatalog {
  const nextScanIds = [...(options.nextScanIds ?? [])];
  const catalog: FakeCatalog = {
    created: [],
    fetched: [],
    async testCredentials() {
      return options.credentialsOk ?? true;
    },
    async resolveNegative(film, frame) {
      const slug = options.negatives?.[`${film}/${frame}`];
      if (!slug) {
        throw new CatalogError(
          "not_found",
          `Expected one negative for film ${film} frame ${frame}, catalog returned 0`,
        );
      }
      return slug;
    },
    async createScan(negative, filename, date) {
      if (options.rejectCreate) {
        throw new CatalogError("validation", "POST /scan/: rejected (HTTP 400)", { status: 400 });
      }
      const id = nextScanIds.shift();
      if (!id) {
        throw new Error("no scan id queued for createScan");
      }
      catalog.created.push({ negative, filename, date });
      return id;
    },
    async fetchScan(scanId) {
      catalog.fetched.push(scanId);
      if (options.fetchError) {
        throw options.fetchError;
      }
      const record = options.scans?.[scanId];
      if (!record) {
        throw new CatalogError("not_found", `Expected one scan ${scanId}, catalog returned 0`);
      }
      return record;
    },
  };
  return catalog;
}
