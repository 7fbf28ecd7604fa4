import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { ExifTool } from "exiftool-vendored";
import type { ClassifiedTags, TagGroup, TagValue } from "./tags/types.js";
import type { TagDefinition } from "./tags/vocabulary.js";
import type { ExifCodec } from "./types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { emptyClassifiedTags } from "./tags/classify.js";
import { coerceTagValue, formatShutterSpeed } from "./tags/coerce.js";
import { formatDms } from "./tags/gps.js";
import { TAG_GROUPS } from "./tags/types.js";
import { lookupTag, lookupTagById } from "./tags/vocabulary.js";

const log = createSubsystemLogger("exif");

export class CodecError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CodecError";
    this.filePath = filePath;
  }
}

/** ExifTool group names used to qualify written tags. */
const WRITE_GROUPS: Record<TagGroup, string> = {
  ifd0: "IFD0",
  exif: "ExifIFD",
  gps: "GPS",
};

const USER_COMMENT_CHARSETS: ReadonlyArray<[prefix: string, encoding: string]> = [
  ["ASCII\0\0\0", "latin1"],
  ["UNICODE\0", "utf-16le"],
  ["\0\0\0\0\0\0\0\0", "utf-8"],
];

/** UserComment carries an 8-byte charset header before its text. */
export function decodeUserComment(bytes: Uint8Array): string {
  const header = Buffer.from(bytes.subarray(0, 8)).toString("latin1");
  const charset = USER_COMMENT_CHARSETS.find(([prefix]) => prefix === header);
  const body = charset ? bytes.subarray(8) : bytes;
  const text = new TextDecoder(charset?.[1] ?? "utf-8").decode(body);
  return text.replace(/[\0\s]+$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Convert a raw value read from the file into the tag's comparable form. */
export function decodeTagValue(def: TagDefinition, raw: unknown): TagValue | undefined {
  switch (def.kind) {
    case "string":
      return coerceTagValue("string", raw instanceof Uint8Array ? decodeUserComment(raw) : raw);
    case "shutter": {
      // APEX Tv = -log2(exposure time)
      if (typeof raw !== "number") {
        return coerceTagValue("shutter", raw);
      }
      const seconds = 2 ** -raw;
      return formatShutterSpeed(seconds >= 1 ? Math.round(seconds * 10) / 10 : seconds);
    }
    case "aperture": {
      // APEX Av = 2 * log2(f-number)
      if (typeof raw !== "number") {
        return coerceTagValue("aperture", raw);
      }
      return Math.round(2 ** (raw / 2) * 10) / 10;
    }
    default:
      return coerceTagValue(def.kind, raw);
  }
}

/** exifr blocks holding a single tag that it lifts out of its IFD. */
const LIFTED_BLOCKS: ReadonlyArray<[block: string, name: string]> = [
  ["userComment", "user_comment"],
];

/**
 * Turn exifr's unmerged, untranslated output (`{ ifd0: { 271: "Nikon" }, ... }`) into
 * vocabulary tags. Tags outside the vocabulary are ignored.
 */
export function decodeExifGroups(raw: unknown): ClassifiedTags {
  const tags = emptyClassifiedTags();
  if (!isRecord(raw)) {
    return tags;
  }
  for (const group of TAG_GROUPS) {
    const section = raw[group];
    if (!isRecord(section)) {
      continue;
    }
    for (const [key, value] of Object.entries(section)) {
      const def = lookupTagById(group, Number(key));
      if (!def) {
        continue;
      }
      const decoded = decodeTagValue(def, value);
      if (decoded !== undefined) {
        tags[group][def.name] = decoded;
      } else {
        log.debug(`ignoring undecodable ${def.tag} value`, value);
      }
    }
  }
  for (const [block, name] of LIFTED_BLOCKS) {
    const def = lookupTag(name);
    const value = raw[block];
    if (!def || value === undefined) {
      continue;
    }
    const decoded = decodeTagValue(def, value);
    if (decoded !== undefined) {
      tags[def.group][name] = decoded;
    }
  }
  return tags;
}

function encodeHtmlEntities(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;");
}

function formatWriteValue(value: TagValue): string {
  return typeof value === "string" || typeof value === "number" ? String(value) : formatDms(value);
}

/**
 * Build `-GROUP:Tag=value` arguments for ExifTool. Numeric kinds are written as raw
 * values (`#`); values are HTML-encoded, to be decoded by ExifTool's `-E`.
 */
export function encodeWriteArgs(tags: ClassifiedTags): string[] {
  const args: string[] = [];
  for (const group of TAG_GROUPS) {
    for (const [name, value] of Object.entries(tags[group])) {
      const def = lookupTag(name);
      if (!def || def.group !== group) {
        continue;
      }
      const raw = def.kind === "number" || def.kind === "integer" || def.kind === "ref";
      args.push(
        `-${WRITE_GROUPS[group]}:${def.tag}${raw ? "#" : ""}=${encodeHtmlEntities(
          formatWriteValue(value),
        )}`,
      );
    }
  }
  return args;
}

export type ExiftoolCodec = ExifCodec & {
  close(): Promise<void>;
};

/**
 * EXIF codec reading through exifr and writing through a shared ExifTool process.
 * Writes go to a temporary copy beside the target that is renamed over it, so the
 * original is untouched unless the whole write succeeds.
 */
export function createExifCodec(options: { taskTimeoutMillis?: number } = {}): ExiftoolCodec {
  let exiftool: ExifTool | null = null;

  const getExifTool = (): ExifTool => {
    if (!exiftool) {
      exiftool = new ExifTool({ taskTimeoutMillis: options.taskTimeoutMillis ?? 30000 });
    }
    return exiftool;
  };

  return {
    async readEmbeddedTags(filePath) {
      let raw: unknown;
      try {
        // Dynamic import to avoid loading exifr if not needed
        const exifr = await import("exifr");
        raw = await exifr.parse(filePath, {
          tiff: true,
          exif: true,
          gps: true,
          ifd1: false,
          interop: false,
          xmp: false,
          icc: false,
          iptc: false,
          jfif: false,
          ihdr: false,
          userComment: true,
          mergeOutput: false,
          translateKeys: false,
          translateValues: false,
          reviveValues: false,
        });
      } catch (err) {
        throw new CodecError(
          filePath,
          `Cannot read EXIF from ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
      return decodeExifGroups(raw);
    },

    async writeEmbeddedTags(filePath, tags) {
      const args = encodeWriteArgs(tags);
      if (args.length === 0) {
        return;
      }
      const ext = path.extname(filePath);
      const tmpPath = path.join(
        path.dirname(filePath),
        `.${path.basename(filePath, ext)}.${crypto.randomBytes(6).toString("hex")}.tmp${ext}`,
      );
      try {
        await fs.copyFile(filePath, tmpPath);
        await getExifTool().write(tmpPath, {}, {
          writeArgs: ["-overwrite_original", "-E", ...args],
        });
        await fs.rename(tmpPath, filePath);
        log.debug(`wrote ${args.length} tags to ${filePath}`);
      } catch (err) {
        await fs.rm(tmpPath, { force: true });
        throw new CodecError(
          filePath,
          `Cannot write EXIF to ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    },

    async close() {
      if (exiftool) {
        await exiftool.end();
        exiftool = null;
      }
    },
  };
}
