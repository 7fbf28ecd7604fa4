import { Decimal } from "decimal.js";
import type { TagKind } from "./vocabulary.js";
import type { DmsTriple, TagValue } from "./types.js";
import { ExactDecimal } from "./gps.js";

const NUMERIC = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER = /^[-+]?\d+$/;
const DATETIME = /^(\d{4})[-:](\d{2})[-:](\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/;

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && NUMERIC.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === "string" && INTEGER.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return undefined;
}

/** EXIF strings may carry NUL padding; trailing padding and whitespace never count. */
function trimTrailing(value: string): string {
  return value.replace(/[\0\s]+$/, "");
}

/** EXIF stores local wall-clock time as `YYYY:MM:DD HH:MM:SS`; any offset is dropped. */
export function formatExifDateTime(value: unknown): string | undefined {
  const text =
    value instanceof Date
      ? Number.isNaN(value.getTime())
        ? undefined
        : value.toISOString()
      : typeof value === "string"
        ? value.trim()
        : undefined;
  const match = text ? DATETIME.exec(text) : null;
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour = "00", minute = "00", second = "00"] = match;
  return `${year}:${month}:${day} ${hour}:${minute}:${second}`;
}

/** Exposure times below one second read as `1/N`; longer ones as plain seconds. */
export function formatShutterSpeed(value: unknown): string | undefined {
  const seconds = toNumber(value);
  if (seconds !== undefined) {
    if (seconds <= 0) {
      return undefined;
    }
    return seconds < 1 ? `1/${Math.round(1 / seconds)}` : String(seconds);
  }
  if (typeof value === "string") {
    const trimmed = value.trim().replace(/\s+/g, "");
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
}

function isDmsTriple(value: unknown): value is DmsTriple {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number" &&
    Decimal.isDecimal(value[2])
  );
}

function toDmsTriple(value: unknown): DmsTriple | undefined {
  if (isDmsTriple(value)) {
    return value;
  }
  if (!Array.isArray(value) || value.length !== 3) {
    return undefined;
  }
  const [degrees, minutes, seconds] = value.map(toNumber);
  if (degrees === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }
  return [Math.trunc(degrees), Math.trunc(minutes), new ExactDecimal(seconds)];
}

/**
 * Bring a value into the representation used for its tag kind, or undefined when it
 * has none. Catalog values and values decoded from a file both pass through here so
 * that equal metadata compares equal.
 */
export function coerceTagValue(kind: TagKind, value: unknown): TagValue | undefined {
  switch (kind) {
    case "string": {
      if (typeof value === "string") {
        const text = trimTrailing(value);
        return text.length > 0 ? text : undefined;
      }
      if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
      }
      return value instanceof Date ? formatExifDateTime(value) : undefined;
    }
    case "number":
    case "aperture":
      return toNumber(value);
    case "integer":
      return toInteger(value);
    case "datetime":
      return formatExifDateTime(value);
    case "shutter":
      return formatShutterSpeed(value);
    case "dms":
      return toDmsTriple(value);
    case "ref": {
      const ref = typeof value === "string" ? value.trim().toUpperCase() : "";
      return /^[NSEW]$/.test(ref) ? ref : undefined;
    }
  }
}
