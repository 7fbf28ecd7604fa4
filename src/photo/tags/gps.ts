import { Decimal } from "decimal.js";
import type { DmsTriple } from "./types.js";

/** Wide enough that `angle * 3600` never rounds for any realistic coordinate string. */
export const ExactDecimal = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_DOWN });

export type GpsAxis = "latitude" | "longitude";

/** Parse a catalog coordinate. Returns null for anything that is not a finite decimal. */
export function parseAngle(value: unknown): Decimal | null {
  if (typeof value !== "number" && typeof value !== "string") {
    return null;
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }
  const text = String(value).trim();
  if (!/^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/.test(text)) {
    return null;
  }
  return new ExactDecimal(text);
}

/**
 * Convert a decimal angle to degrees, minutes and seconds of its absolute value.
 * Numbers are read through their shortest decimal representation, so `-33.8688`
 * converts as the literal it was written as.
 */
export function toDms(angle: Decimal.Value): DmsTriple {
  const totalSeconds = new ExactDecimal(angle).abs().times(3600);
  const totalMinutes = totalSeconds.divToInt(60);
  const seconds = totalSeconds.minus(totalMinutes.times(60));
  const degrees = totalMinutes.divToInt(60);
  const minutes = totalMinutes.minus(degrees.times(60));
  return [degrees.toNumber(), minutes.toNumber(), seconds];
}

export function gpsRef(axis: GpsAxis, angle: Decimal.Value): "N" | "S" | "E" | "W" {
  const value = new ExactDecimal(angle);
  const negative = value.isNegative() && !value.isZero();
  if (axis === "latitude") {
    return negative ? "S" : "N";
  }
  return negative ? "W" : "E";
}

export function formatDms([degrees, minutes, seconds]: DmsTriple): string {
  return `${degrees} ${minutes} ${seconds.toString()}`;
}
