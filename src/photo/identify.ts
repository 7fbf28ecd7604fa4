import path from "node:path";
import { validate as uuidValidate, version as uuidVersion } from "uuid";
import type { Prompter } from "./types.js";

export type FilmFrame = {
  film: string;
  frame: string;
};

/**
 * True for a lower-case, hyphenated RFC 4122 version-4 UUID. Braced, upper-case or
 * unhyphenated spellings of a valid id are rejected.
 */
export function isCanonicalUuid(value: unknown): value is string {
  if (typeof value !== "string" || !uuidValidate(value)) {
    return false;
  }
  return uuidVersion(value) === 4 && value === value.toLowerCase();
}

const FILM_FRAME_PATTERN = /^(\d+)-(\d+).*\.jpe?g$/;

/**
 * Guess film and frame ids from a `<film>-<frame>-title.jpg` filename.
 * Only the basename is considered.
 */
export function guessFilmFrame(filename: string): FilmFrame | null {
  const match = FILM_FRAME_PATTERN.exec(path.basename(filename).toLowerCase());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { film: match[1], frame: match[2] };
}

export async function promptFilmFrame(
  prompter: Prompter,
  filename: string,
): Promise<FilmFrame | null> {
  const film = (await prompter.text(`Enter film ID for ${filename}: `)).trim();
  if (!film) {
    return null;
  }
  const frame = (await prompter.text(`Enter frame ID for film ${film}: `)).trim();
  if (!frame) {
    return null;
  }
  return { film, frame };
}
