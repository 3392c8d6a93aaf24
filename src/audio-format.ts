// Interview Assistant Bot - Audio container formats

import type { AudioFormat } from "./types.js";
import { UnsupportedFormatError } from "./errors.js";

const MIME_TO_FORMAT: ReadonlyMap<string, AudioFormat> = new Map([
  ["audio/mpeg", "mp3"],
  ["audio/ogg", "ogg"],
  ["audio/mp4", "m4a"],
  ["audio/x-m4a", "m4a"],
  ["audio/wav", "wav"],
]);

/**
 * Maps a MIME type to the container extension used for the temp file and
 * the upload name. Matching is exact; parameters such as `; codecs=opus` are
 * not stripped.
 *
 * @throws UnsupportedFormatError for anything outside the accepted set.
 */
export function resolveAudioFormat(mimeType: string | null): AudioFormat {
  const format = mimeType === null ? undefined : MIME_TO_FORMAT.get(mimeType);
  if (!format) {
    throw new UnsupportedFormatError(mimeType);
  }
  return format;
}

/** MIME type sent alongside the upload for a given container. */
export function mimeTypeFor(format: AudioFormat): string {
  switch (format) {
    case "mp3":
      return "audio/mpeg";
    case "ogg":
      return "audio/ogg";
    case "m4a":
      return "audio/mp4";
    case "wav":
      return "audio/wav";
  }
}
