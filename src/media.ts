/**
 * Extension to MIME type lookups for audio links and cover images
 */

import * as path from "node:path";

/** Audio formats that are turned into an inline player */
export const AUDIO_MIME_TYPES: Readonly<Record<string, string>> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
  ogg: "audio/ogg",
  oga: "audio/ogg",
  opus: "audio/opus",
  m4a: "audio/mp4",
  aac: "audio/aac",
  flac: "audio/flac",
  weba: "audio/webm",
};

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  svg: "image/svg+xml",
  webp: "image/webp",
};

/** Cover images without an extension are assumed to be PNG */
export const DEFAULT_IMAGE_MIME_TYPE = "image/png";

/**
 * Lowercase extension of a link target, without the dot.
 * Query strings and fragments are ignored.
 *
 * @example
 * getExtension('audio/Song.MP3?t=10') // 'mp3'
 * getExtension('notes') // ''
 */
export function getExtension(target: string): string {
  const withoutSuffix = target.split(/[?#]/, 1)[0];
  return path.posix.extname(withoutSuffix).slice(1).toLowerCase();
}

/** MIME type of an audio link target, or null when it is not a known audio format */
export function getAudioMimeType(target: string): string | null {
  const ext = getExtension(target);
  return Object.hasOwn(AUDIO_MIME_TYPES, ext) ? AUDIO_MIME_TYPES[ext] : null;
}

/**
 * MIME type of a cover image from its file extension.
 *
 * @example
 * getImageMimeType('book/cover.jpg') // 'image/jpeg'
 * getImageMimeType('book/cover.tiff') // 'image/tiff'
 * getImageMimeType('book/cover') // 'image/png'
 */
export function getImageMimeType(filePath: string): string {
  const ext = getExtension(filePath);
  if (!ext) return DEFAULT_IMAGE_MIME_TYPE;
  return Object.hasOwn(IMAGE_MIME_TYPES, ext) ? IMAGE_MIME_TYPES[ext] : `image/${ext}`;
}
