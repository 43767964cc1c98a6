/**
 * @module image-format
 * Image format detection from file signatures and path suffixes.
 */

import { extname } from 'path';
import { isPng } from './png-codec';

function startsWith(data: Uint8Array, bytes: readonly number[], offset = 0): boolean {
  if (data.length < offset + bytes.length) return false;
  return bytes.every((b, i) => data[offset + i] === b);
}

function startsWithAscii(data: Uint8Array, text: string, offset = 0): boolean {
  return startsWith(data, Array.from(text, (ch) => ch.charCodeAt(0)), offset);
}

/**
 * Detect an image format from the first bytes of a file.
 *
 * @returns `"png"`, `"jpeg"`, `"gif"`, `"bmp"`, `"webp"` or `"tiff"`, or
 *   null when the signature is not recognized.
 */
export function detectFormat(data: Uint8Array): string | null {
  if (isPng(data)) return 'png';
  if (startsWith(data, [0xff, 0xd8, 0xff])) return 'jpeg';
  if (startsWithAscii(data, 'GIF87a') || startsWithAscii(data, 'GIF89a')) return 'gif';
  if (startsWithAscii(data, 'BM')) return 'bmp';
  if (startsWithAscii(data, 'RIFF') && startsWithAscii(data, 'WEBP', 8)) return 'webp';
  if (startsWithAscii(data, 'II*\0') || startsWithAscii(data, 'MM\0*')) return 'tiff';
  return null;
}

const SUFFIX_FORMATS: Record<string, string> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.gif': 'gif',
  '.bmp': 'bmp',
  '.webp': 'webp',
  '.tif': 'tiff',
  '.tiff': 'tiff',
};

/**
 * Guess an image format from a path's suffix (case-insensitive).
 * @returns The format name, or null for an unknown or missing suffix.
 */
export function formatFromPath(path: string): string | null {
  return SUFFIX_FORMATS[extname(path).toLowerCase()] ?? null;
}
