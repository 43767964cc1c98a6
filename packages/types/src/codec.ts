/**
 * @module codec
 * Contracts for the collaborators the picture model delegates to:
 * file decoding/encoding, resampling, and colour name lookup.
 */

import type { Rgb } from './common';
import type { RgbGrid } from './grid';

/** Result of decoding an image file. */
export interface DecodedImage {
  /** Decoded pixels, top row first. */
  grid: RgbGrid;
  /** Detected file format, e.g. `"png"`. */
  format: string;
}

/**
 * Reads and writes image files.
 *
 * Implementations throw `DecodeError` / `EncodeError` on failure and must not
 * leave a partially written file behind on `encode` failure.
 */
export interface Codec {
  /** Decode the file at `path` (absolute) into an RGB grid. */
  decode(path: string): DecodedImage;
  /**
   * Encode `grid` into the file at `path` (absolute), choosing the format
   * from the path's suffix.
   * @returns The format of the written file.
   */
  encode(grid: RgbGrid, path: string): string;
}

/** Resampling method used when a picture changes size. */
export type InterpolationMethod = 'nearest' | 'bilinear';

/** Resizes RGB grids. Must be deterministic for fixed inputs. */
export interface Resampler {
  /** Return a new grid of the requested size; the input is not modified. */
  resize(grid: RgbGrid, width: number, height: number): RgbGrid;
}

/** Maps colour names to RGB triples. */
export interface ColorNameTable {
  /** Look up a colour by name; `undefined` when the name is unknown. */
  lookup(name: string): Rgb | undefined;
}
