/**
 * @module grid
 * Allocation and copying of {@link RgbGrid} storage.
 * Row 0 is the top row; nothing in this module knows about Cartesian space.
 */

import type { RasterImage, Rgb, RgbGrid } from '@pixel-novice/types';
import { IMAGE_LIMITS } from './config';
import { InvalidSizeError } from './errors';

/** Bytes per stored pixel. */
export const CHANNELS = 3;

/**
 * Check that `width` x `height` is an allocatable grid.
 * Zero-sized grids are allowed (an empty region is a valid picture).
 *
 * @throws {InvalidSizeError} On non-integer, negative or oversized dimensions.
 */
export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new InvalidSizeError(`Expected non-negative integer dimensions, got ${width}x${height}`);
  }
  if (width > IMAGE_LIMITS.MAX_DIMENSION || height > IMAGE_LIMITS.MAX_DIMENSION) {
    throw new InvalidSizeError(
      `Dimensions ${width}x${height} exceed the maximum of ${IMAGE_LIMITS.MAX_DIMENSION} pixels per side`,
    );
  }
  if (width * height > IMAGE_LIMITS.MAX_PIXELS) {
    throw new InvalidSizeError(
      `Pixel count ${width * height} exceeds the maximum of ${IMAGE_LIMITS.MAX_PIXELS}`,
    );
  }
}

/**
 * Allocate a grid, optionally filled with one colour (black otherwise).
 */
export function createGrid(width: number, height: number, fill?: Rgb): RgbGrid {
  assertDimensions(width, height);
  const data = new Uint8Array(width * height * CHANNELS);
  if (fill && (fill[0] !== 0 || fill[1] !== 0 || fill[2] !== 0)) {
    for (let i = 0; i < data.length; i += CHANNELS) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
    }
  }
  return { data, width, height };
}

/** Deep copy of a grid. */
export function cloneGrid(grid: RgbGrid): RgbGrid {
  return { data: grid.data.slice(), width: grid.width, height: grid.height };
}

/**
 * Validate that a grid's buffer matches its dimensions.
 * @throws {InvalidSizeError} When it does not.
 */
export function assertGrid(grid: RgbGrid): void {
  assertDimensions(grid.width, grid.height);
  const expected = grid.width * grid.height * CHANNELS;
  if (grid.data.length !== expected) {
    throw new InvalidSizeError(
      `Grid data length (${grid.data.length}) does not match dimensions (${grid.width}x${grid.height}x${CHANNELS} = ${expected})`,
    );
  }
}

/**
 * Convert interleaved RGB or RGBA pixel data into a new grid.
 * Alpha, when present, is discarded.
 *
 * @throws {InvalidSizeError} When the data length fits neither layout.
 */
export function gridFromRaster(image: RasterImage): RgbGrid {
  const { data, width, height } = image;
  assertDimensions(width, height);
  const pixels = width * height;

  if (data.length === pixels * CHANNELS) {
    return { data: Uint8Array.from(data), width, height };
  }
  if (data.length !== pixels * 4) {
    throw new InvalidSizeError(
      `Image data length (${data.length}) matches neither ${width}x${height}x3 nor ${width}x${height}x4`,
    );
  }

  const out = new Uint8Array(pixels * CHANNELS);
  for (let i = 0, o = 0; i < data.length; i += 4, o += CHANNELS) {
    out[o] = data[i];
    out[o + 1] = data[i + 1];
    out[o + 2] = data[i + 2];
  }
  return { data: out, width, height };
}

/** Byte offset of the stored cell at (`row`, `col`), row 0 at the top. */
export function cellOffset(grid: RgbGrid, row: number, col: number): number {
  return (row * grid.width + col) * CHANNELS;
}
