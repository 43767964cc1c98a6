/**
 * @module resample
 * Grid resampling: resizing with interpolation, and integer inflation for
 * export. All functions create a new grid and do NOT modify the input.
 */

import type { InterpolationMethod, Resampler, Rgb, RgbGrid } from '@pixel-novice/types';
import { DEFAULT_INTERPOLATION } from './config';
import { InvalidSizeError } from './errors';
import { assertDimensions, CHANNELS } from './grid';

/**
 * Bilinear interpolation sample at fractional coordinates.
 * @param grid - Source grid.
 * @param x - X coordinate (can be fractional).
 * @param y - Y coordinate (can be fractional).
 * @returns [r, g, b] pixel values.
 */
export function bilinearSample(grid: RgbGrid, x: number, y: number): Rgb {
  const { width, height, data } = grid;
  const x0 = Math.floor(x);
  const y0 = Math.floor(y);
  const x1 = Math.max(0, Math.min(x0 + 1, width - 1));
  const y1 = Math.max(0, Math.min(y0 + 1, height - 1));
  const fx = x - x0;
  const fy = y - y0;
  const cx0 = Math.max(0, Math.min(x0, width - 1));
  const cy0 = Math.max(0, Math.min(y0, height - 1));

  const i00 = (cy0 * width + cx0) * CHANNELS;
  const i10 = (cy0 * width + x1) * CHANNELS;
  const i01 = (y1 * width + cx0) * CHANNELS;
  const i11 = (y1 * width + x1) * CHANNELS;

  const result: [number, number, number] = [0, 0, 0];
  for (let c = 0; c < CHANNELS; c++) {
    const v00 = data[i00 + c];
    const v10 = data[i10 + c];
    const v01 = data[i01 + c];
    const v11 = data[i11 + c];
    const top = v00 + (v10 - v00) * fx;
    const bottom = v01 + (v11 - v01) * fx;
    result[c] = Math.round(top + (bottom - top) * fy);
  }
  return result;
}

/**
 * Nearest-neighbor sample.
 * @param grid - Source grid.
 * @param x - X coordinate.
 * @param y - Y coordinate.
 * @returns [r, g, b] pixel values.
 */
export function nearestSample(grid: RgbGrid, x: number, y: number): Rgb {
  const { width, height, data } = grid;
  const px = Math.max(0, Math.min(width - 1, Math.round(x)));
  const py = Math.max(0, Math.min(height - 1, Math.round(y)));
  const idx = (py * width + px) * CHANNELS;
  return [data[idx], data[idx + 1], data[idx + 2]];
}

/**
 * Scale (resize) a grid with interpolation.
 * @param grid - Source grid; must not be empty.
 * @param newWidth - Target width.
 * @param newHeight - Target height.
 * @param method - Interpolation method.
 * @returns Scaled grid.
 */
export function scaleGrid(
  grid: RgbGrid,
  newWidth: number,
  newHeight: number,
  method: InterpolationMethod = DEFAULT_INTERPOLATION,
): RgbGrid {
  assertDimensions(newWidth, newHeight);
  const { width, height } = grid;
  const dst = new Uint8Array(newWidth * newHeight * CHANNELS);
  if (width === 0 || height === 0) {
    return { data: dst, width: newWidth, height: newHeight };
  }

  const sample = method === 'bilinear' ? bilinearSample : nearestSample;
  const sx = width / newWidth;
  const sy = height / newHeight;

  for (let y = 0; y < newHeight; y++) {
    for (let x = 0; x < newWidth; x++) {
      const srcX = (x + 0.5) * sx - 0.5;
      const srcY = (y + 0.5) * sy - 0.5;
      const [r, g, b] = sample(grid, srcX, srcY);
      const idx = (y * newWidth + x) * CHANNELS;
      dst[idx] = r; dst[idx + 1] = g; dst[idx + 2] = b;
    }
  }
  return { data: dst, width: newWidth, height: newHeight };
}

/** Build a {@link Resampler} that always uses `method`. */
export function createResampler(method: InterpolationMethod = DEFAULT_INTERPOLATION): Resampler {
  return {
    resize: (grid, width, height) => scaleGrid(grid, width, height, method),
  };
}

/** Resampler used by pictures that are not given one explicitly. */
export const defaultResampler: Resampler = createResampler();

/**
 * Blow every pixel up into a `factor` x `factor` block.
 * Returns the input itself when `factor` is 1.
 *
 * @throws {InvalidSizeError} When `factor` is not a positive integer, or the
 *   result would exceed the image limits.
 */
export function inflateGrid(grid: RgbGrid, factor: number): RgbGrid {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new InvalidSizeError(`Expected inflation factor to be a positive integer, got ${factor}`);
  }
  if (factor === 1) return grid;

  const width = grid.width * factor;
  const height = grid.height * factor;
  assertDimensions(width, height);

  const dst = new Uint8Array(width * height * CHANNELS);
  const srcRowBytes = grid.width * CHANNELS;
  const dstRowBytes = width * CHANNELS;

  for (let row = 0; row < grid.height; row++) {
    // Build the first inflated scanline for this source row, then repeat it
    const first = row * factor * dstRowBytes;
    for (let col = 0; col < grid.width; col++) {
      const src = row * srcRowBytes + col * CHANNELS;
      for (let k = 0; k < factor; k++) {
        const dstIdx = first + (col * factor + k) * CHANNELS;
        dst[dstIdx] = grid.data[src];
        dst[dstIdx + 1] = grid.data[src + 1];
        dst[dstIdx + 2] = grid.data[src + 2];
      }
    }
    for (let k = 1; k < factor; k++) {
      dst.copyWithin(first + k * dstRowBytes, first, first + dstRowBytes);
    }
  }
  return { data: dst, width, height };
}
