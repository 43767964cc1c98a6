/**
 * @module grid
 * Raw pixel storage shared between the picture model and its collaborators.
 */

/**
 * Row-major RGB pixel storage.
 *
 * Row 0 is the TOP row, exactly as raster formats lay it out. Cartesian
 * addressing (bottom-left origin) is applied by the picture model, never here.
 */
export interface RgbGrid {
  /** Interleaved RGB bytes. Length must be width * height * 3. */
  data: Uint8Array;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}

/**
 * Interleaved pixel data with either 3 (RGB) or 4 (RGBA) channels,
 * such as a canvas `ImageData` or a decoder's output.
 */
export interface RasterImage {
  /** Pixel data. Length must be width * height * 3 or width * height * 4. */
  data: Uint8Array | Uint8ClampedArray;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}
