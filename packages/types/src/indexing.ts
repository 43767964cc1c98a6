/**
 * @module indexing
 * Key shapes accepted by `Picture.get` / `Picture.set`.
 *
 * Keys are always `[x, y]` pairs in Cartesian space. Each axis is either a
 * single integer or a {@link Range}.
 */

/**
 * Half-open range along one axis, like a slice: `start` is inclusive,
 * `stop` exclusive. Missing `start` means 0, missing `stop` the full extent,
 * missing `step` means 1.
 */
export interface Range {
  start?: number;
  stop?: number;
  step?: number;
}

/** One axis of an index key. */
export type AxisKey = number | Range;

/** Key addressing exactly one pixel. */
export type PixelKey = readonly [number, number];

/** Key addressing a row, a column, or a rectangular region. */
export type RegionKey = readonly [Range, AxisKey] | readonly [AxisKey, Range];

/** Any key accepted by a picture. */
export type IndexKey = PixelKey | RegionKey;
