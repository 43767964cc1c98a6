/**
 * @module common
 * Common primitive types used across all packages.
 */

/** RGB triple with 0-255 integer channels, in red, green, blue order. */
export type Rgb = readonly [number, number, number];

/**
 * Anything that can be turned into an {@link Rgb}:
 * an `[r, g, b]` triple, a `#RRGGBB` hex string, or a colour name
 * such as `"red"` or `"light blue"`.
 */
export type ColorInput = Rgb | readonly number[] | string;

/** Name of a single colour component. */
export type Channel = 'red' | 'green' | 'blue';

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}
