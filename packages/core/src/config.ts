/**
 * @module config
 * Library-wide limits and defaults.
 */

import type { InterpolationMethod, Rgb } from '@pixel-novice/types';

/**
 * Image dimension limits, checked whenever a grid is allocated.
 *
 * These constants prevent memory exhaustion when creating, resizing,
 * decoding or inflating images with unreasonably large dimensions.
 */
export const IMAGE_LIMITS = {
  /** Maximum value for image width or height (65536 pixels) */
  MAX_DIMENSION: 65536,
  /** Maximum total pixel count (256 megapixels) */
  MAX_PIXELS: 268435456,
} as const;

/** Fill colour of a new picture when none is given. */
export const DEFAULT_COLOR: Rgb = [0, 0, 0];

/** Resampling used by the default resampler when a picture changes size. */
export const DEFAULT_INTERPOLATION: InterpolationMethod = 'bilinear';

/** Inflation factor of a freshly created or loaded picture. */
export const DEFAULT_INFLATION = 1;
