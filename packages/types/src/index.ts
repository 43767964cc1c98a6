/**
 * @pixel-novice/types
 *
 * Shared type definitions for pixel-novice.
 * This package contains zero runtime code, only TypeScript interfaces
 * and types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Channel, ColorInput, Rgb, Size } from './common';

// Pixel storage
export type { RasterImage, RgbGrid } from './grid';

// Index keys
export type { AxisKey, IndexKey, PixelKey, Range, RegionKey } from './indexing';

// Collaborators
export type {
  Codec,
  ColorNameTable,
  DecodedImage,
  InterpolationMethod,
  Resampler,
} from './codec';
