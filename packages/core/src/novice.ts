/**
 * @module novice
 * Beginner-facing entry points.
 *
 * NOTE: Pictures use the Cartesian coordinate system! (0, 0) is bottom-left.
 *
 * @example
 * ```ts
 * const picture = open('sample.png');   // create a picture from a file
 * picture.format;                       // 'png'
 * picture.size;                         // { width: 665, height: 500 }
 * picture.size = { width: 200, height: 250 };  // resizes the pixels
 * picture.modified;                     // true
 * ```
 */

import type { ColorInput, RasterImage, Size } from '@pixel-novice/types';
import { Picture, type PictureOptions } from './picture';

/** Create a picture from the image file at `path`. */
export function open(path: string, options?: PictureOptions): Picture {
  return Picture.fromPath(path, options);
}

/**
 * Create a new picture of the given size, initialized to `color`
 * or to black if none is provided.
 */
export function create(size: Size, color: ColorInput = 'black', options?: PictureOptions): Picture {
  return Picture.fromSize(size, color, options);
}

/** Create an independent picture from another picture or from raw pixel data. */
export function copy(image: Picture | RasterImage, options?: PictureOptions): Picture {
  return image instanceof Picture ? image.copy() : Picture.fromImage(image, options);
}
