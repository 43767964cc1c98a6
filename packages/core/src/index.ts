/**
 * @pixel-novice/core
 *
 * Picture model with Cartesian pixel addressing, region slicing and
 * dirty tracking, plus the default file codec and resampler.
 *
 * @packageDocumentation
 */

// Entry points
export { open, create, copy } from './novice';

// Picture model
export { Picture } from './picture';
export type { PictureOptions, FromGridOptions, PictureSource } from './picture';
export { Pixel } from './pixel';
export type { PixelOwner } from './pixel';

// Index keys
export { range, resolveKey, toSelection } from './index-key';
export type { IndexRequest, Selection, Span } from './index-key';

// Colours
export {
  parseColor,
  validateComponent,
  colorNames,
  createColorNameTable,
  normalizeColorName,
} from './color';

// Errors
export {
  NoviceError,
  InvalidColorError,
  InvalidKeyError,
  IndexOutOfBoundsError,
  InvalidComponentValueError,
  InvalidSizeError,
  ShapeMismatchError,
  DecodeError,
  EncodeError,
} from './errors';
export type { NoviceErrorCode } from './errors';

// Collaborators
export { FileCodec, defaultCodec } from './file-codec';
export type { FileCodecOptions, GridDecoder, GridEncoder } from './file-codec';
export { encodePng, decodePng } from './png-codec';
export { detectFormat, formatFromPath } from './image-format';
export { scaleGrid, createResampler, defaultResampler, inflateGrid } from './resample';
export { createGrid, cloneGrid, gridFromRaster } from './grid';

// Configuration and logging
export { IMAGE_LIMITS, DEFAULT_COLOR, DEFAULT_INTERPOLATION } from './config';
export { Logger, LogLevel } from './logger';
export type { LogSink } from './logger';
