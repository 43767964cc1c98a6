/**
 * @module errors
 * Error taxonomy for the picture model.
 *
 * Every error is thrown synchronously at the call that detects it; nothing
 * in the library retries or recovers. Callers can branch on `instanceof` or
 * on the stable `code` string.
 */

/** Stable identifiers carried by every {@link NoviceError}. */
export type NoviceErrorCode =
  | 'INVALID_COLOR'
  | 'INVALID_KEY'
  | 'INDEX_OUT_OF_BOUNDS'
  | 'INVALID_COMPONENT_VALUE'
  | 'INVALID_SIZE'
  | 'SHAPE_MISMATCH'
  | 'DECODE_ERROR'
  | 'ENCODE_ERROR';

/** Base class for all errors raised by pixel-novice. */
export class NoviceError extends Error {
  readonly code: NoviceErrorCode;

  constructor(code: NoviceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NoviceError';
    this.code = code;
  }
}

/** A colour could not be parsed from the given input. */
export class InvalidColorError extends NoviceError {
  constructor(message: string) {
    super('INVALID_COLOR', message);
    this.name = 'InvalidColorError';
  }
}

/** An index key has an unsupported shape. */
export class InvalidKeyError extends NoviceError {
  constructor(message: string) {
    super('INVALID_KEY', message);
    this.name = 'InvalidKeyError';
  }
}

/** A coordinate lies outside the picture, or is negative. */
export class IndexOutOfBoundsError extends NoviceError {
  constructor(message: string) {
    super('INDEX_OUT_OF_BOUNDS', message);
    this.name = 'IndexOutOfBoundsError';
  }
}

/** A colour component is not a number in 0-255. */
export class InvalidComponentValueError extends NoviceError {
  constructor(value: unknown) {
    super('INVALID_COMPONENT_VALUE', `Expected an integer between 0 and 255, but got ${String(value)} instead!`);
    this.name = 'InvalidComponentValueError';
  }
}

/** A size, dimension or inflation factor is unusable. */
export class InvalidSizeError extends NoviceError {
  constructor(message: string) {
    super('INVALID_SIZE', message);
    this.name = 'InvalidSizeError';
  }
}

/** A picture assigned into a region does not have the region's extent. */
export class ShapeMismatchError extends NoviceError {
  constructor(message: string) {
    super('SHAPE_MISMATCH', message);
    this.name = 'ShapeMismatchError';
  }
}

/** An image file could not be read or decoded. */
export class DecodeError extends NoviceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
  }
}

/** An image could not be encoded or written. */
export class EncodeError extends NoviceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENCODE_ERROR', message, options);
    this.name = 'EncodeError';
  }
}
