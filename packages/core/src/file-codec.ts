/**
 * @module file-codec
 * {@link Codec} that reads and writes image files on the local file system.
 *
 * Decoding detects the format from the file signature; encoding picks it
 * from the path suffix. PNG is the only format with a built-in
 * encoder/decoder. Writes go to a sibling temporary file that is renamed into
 * place, so a failed save never leaves a half-written image behind.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import type { Codec, DecodedImage, RgbGrid } from '@pixel-novice/types';
import { DecodeError, EncodeError } from './errors';
import { detectFormat, formatFromPath } from './image-format';
import { Logger } from './logger';
import { decodePng, encodePng } from './png-codec';

const log = new Logger('file-codec');

/** Decoder from file bytes to an RGB grid. */
export type GridDecoder = (data: Uint8Array) => RgbGrid;

/** Encoder from an RGB grid to file bytes. */
export type GridEncoder = (grid: RgbGrid) => Uint8Array;

/** Per-format decoders and encoders used by a {@link FileCodec}. */
export interface FileCodecOptions {
  decoders?: Record<string, GridDecoder>;
  encoders?: Record<string, GridEncoder>;
}

let tempCounter = 0;

/** File-system codec backed by per-format decoders and encoders. */
export class FileCodec implements Codec {
  private readonly decoders: Record<string, GridDecoder>;
  private readonly encoders: Record<string, GridEncoder>;

  constructor(options: FileCodecOptions = {}) {
    this.decoders = { png: decodePng, ...options.decoders };
    this.encoders = { png: encodePng, ...options.encoders };
  }

  /** @inheritdoc */
  decode(path: string): DecodedImage {
    let bytes: Uint8Array;
    try {
      bytes = readFileSync(path);
    } catch (err) {
      throw new DecodeError(`Cannot read image file ${path}`, { cause: err });
    }

    const format = detectFormat(bytes);
    if (format === null) {
      throw new DecodeError(`Unrecognized image data in ${path}`);
    }
    const decoder = this.decoders[format];
    if (decoder === undefined) {
      throw new DecodeError(`Decoding ${format} images is not supported (${path})`);
    }

    let grid: RgbGrid;
    try {
      grid = decoder(bytes);
    } catch (err) {
      if (err instanceof DecodeError) throw err;
      throw new DecodeError(`Failed to decode ${format} image ${path}`, { cause: err });
    }

    log.debug(`decoded ${path}`, { format, width: grid.width, height: grid.height });
    return { grid, format };
  }

  /** @inheritdoc */
  encode(grid: RgbGrid, path: string): string {
    const format = formatFromPath(path);
    if (format === null) {
      throw new EncodeError(`Cannot infer an image format from the suffix of ${path}`);
    }
    const encoder = this.encoders[format];
    if (encoder === undefined) {
      throw new EncodeError(`Encoding ${format} images is not supported (${path})`);
    }

    let bytes: Uint8Array;
    try {
      bytes = encoder(grid);
    } catch (err) {
      if (err instanceof EncodeError) throw err;
      throw new EncodeError(`Failed to encode ${format} image ${path}`, { cause: err });
    }

    const tempPath = `${path}.${process.pid}-${tempCounter++}.tmp`;
    try {
      writeFileSync(tempPath, bytes);
      renameSync(tempPath, path);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw new EncodeError(`Cannot write image file ${path}`, { cause: err });
    }

    const written = detectFormat(bytes) ?? format;
    log.debug(`encoded ${path}`, { format: written, width: grid.width, height: grid.height });
    return written;
  }
}

/** Codec used by pictures that are not given one explicitly. */
export const defaultCodec: Codec = new FileCodec();
