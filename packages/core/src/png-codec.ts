/**
 * @module png-codec
 * Minimal PNG encoder/decoder using fflate for the zlib streams.
 * Pure JS, no browser APIs required.
 *
 * Encodes 8-bit RGB. Decodes 8-bit greyscale, greyscale+alpha, RGB, RGBA
 * and palette images without interlacing; alpha is dropped on decode.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { RgbGrid } from '@pixel-novice/types';
import { assertDimensions, assertGrid, CHANNELS } from './grid';
import { DecodeError, EncodeError } from './errors';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

/** PNG signature: 8 bytes. */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Colour types from the IHDR chunk. */
const ColorType = {
  GREYSCALE: 0,
  RGB: 2,
  PALETTE: 3,
  GREYSCALE_ALPHA: 4,
  RGBA: 6,
} as const;

/** Bytes per pixel for each supported 8-bit colour type. */
const BYTES_PER_PIXEL: Record<number, number> = {
  [ColorType.GREYSCALE]: 1,
  [ColorType.RGB]: 3,
  [ColorType.PALETTE]: 1,
  [ColorType.GREYSCALE_ALPHA]: 2,
  [ColorType.RGBA]: 4,
};

/** Write one chunk (length, type, data, crc) at `offset`; returns the new offset. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  offset += 4;
  const typeStart = offset;
  for (let i = 0; i < 4; i++) {
    out[offset + i] = type.charCodeAt(i);
  }
  offset += 4;
  out.set(data, offset);
  offset += data.length;
  write32(out, offset, crc32(out, typeStart, offset));
  return offset + 4;
}

/**
 * Encodes an RGB grid as a PNG file.
 * Uses filter type 0 (None) for simplicity.
 *
 * @param grid - The grid to encode.
 * @returns PNG file data.
 * @throws {EncodeError} When the grid is empty or inconsistent.
 */
export function encodePng(grid: RgbGrid): Uint8Array {
  const { data, width, height } = grid;

  try {
    assertGrid(grid);
  } catch (err) {
    throw new EncodeError('Cannot encode an inconsistent grid as PNG', { cause: err });
  }
  if (width === 0 || height === 0) {
    throw new EncodeError(`Cannot encode an empty ${width}x${height} image as PNG`);
  }

  // Build raw scanlines with filter byte 0 (None) prepended to each row
  const rowBytes = width * CHANNELS;
  const rawData = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    rawData[y * (1 + rowBytes)] = 0; // filter: None
    rawData.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }

  const compressed = zlibSync(rawData);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = ColorType.RGB;
  ihdr[10] = 0; // compression method
  ihdr[11] = 0; // filter method
  ihdr[12] = 0; // interlace method

  // signature + 3 chunks of (length + type + crc = 12 bytes) + payloads
  const out = new Uint8Array(8 + 12 + ihdr.length + 12 + compressed.length + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = 8;
  offset = writeChunk(out, offset, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));

  return out;
}

/** True when `data` starts with the PNG signature. */
export function isPng(data: Uint8Array): boolean {
  if (data.length < PNG_SIGNATURE.length) return false;
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (data[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Decodes a PNG file into an RGB grid.
 * Supports filter types 0-4 (None, Sub, Up, Average, Paeth).
 *
 * @param png - PNG file data.
 * @returns Decoded grid, top row first.
 * @throws {DecodeError} On malformed or unsupported input.
 */
export function decodePng(png: Uint8Array): RgbGrid {
  if (!isPng(png)) {
    throw new DecodeError('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let colorType = -1;
  let palette: Uint8Array | null = null;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    offset += 4;
    const typeStr = String.fromCharCode(png[offset], png[offset + 1], png[offset + 2], png[offset + 3]);
    offset += 4;

    if (offset + length + 4 > png.length) {
      throw new DecodeError(`Truncated PNG chunk ${typeStr}`);
    }

    if (typeStr === 'IHDR') {
      width = read32(png, offset);
      height = read32(png, offset + 4);
      const bitDepth = png[offset + 8];
      colorType = png[offset + 9];
      const interlace = png[offset + 12];

      if (bitDepth !== 8 || BYTES_PER_PIXEL[colorType] === undefined) {
        throw new DecodeError(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}. Only 8-bit images are supported.`,
        );
      }
      if (interlace !== 0) {
        throw new DecodeError('Interlaced PNG images are not supported');
      }
    } else if (typeStr === 'PLTE') {
      palette = png.slice(offset, offset + length);
    } else if (typeStr === 'IDAT') {
      idatChunks.push(png.slice(offset, offset + length));
    } else if (typeStr === 'IEND') {
      break;
    }

    offset += length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0) {
    throw new DecodeError('PNG missing IHDR chunk');
  }
  try {
    assertDimensions(width, height);
  } catch (err) {
    throw new DecodeError(`PNG dimensions ${width}x${height} are too large`, { cause: err });
  }
  if (colorType === ColorType.PALETTE && palette === null) {
    throw new DecodeError('Palette PNG missing PLTE chunk');
  }

  // Concatenate IDAT chunks and inflate
  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  let rawData: Uint8Array;
  try {
    rawData = unzlibSync(combined);
  } catch (err) {
    throw new DecodeError('Corrupt PNG image data', { cause: err });
  }

  const bpp = BYTES_PER_PIXEL[colorType];
  const rowBytes = width * bpp;
  if (rawData.length < height * (1 + rowBytes)) {
    throw new DecodeError('PNG image data is shorter than its dimensions require');
  }
  const pixels = unfilter(rawData, width, height, bpp);
  return toRgb(pixels, width, height, colorType, palette);
}

/** Reverse the per-scanline filters into packed pixel bytes. */
function unfilter(rawData: Uint8Array, width: number, height: number, bpp: number): Uint8Array {
  const rowBytes = width * bpp;
  const data = new Uint8Array(width * height * bpp);

  for (let y = 0; y < height; y++) {
    const filterType = rawData[y * (1 + rowBytes)];
    const scanlineOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      let a = 0; // left pixel
      let b = 0; // above pixel
      let c = 0; // above-left pixel

      if (x >= bpp) {
        a = data[outOffset + x - bpp];
      }
      if (y > 0) {
        b = data[outOffset - rowBytes + x];
      }
      if (x >= bpp && y > 0) {
        c = data[outOffset - rowBytes + x - bpp];
      }

      let reconstructed: number;
      switch (filterType) {
        case 0: // None
          reconstructed = raw;
          break;
        case 1: // Sub
          reconstructed = (raw + a) & 0xff;
          break;
        case 2: // Up
          reconstructed = (raw + b) & 0xff;
          break;
        case 3: // Average
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new DecodeError(`Unsupported PNG filter type: ${filterType}`);
      }

      data[outOffset + x] = reconstructed;
    }
  }

  return data;
}

/** Expand packed pixels of any supported colour type to RGB. */
function toRgb(
  pixels: Uint8Array,
  width: number,
  height: number,
  colorType: number,
  palette: Uint8Array | null,
): RgbGrid {
  const count = width * height;
  const out = new Uint8Array(count * CHANNELS);

  for (let i = 0; i < count; i++) {
    const o = i * CHANNELS;
    switch (colorType) {
      case ColorType.GREYSCALE:
        out[o] = out[o + 1] = out[o + 2] = pixels[i];
        break;
      case ColorType.GREYSCALE_ALPHA:
        out[o] = out[o + 1] = out[o + 2] = pixels[i * 2];
        break;
      case ColorType.RGB:
        out[o] = pixels[i * 3];
        out[o + 1] = pixels[i * 3 + 1];
        out[o + 2] = pixels[i * 3 + 2];
        break;
      case ColorType.RGBA:
        out[o] = pixels[i * 4];
        out[o + 1] = pixels[i * 4 + 1];
        out[o + 2] = pixels[i * 4 + 2];
        break;
      case ColorType.PALETTE: {
        const entry = pixels[i] * 3;
        if (palette === null || entry + 2 >= palette.length) {
          throw new DecodeError(`Palette index ${pixels[i]} out of range`);
        }
        out[o] = palette[entry];
        out[o + 1] = palette[entry + 1];
        out[o + 2] = palette[entry + 2];
        break;
      }
      default:
        throw new DecodeError(`Unsupported PNG colour type: ${colorType}`);
    }
  }

  return { data: out, width, height };
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
