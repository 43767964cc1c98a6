/**
 * @module picture
 * Picture model: an RGB image whose pixels are addressed with Cartesian
 * coordinates, (0, 0) being the bottom-left pixel.
 *
 * Storage stays in raster order (row 0 at the top). The y flip is applied in
 * exactly one place per access path: {@link resolveKey} for index keys and
 * {@link Picture.readCell}/{@link Picture.writeCell} for pixel handles.
 *
 * @example
 * ```ts
 * const picture = Picture.fromPath('sample.png');
 * for (const pixel of picture) {
 *   if (pixel.red > 128 && pixel.x < picture.width / 2) {
 *     pixel.red /= 2;               // pixel is an alias into the picture
 *   }
 * }
 * picture.modified;                 // true
 * picture.path;                     // null: no longer matches the file
 * picture.set([range(0, 20), range(0, 20)], 'black');
 * picture.save('sample-dark.png');  // format guessed from the suffix
 * ```
 */

import { resolve } from 'path';
import type {
  Channel,
  Codec,
  ColorInput,
  IndexKey,
  PixelKey,
  RasterImage,
  RegionKey,
  Resampler,
  Rgb,
  RgbGrid,
  Size,
} from '@pixel-novice/types';
import { parseColor, validateComponent } from './color';
import { DEFAULT_COLOR, DEFAULT_INFLATION } from './config';
import { DecodeError, IndexOutOfBoundsError, InvalidSizeError, ShapeMismatchError } from './errors';
import { defaultCodec } from './file-codec';
import { assertGrid, cellOffset, CHANNELS, cloneGrid, createGrid, gridFromRaster } from './grid';
import { resolveKey, type Selection, span, spanIndices, toSelection } from './index-key';
import { Logger } from './logger';
import { Pixel, type PixelOwner } from './pixel';
import { encodePng } from './png-codec';
import { defaultResampler, inflateGrid } from './resample';

const log = new Logger('picture');

/** Collaborators a picture delegates file and resize work to. */
export interface PictureOptions {
  /** Reads and writes image files. Defaults to the built-in file codec. */
  codec?: Codec;
  /** Resizes pixel data. Defaults to bilinear resampling. */
  resampler?: Resampler;
}

/** Options for {@link Picture.fromGrid}. */
export interface FromGridOptions extends PictureOptions {
  /** Copy the grid (default) or take ownership of it as-is. */
  copy?: boolean;
}

/** The ways a picture can be initialized. Exactly one applies per picture. */
export type PictureSource =
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'size'; readonly size: Size; readonly color?: ColorInput }
  | { readonly kind: 'grid'; readonly grid: RgbGrid; readonly copy?: boolean }
  | { readonly kind: 'image'; readonly image: RasterImage };

interface Collaborators {
  readonly codec: Codec;
  readonly resampler: Resampler;
}

const CHANNEL_INDEX: Record<Channel, number> = { red: 0, green: 1, blue: 2 };

/**
 * Validate a requested picture size. Fractional dimensions are truncated.
 * @throws {InvalidSizeError} Unless both dimensions are at least 1.
 */
function normalizeSize(value: unknown): Size {
  if (typeof value === 'object' && value !== null && 'width' in value && 'height' in value) {
    const { width, height } = value;
    if (typeof width === 'number' && typeof height === 'number' && Number.isFinite(width) && Number.isFinite(height)) {
      const size = { width: Math.trunc(width), height: Math.trunc(height) };
      if (size.width >= 1 && size.height >= 1) return size;
    }
  }
  throw new InvalidSizeError(`Expected { width, height } of at least 1x1, but got ${JSON.stringify(value)} instead!`);
}

/** An RGB picture with Cartesian pixel addressing and dirty tracking. */
export class Picture implements PixelOwner, Iterable<Pixel> {
  private grid: RgbGrid;
  private _modified = false;
  private _path: string | null;
  private _format: string | null;
  private _inflation = DEFAULT_INFLATION;

  private constructor(
    grid: RgbGrid,
    private readonly collaborators: Collaborators,
    source: { path: string; format: string } | null = null,
  ) {
    this.grid = grid;
    this._path = source?.path ?? null;
    this._format = source?.format ?? null;
  }

  // ── Construction ──

  /**
   * Create a picture from any {@link PictureSource}.
   * The named factories below are shorthands for this.
   */
  static from(source: PictureSource, options: PictureOptions = {}): Picture {
    const collaborators: Collaborators = {
      codec: options.codec ?? defaultCodec,
      resampler: options.resampler ?? defaultResampler,
    };

    switch (source.kind) {
      case 'path': {
        const path = resolve(source.path);
        const { grid, format } = collaborators.codec.decode(path);
        try {
          assertGrid(grid);
        } catch (err) {
          throw new DecodeError(`Decoded image ${path} has inconsistent dimensions`, { cause: err });
        }
        log.debug(`opened ${path}`, { format, width: grid.width, height: grid.height });
        return new Picture(grid, collaborators, { path, format });
      }
      case 'size': {
        const { width, height } = normalizeSize(source.size);
        const color = source.color === undefined ? DEFAULT_COLOR : parseColor(source.color);
        return new Picture(createGrid(width, height, color), collaborators);
      }
      case 'grid': {
        assertGrid(source.grid);
        const grid = source.copy === false ? source.grid : cloneGrid(source.grid);
        return new Picture(grid, collaborators);
      }
      case 'image':
        return new Picture(gridFromRaster(source.image), collaborators);
    }
  }

  /** Open the image file at `path`. */
  static fromPath(path: string, options?: PictureOptions): Picture {
    return Picture.from({ kind: 'path', path }, options);
  }

  /** Create a `size` picture filled with `color` (black by default). */
  static fromSize(size: Size, color?: ColorInput, options?: PictureOptions): Picture {
    return Picture.from({ kind: 'size', size, color }, options);
  }

  /** Create a `size` picture filled with `color`. */
  static fromColor(color: ColorInput, size: Size, options?: PictureOptions): Picture {
    return Picture.from({ kind: 'size', size, color }, options);
  }

  /** Create a picture from raw storage (top row first). */
  static fromGrid(grid: RgbGrid, options: FromGridOptions = {}): Picture {
    const { copy, ...rest } = options;
    return Picture.from({ kind: 'grid', grid, copy }, rest);
  }

  /** Create a picture from interleaved RGB or RGBA pixels; alpha is dropped. */
  static fromImage(image: RasterImage, options?: PictureOptions): Picture {
    return Picture.from({ kind: 'image', image }, options);
  }

  // ── Metadata ──

  /** Absolute path of the file this picture matches, or null when it matches none. */
  get path(): string | null {
    return this._path;
  }

  /** Format of the file at {@link path} (e.g. `"png"`), or null. */
  get format(): string | null {
    return this._format;
  }

  /** Whether the pixels changed since the picture was loaded, created or saved. */
  get modified(): boolean {
    return this._modified;
  }

  /**
   * Gets or sets the size. Setting a different size resamples the pixels;
   * setting the current size does nothing.
   */
  get size(): Size {
    return { width: this.grid.width, height: this.grid.height };
  }

  set size(value: Size) {
    const { width, height } = normalizeSize(value);
    if (width === this.grid.width && height === this.grid.height) return;

    const resized = this.collaborators.resampler.resize(this.grid, width, height);
    assertGrid(resized);
    if (resized.width !== width || resized.height !== height) {
      throw new InvalidSizeError(
        `Resampler returned ${resized.width}x${resized.height}, expected ${width}x${height}`,
      );
    }
    log.debug('resized', { from: this.size, to: { width, height } });
    this.grid = resized;
    this.markModified();
  }

  /** Gets or sets the width; the height is kept as is. */
  get width(): number {
    return this.grid.width;
  }

  set width(value: number) {
    this.size = { width: value, height: this.grid.height };
  }

  /** Gets or sets the height; the width is kept as is. */
  get height(): number {
    return this.grid.height;
  }

  set height(value: number) {
    this.size = { width: this.grid.width, height: value };
  }

  /**
   * Gets or sets the inflation factor: each pixel is exported as an N x N
   * block by {@link save} and {@link toPng}. The pixels themselves never change.
   */
  get inflation(): number {
    return this._inflation;
  }

  set inflation(value: number) {
    const factor = typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : NaN;
    if (!(factor >= 1)) {
      throw new InvalidSizeError('Expected inflation factor to be an integer greater than zero');
    }
    this._inflation = factor;
  }

  // ── Indexing ──

  /**
   * Gets a pixel or a copy of a region.
   *
   * Examples:
   *   pic.get([0, 0])                              // bottom-left pixel
   *   pic.get([range(), pic.height - 1])           // top row
   *   pic.get([range(0, 10, 2), range(0, 10, 2)])  // every other pixel
   *
   * Regions are independent copies: changing one never changes the other.
   *
   * @throws {InvalidKeyError} When the key is not `[x, y]` of integers/ranges.
   * @throws {IndexOutOfBoundsError} On negative or out-of-range indices.
   */
  get(key: PixelKey): Pixel;
  get(key: RegionKey): Picture;
  get(key: IndexKey): Pixel | Picture;
  get(key: IndexKey): Pixel | Picture {
    const size = this.size;
    const request = resolveKey(key, size);
    if (request.kind === 'pixel') {
      return new Pixel(this, request.x, request.y);
    }
    return this.extract(toSelection(request, size));
  }

  /**
   * Sets a pixel or a region to a colour, to another pixel's colour, or to
   * the pixels of a picture with exactly the region's size.
   *
   * Examples:
   *   pic.set([0, 0], [0, 0, 0])                     // bottom-left pixel black
   *   pic.set([range(), pic.height - 1], 'red')      // top row red
   *   pic.set([range(5), range()], other.get(...))   // paste a region
   *
   * @throws {ShapeMismatchError} When a picture does not fit the region.
   */
  set(key: IndexKey, value: ColorInput | Pixel | Picture): void {
    const size = this.size;
    const selection = toSelection(resolveKey(key, size), size);

    if (value instanceof Picture) {
      this.paste(selection, value);
    } else {
      this.fillSelection(selection, value instanceof Pixel ? value.rgb : parseColor(value));
    }
    this.markModified();
  }

  /** Iterates over every pixel: all y for x = 0, then all y for x = 1, and so on. */
  *[Symbol.iterator](): Generator<Pixel> {
    const { width, height } = this.grid;
    for (let x = 0; x < width; x++) {
      for (let y = 0; y < height; y++) {
        yield new Pixel(this, x, y);
      }
    }
  }

  // ── Whole-picture operations ──

  /** One component of every pixel, in storage order (top row first). */
  channel(name: Channel): Uint8Array {
    const offset = CHANNEL_INDEX[name];
    const { data } = this.grid;
    const out = new Uint8Array(data.length / CHANNELS);
    for (let i = 0; i < out.length; i++) {
      out[i] = data[i * CHANNELS + offset];
    }
    return out;
  }

  /** Set one component of every pixel. */
  setChannel(name: Channel, value: number): void {
    const component = validateComponent(value);
    const offset = CHANNEL_INDEX[name];
    const { data } = this.grid;
    for (let i = offset; i < data.length; i += CHANNELS) {
      data[i] = component;
    }
    this.markModified();
  }

  /** Set every pixel to `color`. */
  fill(color: ColorInput): void {
    const rgb = parseColor(color);
    this.fillSelection({ columns: span(0, this.width), rows: span(0, this.height) }, rgb);
    this.markModified();
  }

  /** Independent copy of the pixels, with no file metadata. */
  copy(): Picture {
    return new Picture(cloneGrid(this.grid), this.collaborators);
  }

  /** Copy of the raw storage (top row first). */
  toGrid(): RgbGrid {
    return cloneGrid(this.grid);
  }

  // ── Files ──

  /**
   * Save to `path`, guessing the format from its suffix. On success the
   * picture is no longer modified and matches the new file; on failure
   * nothing about the picture changes.
   */
  save(path: string): void {
    const absolute = resolve(path);
    let format: string;
    try {
      format = this.collaborators.codec.encode(inflateGrid(this.grid, this._inflation), absolute);
    } catch (err) {
      log.warn(`save to ${absolute} failed`, err);
      throw err;
    }

    this._modified = false;
    this._path = absolute;
    this._format = format;
    log.debug(`saved ${absolute}`, { format, inflation: this._inflation });
  }

  /** In-memory PNG of the picture, with inflation applied. */
  toPng(): Uint8Array {
    return encodePng(inflateGrid(this.grid, this._inflation));
  }

  toString(): string {
    return `Picture (format: ${this._format}, path: ${this._path}, modified: ${this._modified})`;
  }

  // ── Pixel storage (PixelOwner) ──

  /** @internal Colour at Cartesian (x, y). */
  readCell(x: number, y: number): Rgb {
    const offset = this.offsetOf(x, y);
    const { data } = this.grid;
    return [data[offset], data[offset + 1], data[offset + 2]];
  }

  /** @internal Overwrite the colour at Cartesian (x, y). */
  writeCell(x: number, y: number, rgb: Rgb): void {
    const red = validateComponent(rgb[0]);
    const green = validateComponent(rgb[1]);
    const blue = validateComponent(rgb[2]);
    const offset = this.offsetOf(x, y);
    const { data } = this.grid;
    data[offset] = red;
    data[offset + 1] = green;
    data[offset + 2] = blue;
    this.markModified();
  }

  // ── Internals ──

  /**
   * Storage offset of Cartesian (x, y).
   * NOTE: Using Cartesian coordinate system!
   */
  private offsetOf(x: number, y: number): number {
    const { width, height } = this.grid;
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
      throw new IndexOutOfBoundsError(`Pixel (${x}, ${y}) is outside the ${width}x${height} picture`);
    }
    return cellOffset(this.grid, height - y - 1, x);
  }

  /** Modified pictures lose their file metadata. */
  private markModified(): void {
    this._modified = true;
    this._path = null;
    this._format = null;
  }

  private extract(selection: Selection): Picture {
    const { columns, rows } = selection;
    const out = createGrid(columns.count, rows.count);
    let o = 0;
    for (const row of spanIndices(rows)) {
      for (const col of spanIndices(columns)) {
        const src = cellOffset(this.grid, row, col);
        out.data[o] = this.grid.data[src];
        out.data[o + 1] = this.grid.data[src + 1];
        out.data[o + 2] = this.grid.data[src + 2];
        o += CHANNELS;
      }
    }
    return new Picture(out, this.collaborators);
  }

  private fillSelection(selection: Selection, rgb: Rgb): void {
    const { data } = this.grid;
    for (const row of spanIndices(selection.rows)) {
      for (const col of spanIndices(selection.columns)) {
        const offset = cellOffset(this.grid, row, col);
        data[offset] = rgb[0];
        data[offset + 1] = rgb[1];
        data[offset + 2] = rgb[2];
      }
    }
  }

  private paste(selection: Selection, source: Picture): void {
    const { columns, rows } = selection;
    if (source.width !== columns.count || source.height !== rows.count) {
      throw new ShapeMismatchError(
        `Cannot assign a ${source.width}x${source.height} picture to a ${columns.count}x${rows.count} region`,
      );
    }

    // Pasting a picture into itself must read the pixels as they were before
    const src = source === this ? this.grid.data.slice() : source.grid.data;
    const { data } = this.grid;
    let s = 0;
    for (const row of spanIndices(rows)) {
      for (const col of spanIndices(columns)) {
        const offset = cellOffset(this.grid, row, col);
        data[offset] = src[s];
        data[offset + 1] = src[s + 1];
        data[offset + 2] = src[s + 2];
        s += CHANNELS;
      }
    }
  }
}
