/**
 * @module pixel
 * A single addressable pixel of a picture.
 *
 * NOTE: Using Cartesian coordinates! (0, 0) is the bottom-left pixel.
 */

import type { ColorInput, Rgb } from '@pixel-novice/types';
import { parseColor, validateComponent } from './color';

/**
 * Storage a {@link Pixel} reads from and writes to.
 * Coordinates are Cartesian; the owner maps them to storage.
 */
export interface PixelOwner {
  /** Current colour at (x, y). */
  readCell(x: number, y: number): Rgb;
  /** Overwrite the colour at (x, y) and mark the owner modified. */
  writeCell(x: number, y: number, rgb: Rgb): void;
}

/**
 * Live handle to one pixel of its owner.
 *
 * A pixel keeps no colour of its own: every read goes to the owner and every
 * write goes straight through to it, so two handles on the same location
 * always agree. A handle is only meaningful until its owner changes size;
 * after that its coordinates are resolved against the new size.
 *
 * Not safe for concurrent mutation; behaviour is undefined if two threads
 * write through handles on the same picture.
 */
export class Pixel {
  constructor(
    private readonly owner: PixelOwner,
    /** Horizontal location (left = 0). */
    readonly x: number,
    /** Vertical location (bottom = 0). */
    readonly y: number,
  ) {}

  /** Gets or sets the red component. */
  get red(): number {
    return this.owner.readCell(this.x, this.y)[0];
  }

  set red(value: number) {
    const [, green, blue] = this.rgb;
    this.owner.writeCell(this.x, this.y, [validateComponent(value), green, blue]);
  }

  /** Gets or sets the green component. */
  get green(): number {
    return this.owner.readCell(this.x, this.y)[1];
  }

  set green(value: number) {
    const [red, , blue] = this.rgb;
    this.owner.writeCell(this.x, this.y, [red, validateComponent(value), blue]);
  }

  /** Gets or sets the blue component. */
  get blue(): number {
    return this.owner.readCell(this.x, this.y)[2];
  }

  set blue(value: number) {
    const [red, green] = this.rgb;
    this.owner.writeCell(this.x, this.y, [red, green, validateComponent(value)]);
  }

  /**
   * Gets the colour as an `[r, g, b]` triple, or sets it from a triple,
   * a `#RRGGBB` string or a colour name (one write for all three components).
   */
  get rgb(): Rgb {
    return this.owner.readCell(this.x, this.y);
  }

  set rgb(value: ColorInput) {
    this.owner.writeCell(this.x, this.y, parseColor(value));
  }

  toString(): string {
    const [red, green, blue] = this.rgb;
    return `Pixel (red: ${red}, green: ${green}, blue: ${blue})`;
  }
}
