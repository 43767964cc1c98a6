/**
 * @module color
 * Colour parsing shared by picture creation, region fills and pixel writes.
 * All components are integers in the range 0-255.
 */

import type { ColorNameTable, Rgb } from '@pixel-novice/types';
import { InvalidColorError, InvalidComponentValueError } from './errors';
import namedColors from './color-names.json';

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

/** Fold "Light Blue", "light_blue" and "lightblue" onto the same key. */
export function normalizeColorName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, '');
}

/**
 * Build a {@link ColorNameTable} from a plain `name -> [r, g, b]` record.
 * Names are normalized with {@link normalizeColorName}.
 */
export function createColorNameTable(entries: Record<string, readonly number[]>): ColorNameTable {
  const table = new Map<string, Rgb>();
  for (const [name, value] of Object.entries(entries)) {
    if (value.length !== 3) {
      throw new InvalidColorError(`Colour "${name}" must have exactly three components`);
    }
    table.set(normalizeColorName(name), [
      validateComponent(value[0]),
      validateComponent(value[1]),
      validateComponent(value[2]),
    ]);
  }
  return {
    lookup: (name) => table.get(normalizeColorName(name)),
  };
}

/** The CSS named colours ("red", "cornflowerblue", "light blue", ...). */
export const colorNames: ColorNameTable = createColorNameTable(namedColors);

/**
 * Validate a single colour component.
 *
 * Numbers are truncated toward zero before the range check, so `1.1`
 * becomes `1` and `255.9` becomes `255`. Anything that is not a finite
 * number is rejected.
 *
 * @throws {InvalidComponentValueError} When the value is not a number in 0-255.
 */
export function validateComponent(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidComponentValueError(value);
  }
  // `|| 0` folds -0 (from truncating e.g. -0.5) into 0
  const truncated = Math.trunc(value) || 0;
  if (truncated < 0 || truncated > 255) {
    throw new InvalidComponentValueError(value);
  }
  return truncated;
}

/**
 * Convert a colour name, `#RRGGBB` hex string or `[r, g, b]` triple to an
 * {@link Rgb}.
 *
 * @param input - Colour to parse. Typed as `unknown` so untyped callers get
 *   the same validation as typed ones.
 * @param names - Table used for colour names.
 * @throws {InvalidColorError} When the input has the wrong shape, is a
 *   malformed hex string or an unknown name.
 * @throws {InvalidComponentValueError} When a triple component is out of range.
 *
 * @example
 * ```ts
 * parseColor('#ff8000');     // [255, 128, 0]
 * parseColor('navy');        // [0, 0, 128]
 * parseColor([1.5, 2, 3]);   // [1, 2, 3]
 * ```
 */
export function parseColor(input: unknown, names: ColorNameTable = colorNames): Rgb {
  if (Array.isArray(input)) {
    if (input.length !== 3) {
      throw new InvalidColorError('Color tuple must be of the form [r, g, b]');
    }
    return [validateComponent(input[0]), validateComponent(input[1]), validateComponent(input[2])];
  }

  if (typeof input === 'string') {
    if (input.startsWith('#')) {
      if (!HEX_COLOR.test(input)) {
        throw new InvalidColorError(`Expected #RRGGBB, got: ${input}`);
      }
      return [
        parseInt(input.slice(1, 3), 16),
        parseInt(input.slice(3, 5), 16),
        parseInt(input.slice(5, 7), 16),
      ];
    }

    const named = names.lookup(input);
    if (named === undefined) {
      throw new InvalidColorError(`Expected color name or #RRGGBB, got: ${input}`);
    }
    return named;
  }

  throw new InvalidColorError(`Expected [r, g, b] or string, got: ${String(input)}`);
}
