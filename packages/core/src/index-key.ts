/**
 * @module index-key
 * Resolution of `[x, y]` index keys into storage selections.
 *
 * A key is validated and classified exactly once, at the API boundary, into
 * one of four {@link IndexRequest} variants. The Cartesian y flip happens
 * here and nowhere else: every span in a request is already expressed in
 * storage coordinates (row 0 at the top).
 *
 * NOTE: Negative indices are rejected, never counted from the end.
 */

import type { Range, Size } from '@pixel-novice/types';
import { IndexOutOfBoundsError, InvalidKeyError } from './errors';

/**
 * Stepped half-open interval over storage rows or columns.
 * `count` is the number of selected indices.
 */
export interface Span {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
  readonly count: number;
}

/** A validated key, classified by shape. */
export type IndexRequest =
  | { readonly kind: 'pixel'; readonly x: number; readonly y: number }
  | { readonly kind: 'row'; readonly y: number; readonly columns: Span }
  | { readonly kind: 'column'; readonly x: number; readonly rows: Span }
  | { readonly kind: 'region'; readonly columns: Span; readonly rows: Span };

/** Storage rows and columns touched by a request. */
export interface Selection {
  readonly columns: Span;
  readonly rows: Span;
}

const RANGE_FIELDS = new Set(['start', 'stop', 'step']);

/**
 * Build a {@link Range}, mirroring slice syntax: `range(2, 5)` is `2:5`,
 * `range(undefined, undefined, 2)` is `::2`, `range()` is `:`.
 */
export function range(start?: number, stop?: number, step?: number): Range {
  const r: Range = {};
  if (start !== undefined) r.start = start;
  if (stop !== undefined) r.stop = stop;
  if (step !== undefined) r.step = step;
  return r;
}

/** Build a {@link Span}. */
export function span(start: number, stop: number, step = 1): Span {
  const count = stop > start ? Math.ceil((stop - start) / step) : 0;
  return { start, stop, step, count };
}

/** Indices selected by a span, in ascending order. */
export function* spanIndices(s: Span): Generator<number> {
  for (let i = 0; i < s.count; i++) {
    yield s.start + i * s.step;
  }
}

function readField(value: object, name: string): unknown {
  return Object.getOwnPropertyDescriptor(value, name)?.value;
}

function isRangeLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkIndex(value: number, extent: number, axis: 'x' | 'y'): number {
  if (!Number.isInteger(value)) {
    throw new InvalidKeyError(`Expected an integer ${axis} index, got ${value}`);
  }
  if (value < 0) {
    throw new IndexOutOfBoundsError('Negative indices not supported');
  }
  if (value >= extent) {
    throw new IndexOutOfBoundsError(`${axis} index ${value} is out of bounds (${axis === 'x' ? 'width' : 'height'} ${extent})`);
  }
  return value;
}

function readBound(value: object, name: 'start' | 'stop'): number | undefined {
  const bound = readField(value, name);
  if (bound === undefined || bound === null) return undefined;
  if (typeof bound !== 'number' || !Number.isInteger(bound)) {
    throw new InvalidKeyError(`Range ${name} must be an integer, got ${String(bound)}`);
  }
  if (bound < 0) {
    throw new IndexOutOfBoundsError('Negative slicing not supported');
  }
  return bound;
}

function readStep(value: object): number {
  const step = readField(value, 'step');
  if (step === undefined || step === null) return 1;
  if (typeof step !== 'number' || !Number.isInteger(step) || step < 1) {
    throw new InvalidKeyError(`Range step must be a positive integer, got ${String(step)}`);
  }
  return step;
}

/**
 * Normalize a range against an axis extent: missing bounds default to the
 * whole axis, bounds past the end clamp to it, and an inverted range is
 * empty. The result is still in the caller's (logical) coordinates.
 */
function normalizeRange(value: object, extent: number): Span {
  for (const key of Object.keys(value)) {
    if (!RANGE_FIELDS.has(key)) {
      throw new InvalidKeyError(`Unknown range field "${key}"`);
    }
  }
  const step = readStep(value);
  const start = Math.min(readBound(value, 'start') ?? 0, extent);
  const stop = Math.max(start, Math.min(readBound(value, 'stop') ?? extent, extent));
  return span(start, stop, step);
}

/**
 * Flip a logical y range into storage rows. The flip is applied to the
 * range as a whole, so the step counts down from the top-most selected row.
 */
function flipRows(logical: Span, height: number): Span {
  return span(height - logical.stop, height - logical.start, logical.step);
}

/**
 * Validate and classify an index key.
 *
 * @param key - `[x, y]`, each axis an integer or a {@link Range}.
 * @param size - Extent of the picture being indexed.
 * @throws {InvalidKeyError} On any other key shape.
 * @throws {IndexOutOfBoundsError} On negative or out-of-range integers, and
 *   on negative range bounds.
 */
export function resolveKey(key: unknown, size: Size): IndexRequest {
  if (!Array.isArray(key) || key.length !== 2) {
    throw new InvalidKeyError('Invalid key type: expected [x, y]');
  }
  const xKey: unknown = key[0];
  const yKey: unknown = key[1];
  const { width, height } = size;

  if (typeof xKey === 'number' && typeof yKey === 'number') {
    return { kind: 'pixel', x: checkIndex(xKey, width, 'x'), y: checkIndex(yKey, height, 'y') };
  }

  if (isRangeLike(xKey) && typeof yKey === 'number') {
    const columns = normalizeRange(xKey, width);
    return { kind: 'row', y: checkIndex(yKey, height, 'y'), columns };
  }

  if (typeof xKey === 'number' && isRangeLike(yKey)) {
    const x = checkIndex(xKey, width, 'x');
    return { kind: 'column', x, rows: flipRows(normalizeRange(yKey, height), height) };
  }

  if (isRangeLike(xKey) && isRangeLike(yKey)) {
    const columns = normalizeRange(xKey, width);
    return { kind: 'region', columns, rows: flipRows(normalizeRange(yKey, height), height) };
  }

  throw new InvalidKeyError('Invalid key type: each axis must be an integer or a range');
}

/** Storage rows and columns selected by a request. */
export function toSelection(request: IndexRequest, size: Size): Selection {
  switch (request.kind) {
    case 'pixel': {
      const row = size.height - request.y - 1;
      return { columns: span(request.x, request.x + 1), rows: span(row, row + 1) };
    }
    case 'row': {
      const row = size.height - request.y - 1;
      return { columns: request.columns, rows: span(row, row + 1) };
    }
    case 'column':
      return { columns: span(request.x, request.x + 1), rows: request.rows };
    case 'region':
      return { columns: request.columns, rows: request.rows };
  }
}
