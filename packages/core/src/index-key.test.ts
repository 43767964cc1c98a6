import { describe, expect, it } from 'vitest';
import { range, resolveKey, span, spanIndices, toSelection } from './index-key';
import { IndexOutOfBoundsError, InvalidKeyError } from './errors';

const size = { width: 10, height: 4 };

describe('range', () => {
  it('only sets the bounds it is given', () => {
    expect(range()).toEqual({});
    expect(range(2)).toEqual({ start: 2 });
    expect(range(undefined, 5)).toEqual({ stop: 5 });
    expect(range(1, 9, 2)).toEqual({ start: 1, stop: 9, step: 2 });
  });
});

describe('span', () => {
  it('counts stepped indices', () => {
    expect(span(0, 10)).toEqual({ start: 0, stop: 10, step: 1, count: 10 });
    expect(span(1, 8, 3).count).toBe(3);
    expect(span(5, 5).count).toBe(0);
    expect(span(6, 2).count).toBe(0);
  });

  it('enumerates its indices', () => {
    expect([...spanIndices(span(1, 8, 3))]).toEqual([1, 4, 7]);
    expect([...spanIndices(span(3, 3))]).toEqual([]);
  });
});

describe('resolveKey', () => {
  it('classifies integer pairs as single pixels', () => {
    expect(resolveKey([2, 3], size)).toEqual({ kind: 'pixel', x: 2, y: 3 });
  });

  it('rejects pixels outside the picture', () => {
    expect(() => resolveKey([10, 0], size)).toThrow(IndexOutOfBoundsError);
    expect(() => resolveKey([0, 4], size)).toThrow(IndexOutOfBoundsError);
  });

  it('rejects negative indices instead of counting from the end', () => {
    expect(() => resolveKey([-1, 0], size)).toThrow('Negative indices not supported');
    expect(() => resolveKey([0, -1], size)).toThrow(IndexOutOfBoundsError);
  });

  it('rejects fractional indices', () => {
    expect(() => resolveKey([1.5, 0], size)).toThrow(InvalidKeyError);
  });

  it('classifies a range of x at one y as a row', () => {
    expect(resolveKey([range(), 1], size)).toEqual({
      kind: 'row',
      y: 1,
      columns: { start: 0, stop: 10, step: 1, count: 10 },
    });
  });

  it('bounds-checks the integer axis of a row or column', () => {
    expect(() => resolveKey([range(), 4], size)).toThrow(IndexOutOfBoundsError);
    expect(() => resolveKey([10, range()], size)).toThrow(IndexOutOfBoundsError);
  });

  it('flips the y range of a column into storage rows', () => {
    // logical y 1..2 of a 4-high picture live in storage rows 1..2 (4-3, 4-1)
    expect(resolveKey([3, range(1, 3)], size)).toEqual({
      kind: 'column',
      x: 3,
      rows: { start: 1, stop: 3, step: 1, count: 2 },
    });
  });

  it('flips the bottom of the picture onto the last storage rows', () => {
    const request = resolveKey([range(2, 5), range(0, 2)], size);
    expect(request).toEqual({
      kind: 'region',
      columns: { start: 2, stop: 5, step: 1, count: 3 },
      rows: { start: 2, stop: 4, step: 1, count: 2 },
    });
  });

  it('clamps stops past the end of an axis', () => {
    expect(resolveKey([range(undefined, 20), range(undefined, 9)], size)).toEqual({
      kind: 'region',
      columns: { start: 0, stop: 10, step: 1, count: 10 },
      rows: { start: 0, stop: 4, step: 1, count: 4 },
    });
  });

  it('treats an inverted range as empty', () => {
    const request = resolveKey([range(5, 2), range()], size);
    expect(request.kind).toBe('region');
    expect(toSelection(request, size).columns.count).toBe(0);
  });

  it('applies the step to the flipped range as a whole', () => {
    const request = resolveKey([range(undefined, undefined, 2), range(undefined, undefined, 3)], size);
    const selection = toSelection(request, size);
    expect([...spanIndices(selection.columns)]).toEqual([0, 2, 4, 6, 8]);
    expect([...spanIndices(selection.rows)]).toEqual([0, 3]);
  });

  it('rejects negative range bounds', () => {
    expect(() => resolveKey([range(-1), range()], size)).toThrow('Negative slicing not supported');
    expect(() => resolveKey([range(), range(undefined, -1)], size)).toThrow(IndexOutOfBoundsError);
  });

  it('rejects steps that are not positive integers', () => {
    expect(() => resolveKey([range(undefined, undefined, 0), range()], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([range(undefined, undefined, -1), range()], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([range(undefined, undefined, 1.5), range()], size)).toThrow(InvalidKeyError);
  });

  it('accepts null bounds as missing', () => {
    expect(resolveKey([{ start: null, stop: null }, 0], size)).toEqual({
      kind: 'row',
      y: 0,
      columns: { start: 0, stop: 10, step: 1, count: 10 },
    });
  });

  it('rejects every other key shape', () => {
    expect(() => resolveKey('0,0', size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([1], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([1, 2, 3], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey(['a', 1], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([null, 1], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([[1], 2], size)).toThrow(InvalidKeyError);
    expect(() => resolveKey([{ begin: 1 }, 2], size)).toThrow('Unknown range field "begin"');
    expect(() => resolveKey([{ start: '1' }, 2], size)).toThrow(InvalidKeyError);
  });
});

describe('toSelection', () => {
  it('maps a Cartesian pixel onto its storage cell', () => {
    const selection = toSelection({ kind: 'pixel', x: 2, y: 3 }, size);
    expect(selection.columns).toEqual({ start: 2, stop: 3, step: 1, count: 1 });
    expect(selection.rows).toEqual({ start: 0, stop: 1, step: 1, count: 1 });
  });

  it('maps a row onto one storage row', () => {
    const selection = toSelection(resolveKey([range(1, 4), 0], size), size);
    expect(selection.rows).toEqual({ start: 3, stop: 4, step: 1, count: 1 });
    expect(selection.columns).toEqual({ start: 1, stop: 4, step: 1, count: 3 });
  });
});
