import { describe, expect, it } from 'vitest';
import { zlibSync } from 'fflate';
import { decodePng, encodePng, isPng, PNG_SIGNATURE } from './png-codec';
import { DecodeError, EncodeError } from './errors';

/** Assemble a PNG by hand. CRCs are left as zero; the decoder does not check them. */
function buildPng(
  ihdr: { width: number; height: number; bitDepth?: number; colorType: number; interlace?: number },
  scanlines: number[],
  extraChunks: Array<[string, number[]]> = [],
): Uint8Array {
  const chunks: Array<[string, Uint8Array]> = [];
  const header = new Uint8Array(13);
  const view = new DataView(header.buffer);
  view.setUint32(0, ihdr.width);
  view.setUint32(4, ihdr.height);
  header[8] = ihdr.bitDepth ?? 8;
  header[9] = ihdr.colorType;
  header[12] = ihdr.interlace ?? 0;
  chunks.push(['IHDR', header]);
  for (const [type, data] of extraChunks) chunks.push([type, Uint8Array.from(data)]);
  chunks.push(['IDAT', zlibSync(Uint8Array.from(scanlines))]);
  chunks.push(['IEND', new Uint8Array(0)]);

  const parts: number[] = Array.from(PNG_SIGNATURE);
  for (const [type, data] of chunks) {
    const len = data.length;
    parts.push((len >>> 24) & 0xff, (len >>> 16) & 0xff, (len >>> 8) & 0xff, len & 0xff);
    for (let i = 0; i < 4; i++) parts.push(type.charCodeAt(i));
    parts.push(...data, 0, 0, 0, 0);
  }
  return Uint8Array.from(parts);
}

describe('encodePng', () => {
  it('produces a PNG that decodes to the same pixels', () => {
    const grid = { data: Uint8Array.from([255, 0, 0, 0, 0, 255, 1, 2, 3, 4, 5, 6]), width: 2, height: 2 };
    const png = encodePng(grid);

    expect(isPng(png)).toBe(true);
    const decoded = decodePng(png);
    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(2);
    expect(Array.from(decoded.data)).toEqual([255, 0, 0, 0, 0, 255, 1, 2, 3, 4, 5, 6]);
  });

  it('writes an 8-bit RGB header', () => {
    const png = encodePng({ data: new Uint8Array(3 * 5 * 7), width: 5, height: 7 });
    const view = new DataView(png.buffer, png.byteOffset, png.byteLength);

    expect(String.fromCharCode(...png.subarray(12, 16))).toBe('IHDR');
    expect(view.getUint32(16)).toBe(5);
    expect(view.getUint32(20)).toBe(7);
    expect(png[24]).toBe(8);
    expect(png[25]).toBe(2);
  });

  it('rejects empty images', () => {
    expect(() => encodePng({ data: new Uint8Array(0), width: 0, height: 3 })).toThrow(EncodeError);
  });

  it('rejects grids with the wrong data length', () => {
    expect(() => encodePng({ data: new Uint8Array(5), width: 2, height: 1 })).toThrow(EncodeError);
  });
});

describe('decodePng', () => {
  it('rejects data without the PNG signature', () => {
    expect(() => decodePng(Uint8Array.from([1, 2, 3]))).toThrow('Invalid PNG signature');
  });

  it('expands greyscale to RGB', () => {
    const png = buildPng({ width: 2, height: 1, colorType: 0 }, [0, 10, 200]);
    expect(Array.from(decodePng(png).data)).toEqual([10, 10, 10, 200, 200, 200]);
  });

  it('drops alpha from greyscale+alpha and RGBA', () => {
    const ga = buildPng({ width: 1, height: 1, colorType: 4 }, [0, 42, 7]);
    expect(Array.from(decodePng(ga).data)).toEqual([42, 42, 42]);

    const rgba = buildPng({ width: 1, height: 1, colorType: 6 }, [0, 1, 2, 3, 4]);
    expect(Array.from(decodePng(rgba).data)).toEqual([1, 2, 3]);
  });

  it('resolves palette indices', () => {
    const png = buildPng({ width: 2, height: 1, colorType: 3 }, [0, 1, 0], [['PLTE', [255, 0, 0, 0, 255, 0]]]);
    expect(Array.from(decodePng(png).data)).toEqual([0, 255, 0, 255, 0, 0]);
  });

  it('rejects palette images without a palette', () => {
    const png = buildPng({ width: 1, height: 1, colorType: 3 }, [0, 0]);
    expect(() => decodePng(png)).toThrow('Palette PNG missing PLTE chunk');
  });

  it('reverses the Sub filter', () => {
    const png = buildPng({ width: 2, height: 1, colorType: 2 }, [1, 10, 20, 30, 5, 5, 5]);
    expect(Array.from(decodePng(png).data)).toEqual([10, 20, 30, 15, 25, 35]);
  });

  it('reverses the Up filter', () => {
    const png = buildPng({ width: 1, height: 2, colorType: 2 }, [0, 1, 2, 3, 2, 1, 1, 1]);
    expect(Array.from(decodePng(png).data)).toEqual([1, 2, 3, 2, 3, 4]);
  });

  it('rejects unsupported bit depths', () => {
    const png = buildPng({ width: 1, height: 1, bitDepth: 16, colorType: 2 }, [0, 0, 0, 0, 0, 0, 0]);
    expect(() => decodePng(png)).toThrow(DecodeError);
  });

  it('rejects interlaced images', () => {
    const png = buildPng({ width: 1, height: 1, colorType: 2, interlace: 1 }, [0, 0, 0, 0]);
    expect(() => decodePng(png)).toThrow('Interlaced PNG images are not supported');
  });

  it('rejects truncated files', () => {
    const png = encodePng({ data: new Uint8Array(3 * 4), width: 2, height: 2 });
    expect(() => decodePng(png.subarray(0, 30))).toThrow(DecodeError);
  });

  it('rejects corrupt image data', () => {
    const png = buildPng({ width: 1, height: 1, colorType: 2 }, [0, 0, 0, 0]);
    // IDAT payload starts after signature (8) + IHDR chunk (25) + IDAT length/type (8)
    const corrupt = png.slice();
    corrupt[8 + 25 + 8] = 0xff;
    expect(() => decodePng(corrupt)).toThrow(DecodeError);
  });
});
