import { describe, it, expect } from 'vitest';
import {
  base64ToBytes,
  binarizeMask,
  bytesToBase64,
  dataUrlToBase64,
  detectMimeType,
  fitWithin,
  hasMaskedPixels,
  placeWithin,
} from './image';

const PNG_HEADER = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('base64 helpers', () => {
  it('decodes base64 into bytes', () => {
    expect(base64ToBytes('AQID')).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('ignores embedded whitespace', () => {
    expect(base64ToBytes('AQ\nID')).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('rejects bad length, padding and characters', () => {
    expect(() => base64ToBytes('abc')).toThrow('Invalid base64 data');
    expect(() => base64ToBytes('ab$=')).toThrow('Invalid base64 data');
    expect(() => base64ToBytes('')).toThrow('Invalid base64 data');
  });

  it('encodes bytes', () => {
    expect(bytesToBase64(new Uint8Array([1, 2, 3]))).toBe('AQID');
    expect(bytesToBase64(new Uint8Array([104, 105]))).toBe('aGk=');
  });

  it('strips a data URL prefix', () => {
    expect(dataUrlToBase64('data:image/png;base64,AAAA')).toBe('AAAA');
    expect(dataUrlToBase64('AAAA')).toBe('AAAA');
  });
});

describe('detectMimeType', () => {
  it('recognises PNG and JPEG signatures', () => {
    expect(detectMimeType(new Uint8Array([...PNG_HEADER, 0]))).toBe('image/png');
    expect(detectMimeType(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
  });

  it('returns null for anything else', () => {
    expect(detectMimeType(new Uint8Array([0x47, 0x49, 0x46, 0x38]))).toBeNull();
    expect(detectMimeType(new Uint8Array(PNG_HEADER.slice(0, 4)))).toBeNull();
  });
});

describe('fitWithin', () => {
  it('keeps small images unchanged', () => {
    expect(fitWithin({ width: 800, height: 600 }, 1024)).toEqual({ width: 800, height: 600 });
  });

  it('scales a wide image by its width', () => {
    expect(fitWithin({ width: 2048, height: 1024 }, 1024)).toEqual({ width: 1024, height: 512 });
  });

  it('scales a tall image by its height', () => {
    expect(fitWithin({ width: 1000, height: 3000 }, 1024)).toEqual({ width: 341, height: 1024 });
  });
});

describe('placeWithin', () => {
  const target = { width: 512, height: 512 };

  it('centres the image at 0.5', () => {
    expect(placeWithin({ width: 300, height: 200 }, target, 0.5, 0.5)).toEqual({
      x: 106,
      y: 156,
      width: 300,
      height: 200,
    });
  });

  it('places at the edges for 0 and 1', () => {
    expect(placeWithin({ width: 300, height: 200 }, target, 1, 0)).toEqual({
      x: 212,
      y: 0,
      width: 300,
      height: 200,
    });
  });

  it('clamps positions outside 0..1', () => {
    const placement = placeWithin({ width: 300, height: 200 }, target, 2, -1);
    expect(placement.x).toBe(212);
    expect(placement.y).toBe(0);
  });

  it('scales down a source larger than the target', () => {
    expect(placeWithin({ width: 2048, height: 1024 }, { width: 1024, height: 1024 }, 0.5, 0.5)).toEqual({
      x: 0,
      y: 256,
      width: 1024,
      height: 512,
    });
  });
});

describe('binarizeMask', () => {
  it('composites strokes over white and thresholds', () => {
    const rgba = new Uint8ClampedArray([
      0, 0, 0, 255, // opaque black
      0, 0, 0, 0, // untouched
      0, 0, 0, 200, // mostly covered
      0, 0, 0, 100, // faint
    ]);
    expect(Array.from(binarizeMask(rgba))).toEqual([
      0, 0, 0, 255,
      255, 255, 255, 255,
      0, 0, 0, 255,
      255, 255, 255, 255,
    ]);
  });

  it('reports whether anything is masked', () => {
    expect(hasMaskedPixels(binarizeMask(new Uint8ClampedArray([0, 0, 0, 0])))).toBe(false);
    expect(hasMaskedPixels(binarizeMask(new Uint8ClampedArray([0, 0, 0, 0, 0, 0, 0, 255])))).toBe(true);
  });
});
