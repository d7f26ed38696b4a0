import type { DecodedMimeType } from '@/types';

/** Canvas fill behind an outpainted image */
export const EXPANSION_FILL = { r: 235, g: 235, b: 235 } as const;

/** Mask pixels darker than this become black */
export const MASK_THRESHOLD = 128;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode; throws on characters outside the alphabet or bad padding.
 */
export function base64ToBytes(base64: string): Uint8Array {
  const clean = base64.replace(/\s+/g, '');
  if (!clean || clean.length % 4 !== 0 || !BASE64_PATTERN.test(clean)) {
    throw new Error('Invalid base64 data');
  }
  const binary = atob(clean);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

export function bytesToBase64(bytes: Uint8Array): string {
  let binary = '';
  // chunked to stay under the argument limit of fromCharCode
  const chunk = 0x8000;
  for (let i = 0; i < bytes.length; i += chunk) {
    binary += String.fromCharCode(...bytes.subarray(i, i + chunk));
  }
  return btoa(binary);
}

/** Detect PNG or JPEG from the file signature */
export function detectMimeType(bytes: Uint8Array): DecodedMimeType | null {
  const png = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
  if (bytes.length >= png.length && png.every((b, i) => bytes[i] === b)) {
    return 'image/png';
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }
  return null;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Scale down so the longer side is at most `maxSide`, keeping the aspect ratio.
 * Smaller images are returned unchanged.
 */
export function fitWithin(size: Size, maxSide: number): Size {
  const { width, height } = size;
  if (width <= maxSide && height <= maxSide) {
    return { width, height };
  }
  if (width > height) {
    return { width: maxSide, height: Math.trunc((height / width) * maxSide) };
  }
  return { width: Math.trunc((width / height) * maxSide), height: maxSide };
}

export interface Placement extends Size {
  x: number;
  y: number;
}

const clamp01 = (x: number) => (Number.isFinite(x) ? Math.max(0, Math.min(1, x)) : 0);

/**
 * Where a source image lands on an expanded canvas.
 * `horizontal` / `vertical` run from 0 (left/top) to 1 (right/bottom);
 * a source larger than the target is scaled down to fit first.
 */
export function placeWithin(source: Size, target: Size, horizontal: number, vertical: number): Placement {
  const scale = Math.min(1, target.width / source.width, target.height / source.height);
  const width = scale < 1 ? Math.max(1, Math.trunc(source.width * scale)) : source.width;
  const height = scale < 1 ? Math.max(1, Math.trunc(source.height * scale)) : source.height;
  return {
    x: Math.trunc((target.width - width) * clamp01(horizontal)),
    y: Math.trunc((target.height - height) * clamp01(vertical)),
    width,
    height,
  };
}

/**
 * Turn drawn RGBA strokes into an opaque black/white mask.
 * Strokes are composited over white, then each channel is thresholded.
 */
export function binarizeMask(rgba: Uint8ClampedArray): Uint8ClampedArray {
  const out = new Uint8ClampedArray(rgba.length);
  for (let i = 0; i < rgba.length; i += 4) {
    const alpha = rgba[i + 3] / 255;
    for (let c = 0; c < 3; c++) {
      const value = rgba[i + c] * alpha + 255 * (1 - alpha);
      out[i + c] = value < MASK_THRESHOLD ? 0 : 255;
    }
    out[i + 3] = 255;
  }
  return out;
}

/** True when a binarized mask has at least one black pixel */
export function hasMaskedPixels(mask: Uint8ClampedArray): boolean {
  for (let i = 0; i < mask.length; i += 4) {
    if (mask[i] === 0 && mask[i + 1] === 0 && mask[i + 2] === 0) {
      return true;
    }
  }
  return false;
}

/** Strip a `data:*;base64,` prefix */
export function dataUrlToBase64(dataUrl: string): string {
  const comma = dataUrl.indexOf(',');
  return comma >= 0 ? dataUrl.slice(comma + 1) : dataUrl;
}
