import type { SourceImage } from '@/types';
import {
  binarizeMask,
  bytesToBase64,
  dataUrlToBase64,
  EXPANSION_FILL,
  hasMaskedPixels,
  type Placement,
  type Size,
} from './image';

export function getCanvas2DContext(
  canvas: HTMLCanvasElement,
  options?: CanvasRenderingContext2DSettings,
): CanvasRenderingContext2D {
  const context = canvas.getContext('2d', options);
  if (!context) {
    throw new Error('Canvas 2D context is not available');
  }
  return context;
}

function createCanvas({ width, height }: Size): HTMLCanvasElement {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  return canvas;
}

export function loadImage(src: string): Promise<HTMLImageElement> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error('The file could not be read as an image'));
    img.src = src;
  });
}

/** An uploaded file, encoded for the API and loaded for drawing */
export interface LoadedImage {
  source: SourceImage;
  element: HTMLImageElement;
  /** data URL, safe to keep without revoking */
  previewUrl: string;
}

export async function readImageFile(file: File): Promise<LoadedImage> {
  const base64 = bytesToBase64(new Uint8Array(await file.arrayBuffer()));
  const mimeType = file.type || 'image/png';
  const previewUrl = `data:${mimeType};base64,${base64}`;
  const element = await loadImage(previewUrl);
  return {
    source: { base64, width: element.naturalWidth, height: element.naturalHeight, mimeType },
    element,
    previewUrl,
  };
}

/** Encode a canvas as PNG */
export function canvasToSourceImage(canvas: HTMLCanvasElement): SourceImage {
  return {
    base64: dataUrlToBase64(canvas.toDataURL('image/png')),
    width: canvas.width,
    height: canvas.height,
    mimeType: 'image/png',
  };
}

/** Draw an image at a new size */
export function resizeToCanvas(image: CanvasImageSource, size: Size): HTMLCanvasElement {
  const canvas = createCanvas(size);
  const ctx = getCanvas2DContext(canvas);
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(image, 0, 0, size.width, size.height);
  return canvas;
}

export interface Expansion {
  image: SourceImage;
  mask: SourceImage;
  imageUrl: string;
  maskUrl: string;
}

/**
 * Paste the source onto a grey canvas of the target size, plus the matching mask:
 * white everywhere, black where the source sits.
 */
export function renderExpansion(image: CanvasImageSource, target: Size, placement: Placement): Expansion {
  const expanded = createCanvas(target);
  const ctx = getCanvas2DContext(expanded);
  ctx.fillStyle = `rgb(${EXPANSION_FILL.r}, ${EXPANSION_FILL.g}, ${EXPANSION_FILL.b})`;
  ctx.fillRect(0, 0, target.width, target.height);
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(image, placement.x, placement.y, placement.width, placement.height);

  const mask = createCanvas(target);
  const maskCtx = getCanvas2DContext(mask);
  maskCtx.fillStyle = '#ffffff';
  maskCtx.fillRect(0, 0, target.width, target.height);
  maskCtx.fillStyle = '#000000';
  maskCtx.fillRect(placement.x, placement.y, placement.width, placement.height);

  return {
    image: canvasToSourceImage(expanded),
    mask: canvasToSourceImage(mask),
    imageUrl: expanded.toDataURL('image/png'),
    maskUrl: mask.toDataURL('image/png'),
  };
}

export interface RenderedMask {
  mask: SourceImage;
  maskUrl: string;
  /** false when nothing was drawn */
  hasStrokes: boolean;
}

/** Flatten a transparent stroke layer into a black/white PNG mask */
export function renderMask(strokes: HTMLCanvasElement): RenderedMask {
  const { width, height } = strokes;
  const drawn = getCanvas2DContext(strokes, { willReadFrequently: true }).getImageData(0, 0, width, height);
  const binary = binarizeMask(drawn.data);

  const canvas = createCanvas({ width, height });
  const ctx = getCanvas2DContext(canvas);
  const output = ctx.createImageData(width, height);
  output.data.set(binary);
  ctx.putImageData(output, 0, 0);

  return {
    mask: canvasToSourceImage(canvas),
    maskUrl: canvas.toDataURL('image/png'),
    hasStrokes: hasMaskedPixels(binary),
  };
}
