import JSZip from 'jszip';
import { saveAs } from 'file-saver';
import type { DecodedImage } from '@/types';
import { dataUrlToBase64 } from './image';

/** File name for a decoded image, e.g. `inpainting-2.png` */
export function imageFilename(image: DecodedImage, prefix: string, index: number): string {
  const ext = image.mimeType === 'image/jpeg' ? 'jpg' : 'png';
  return `${prefix}-${index + 1}.${ext}`;
}

/**
 * Download a single image
 */
export function downloadImage(image: DecodedImage, filename: string): void {
  saveAs(image.dataUrl, filename);
}

/**
 * Download several images as one ZIP
 */
export async function downloadImagesAsZip(
  images: DecodedImage[],
  prefix: string,
  zipName = `${prefix}-images.zip`,
): Promise<void> {
  const zip = new JSZip();
  const folder = zip.folder('images');
  if (!folder) return;

  images.forEach((image, index) => {
    folder.file(imageFilename(image, prefix, index), dataUrlToBase64(image.dataUrl), { base64: true });
  });

  const content = await zip.generateAsync({ type: 'blob' });
  saveAs(content, zipName);
}
