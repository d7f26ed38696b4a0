import { z } from 'zod';
import type { DecodedImage, GenerationResult, InvokeModelResponse } from '@/types';
import { RemoteError } from '@/utils/errors';
import { base64ToBytes, detectMimeType } from '@/utils/image';

export const NO_IMAGES_MESSAGE = 'No images returned from the model. Please try again.';
export const MALFORMED_RESPONSE_MESSAGE = 'The model returned a malformed response.';

const responseSchema: z.ZodType<InvokeModelResponse> = z.object({
  images: z.array(z.string()).optional(),
  error: z.string().nullish(),
});

function decodeImage(data: string, index: number): DecodedImage {
  let bytes: Uint8Array;
  try {
    bytes = base64ToBytes(data);
  } catch {
    throw new RemoteError(`${MALFORMED_RESPONSE_MESSAGE} Image ${index + 1} is not valid base64.`);
  }
  const mimeType = detectMimeType(bytes);
  if (!mimeType) {
    throw new RemoteError(`${MALFORMED_RESPONSE_MESSAGE} Image ${index + 1} is not a PNG or JPEG.`);
  }
  return {
    id: `image-${index + 1}`,
    bytes,
    mimeType,
    dataUrl: `data:${mimeType};base64,${data.replace(/\s+/g, '')}`,
  };
}

/**
 * Decode every image the response lists.
 * One bad entry fails the whole response, so nothing half-decoded is shown.
 */
export function decodeResponse(raw: unknown): GenerationResult {
  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RemoteError(MALFORMED_RESPONSE_MESSAGE);
  }

  const { images = [], error } = parsed.data;
  const reason = error?.trim() || undefined;

  if (images.length === 0) {
    return { images: [], failureReason: reason ?? NO_IMAGES_MESSAGE };
  }

  const decoded = images.map(decodeImage);
  return reason ? { images: decoded, failureReason: reason } : { images: decoded };
}
