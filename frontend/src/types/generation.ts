import type { ControlMode, ImageQuality, OutPaintingMode } from './model';

/** Tool / task variant */
export type TaskKind =
  | 'textToImage'
  | 'conditionedImage'
  | 'removeBackground'
  | 'inpainting'
  | 'outpainting';

/** Encoded image bytes plus pixel size */
export interface SourceImage {
  /** base64 without the data URL prefix */
  base64: string;
  width: number;
  height: number;
  mimeType: string;
}

/** Output knobs shared by the generative variants */
export interface GenerationOptions {
  numberOfImages: number;
  width: number;
  height: number;
  quality: ImageQuality;
  cfgScale: number;
  seed: number;
}

export interface TextToImageRequest {
  kind: 'textToImage';
  prompt: string;
  negativePrompt?: string;
  options: GenerationOptions;
}

export interface ConditionedImageRequest {
  kind: 'conditionedImage';
  prompt: string;
  negativePrompt?: string;
  conditionImage: SourceImage;
  controlMode: ControlMode;
  controlStrength: number;
  options: GenerationOptions;
}

export interface RemoveBackgroundRequest {
  kind: 'removeBackground';
  image: SourceImage;
}

export interface InpaintingRequest {
  kind: 'inpainting';
  prompt: string;
  negativePrompt?: string;
  image: SourceImage;
  mask: SourceImage;
  seed: number;
  numberOfImages?: number;
}

/** Outpainting mask: an explicit image, or a prompt naming what to keep */
export type OutpaintingMask =
  | { type: 'image'; image: SourceImage }
  | { type: 'prompt'; prompt: string };

export interface OutpaintingRequest {
  kind: 'outpainting';
  prompt: string;
  negativePrompt?: string;
  image: SourceImage;
  mask: OutpaintingMask;
  mode: OutPaintingMode;
  seed: number;
  numberOfImages?: number;
}

/** One user action's worth of input */
export type GenerationRequest =
  | TextToImageRequest
  | ConditionedImageRequest
  | RemoveBackgroundRequest
  | InpaintingRequest
  | OutpaintingRequest;

export type DecodedMimeType = 'image/png' | 'image/jpeg';

/** A returned image, decoded and ready to display */
export interface DecodedImage {
  id: string;
  bytes: Uint8Array;
  mimeType: DecodedMimeType;
  dataUrl: string;
}

/** Decoded response of one call */
export interface GenerationResult {
  images: DecodedImage[];
  /** Reason reported by the model, or the empty-result message */
  failureReason?: string;
}
