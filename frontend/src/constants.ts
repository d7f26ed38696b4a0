import type { ControlMode, ImageQuality, OutPaintingMode } from '@/types';

/** Output size presets for text-to-image */
export const IMAGE_SIZES = [
  { value: '384x576', width: 384, height: 576 },
  { value: '384x640', width: 384, height: 640 },
  { value: '448x576', width: 448, height: 576 },
  { value: '512x512', width: 512, height: 512 },
  { value: '576x384', width: 576, height: 384 },
  { value: '768x768', width: 768, height: 768 },
  { value: '768x1152', width: 768, height: 1152 },
  { value: '1024x1024', width: 1024, height: 1024 },
];

/** Canvas sizes an image can be outpainted to */
export const EXPANDED_IMAGE_SIZES = [
  { value: '512x512', width: 512, height: 512 },
  { value: '1024x1024', width: 1024, height: 1024 },
];

export const QUALITY_OPTIONS: { value: ImageQuality; label: string }[] = [
  { value: 'standard', label: 'Standard' },
  { value: 'premium', label: 'Premium' },
];

export const CONTROL_MODE_OPTIONS: { value: ControlMode; label: string }[] = [
  { value: 'CANNY_EDGE', label: 'Canny edge' },
  { value: 'SEGMENTATION', label: 'Segmentation' },
];

export const OUTPAINTING_MODE_OPTIONS: { value: OutPaintingMode; label: string }[] = [
  { value: 'PRECISE', label: 'Precise' },
  { value: 'DEFAULT', label: 'Default' },
];

/** Form defaults */
export const DEFAULTS = {
  numberOfImages: 1,
  imageSize: '512x512',
  quality: 'standard' as ImageQuality,
  cfgScale: 7.5,
  seed: 12,
  controlStrength: 0.7,
  strokeWidth: 20,
  position: 0.5,
};

export const MAX_SEED = 858_993_459;

/** Upload limits */
export const ACCEPTED_IMAGE_TYPES = ['image/png', 'image/jpeg'];
export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

/** Inpainting works on images no larger than this on either side */
export const INPAINT_MAX_SIDE = 1024;

export const CFG_SCALE_INFO =
  'cfgScale: how strongly the generated image should adhere to the prompt. Use a lower value to introduce more randomness.';

export const CONTROL_STRENGTH_INFO =
  'Control strength: how closely the generated image follows the reference image. Use a lower value to introduce more randomness.';

export const INPUT_IMAGE_INFO = 'Input image: each side must be between 320 and 4096 pixels, inclusive.';
