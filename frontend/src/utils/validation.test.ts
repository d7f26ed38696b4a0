import { describe, it, expect } from 'vitest';
import type {
  ConditionedImageRequest,
  GenerationOptions,
  InpaintingRequest,
  OutpaintingRequest,
  SourceImage,
  TextToImageRequest,
} from '@/types';
import { ValidationError } from './errors';
import { validateRequest } from './validation';

const image = (width = 512, height = 512): SourceImage => ({
  base64: 'AAAA',
  width,
  height,
  mimeType: 'image/png',
});

const options = (overrides: Partial<GenerationOptions> = {}): GenerationOptions => ({
  numberOfImages: 1,
  width: 512,
  height: 512,
  quality: 'standard',
  cfgScale: 7.5,
  seed: 12,
  ...overrides,
});

const textRequest = (overrides: Partial<TextToImageRequest> = {}): TextToImageRequest => ({
  kind: 'textToImage',
  prompt: 'a red bicycle',
  options: options(),
  ...overrides,
});

const conditionedRequest = (overrides: Partial<ConditionedImageRequest> = {}): ConditionedImageRequest => ({
  kind: 'conditionedImage',
  prompt: 'a red bicycle',
  conditionImage: image(),
  controlMode: 'CANNY_EDGE',
  controlStrength: 0.7,
  options: options(),
  ...overrides,
});

const inpaintingRequest = (overrides: Partial<InpaintingRequest> = {}): InpaintingRequest => ({
  kind: 'inpainting',
  prompt: 'a honey bee',
  image: image(),
  mask: image(),
  seed: 12,
  ...overrides,
});

const outpaintingRequest = (overrides: Partial<OutpaintingRequest> = {}): OutpaintingRequest => ({
  kind: 'outpainting',
  prompt: 'a forest',
  image: image(),
  mask: { type: 'image', image: image() },
  mode: 'PRECISE',
  seed: 12,
  ...overrides,
});

function messageOf(run: () => unknown): string {
  try {
    run();
  } catch (e) {
    expect(e).toBeInstanceOf(ValidationError);
    return e instanceof Error ? e.message : String(e);
  }
  throw new Error('expected a validation error');
}

describe('validateRequest', () => {
  describe('text to image', () => {
    it('returns a normalized copy', () => {
      const valid = validateRequest(textRequest({ prompt: '  a red bicycle  ', negativePrompt: '   ' }));
      expect(valid).toEqual({ kind: 'textToImage', prompt: 'a red bicycle', options: options() });
      expect(valid.kind === 'textToImage' && valid.negativePrompt).toBeUndefined();
    });

    it('keeps a non-blank negative prompt', () => {
      const valid = validateRequest(textRequest({ negativePrompt: ' blurry ' }));
      expect(valid.kind === 'textToImage' && valid.negativePrompt).toBe('blurry');
    });

    it('requires a prompt', () => {
      expect(messageOf(() => validateRequest(textRequest({ prompt: '   ' })))).toBe('Prompt is required');
    });

    it('limits the prompt length', () => {
      expect(messageOf(() => validateRequest(textRequest({ prompt: 'x'.repeat(1025) })))).toBe(
        'Prompt must be at most 1024 characters',
      );
      expect(validateRequest(textRequest({ prompt: 'x'.repeat(1024) })).kind).toBe('textToImage');
    });

    it('bounds the number of images', () => {
      const expected = 'Number of images must be between 1 and 5';
      expect(messageOf(() => validateRequest(textRequest({ options: options({ numberOfImages: 0 }) })))).toBe(expected);
      expect(messageOf(() => validateRequest(textRequest({ options: options({ numberOfImages: 6 }) })))).toBe(expected);
    });

    it('checks the output size', () => {
      expect(messageOf(() => validateRequest(textRequest({ options: options({ width: 304 }) })))).toBe(
        'Width must be between 320 and 4096 pixels',
      );
      expect(messageOf(() => validateRequest(textRequest({ options: options({ width: 500 }) })))).toBe(
        'Width must be a multiple of 16',
      );
      expect(messageOf(() => validateRequest(textRequest({ options: options({ height: 4112 }) })))).toBe(
        'Height must be between 320 and 4096 pixels',
      );
    });

    it('limits the total pixel count', () => {
      expect(
        messageOf(() => validateRequest(textRequest({ options: options({ width: 4096, height: 2048 }) }))),
      ).toBe('Image size must not exceed 4194304 pixels');
      expect(validateRequest(textRequest({ options: options({ width: 2048, height: 2048 }) })).kind).toBe(
        'textToImage',
      );
    });

    it('limits the aspect ratio', () => {
      expect(
        messageOf(() => validateRequest(textRequest({ options: options({ width: 320, height: 1600 }) }))),
      ).toBe('Image aspect ratio must be between 1:4 and 4:1');
      expect(validateRequest(textRequest({ options: options({ width: 320, height: 1280 }) })).kind).toBe(
        'textToImage',
      );
    });

    it('bounds cfgScale', () => {
      expect(messageOf(() => validateRequest(textRequest({ options: options({ cfgScale: 1 }) })))).toBe(
        'cfgScale must be between 1.1 and 10',
      );
      expect(messageOf(() => validateRequest(textRequest({ options: options({ cfgScale: 10.5 }) })))).toBe(
        'cfgScale must be between 1.1 and 10',
      );
    });

    it('bounds the seed', () => {
      const expected = 'Seed must be an integer between 0 and 858993459';
      expect(messageOf(() => validateRequest(textRequest({ options: options({ seed: -1 }) })))).toBe(expected);
      expect(messageOf(() => validateRequest(textRequest({ options: options({ seed: 858993460 }) })))).toBe(expected);
      expect(messageOf(() => validateRequest(textRequest({ options: options({ seed: 1.5 }) })))).toBe(expected);
    });
  });

  describe('conditioned generation', () => {
    it('accepts a complete request', () => {
      expect(validateRequest(conditionedRequest()).kind).toBe('conditionedImage');
    });

    it('requires a reference image', () => {
      expect(
        messageOf(() => validateRequest(conditionedRequest({ conditionImage: { ...image(), base64: '' } }))),
      ).toBe('Reference image is required');
    });

    it('checks the reference image size', () => {
      expect(messageOf(() => validateRequest(conditionedRequest({ conditionImage: image(100, 400) })))).toBe(
        'Reference image: each side must be between 320 and 4096 pixels (got 100x400)',
      );
    });

    it('bounds the control strength', () => {
      expect(messageOf(() => validateRequest(conditionedRequest({ controlStrength: 1.5 })))).toBe(
        'Control strength must be between 0 and 1',
      );
    });
  });

  describe('background removal', () => {
    it('requires an image', () => {
      expect(
        messageOf(() => validateRequest({ kind: 'removeBackground', image: { ...image(), base64: '' } })),
      ).toBe('Input image is required');
    });

    it('accepts an image within bounds', () => {
      expect(validateRequest({ kind: 'removeBackground', image: image(4096, 320) })).toEqual({
        kind: 'removeBackground',
        image: image(4096, 320),
      });
    });
  });

  describe('inpainting', () => {
    it('requires a mask', () => {
      expect(messageOf(() => validateRequest(inpaintingRequest({ mask: { ...image(), base64: '' } })))).toBe(
        'Mask image is required',
      );
    });

    it('requires the mask to match the image', () => {
      expect(messageOf(() => validateRequest(inpaintingRequest({ mask: image(512, 384) })))).toBe(
        'Mask image must match the input image size (512x512)',
      );
    });

    it('requires a prompt', () => {
      expect(messageOf(() => validateRequest(inpaintingRequest({ prompt: '' })))).toBe('Prompt is required');
    });
  });

  describe('outpainting', () => {
    it('requires a mask prompt when masking by prompt', () => {
      expect(
        messageOf(() => validateRequest(outpaintingRequest({ mask: { type: 'prompt', prompt: '  ' } }))),
      ).toBe('Mask prompt is required');
    });

    it('trims the mask prompt', () => {
      const valid = validateRequest(outpaintingRequest({ mask: { type: 'prompt', prompt: ' a dog ' } }));
      expect(valid.kind === 'outpainting' && valid.mask).toEqual({ type: 'prompt', prompt: 'a dog' });
    });

    it('requires an image mask to match the image', () => {
      expect(
        messageOf(() =>
          validateRequest(outpaintingRequest({ image: image(1024, 1024), mask: { type: 'image', image: image() } })),
        ),
      ).toBe('Mask image must match the input image size (1024x1024)');
    });
  });
});
