import { describe, it, expect } from 'vitest';
import type { GenerationOptions, SourceImage } from '@/types';
import { buildRequestBody } from './requestBuilder';

const image = (base64: string): SourceImage => ({ base64, width: 512, height: 512, mimeType: 'image/png' });

const options: GenerationOptions = {
  numberOfImages: 2,
  width: 768,
  height: 1152,
  quality: 'premium',
  cfgScale: 6.5,
  seed: 42,
};

describe('buildRequestBody', () => {
  it('builds a text to image payload', () => {
    expect(buildRequestBody({ kind: 'textToImage', prompt: 'a red bicycle', options })).toEqual({
      taskType: 'TEXT_IMAGE',
      textToImageParams: { text: 'a red bicycle' },
      imageGenerationConfig: {
        numberOfImages: 2,
        quality: 'premium',
        width: 768,
        height: 1152,
        cfgScale: 6.5,
        seed: 42,
      },
    });
  });

  it('adds the negative prompt only when there is one', () => {
    const withNegative = buildRequestBody({
      kind: 'textToImage',
      prompt: 'a red bicycle',
      negativePrompt: 'blurry',
      options,
    });
    const blank = buildRequestBody({ kind: 'textToImage', prompt: 'a red bicycle', negativePrompt: ' ', options });

    expect(withNegative.taskType === 'TEXT_IMAGE' && withNegative.textToImageParams).toEqual({
      text: 'a red bicycle',
      negativeText: 'blurry',
    });
    expect(blank.taskType === 'TEXT_IMAGE' && 'negativeText' in blank.textToImageParams).toBe(false);
  });

  it('adds the condition image for conditioned generation', () => {
    const body = buildRequestBody({
      kind: 'conditionedImage',
      prompt: 'a castle',
      conditionImage: image('Q09ORA=='),
      controlMode: 'SEGMENTATION',
      controlStrength: 0.7,
      options,
    });
    expect(body.taskType === 'TEXT_IMAGE' && body.textToImageParams).toEqual({
      text: 'a castle',
      conditionImage: 'Q09ORA==',
      controlMode: 'SEGMENTATION',
      controlStrength: 0.7,
    });
  });

  it('builds a background removal payload', () => {
    expect(buildRequestBody({ kind: 'removeBackground', image: image('SU1H') })).toEqual({
      taskType: 'BACKGROUND_REMOVAL',
      backgroundRemovalParams: { image: 'SU1H' },
    });
  });

  it('builds an inpainting payload with one image by default', () => {
    expect(
      buildRequestBody({
        kind: 'inpainting',
        prompt: 'a honey bee',
        negativePrompt: 'text',
        image: image('SU1H'),
        mask: image('TUFTSw=='),
        seed: 12,
      }),
    ).toEqual({
      taskType: 'INPAINTING',
      inPaintingParams: { text: 'a honey bee', negativeText: 'text', image: 'SU1H', maskImage: 'TUFTSw==' },
      imageGenerationConfig: { numberOfImages: 1, seed: 12 },
    });
  });

  it('sends an outpainting image mask', () => {
    expect(
      buildRequestBody({
        kind: 'outpainting',
        prompt: 'a forest',
        image: image('SU1H'),
        mask: { type: 'image', image: image('TUFTSw==') },
        mode: 'PRECISE',
        seed: 7,
        numberOfImages: 3,
      }),
    ).toEqual({
      taskType: 'OUTPAINTING',
      outPaintingParams: { text: 'a forest', image: 'SU1H', outPaintingMode: 'PRECISE', maskImage: 'TUFTSw==' },
      imageGenerationConfig: { numberOfImages: 3, seed: 7 },
    });
  });

  it('sends an outpainting mask prompt', () => {
    const body = buildRequestBody({
      kind: 'outpainting',
      prompt: 'a forest',
      image: image('SU1H'),
      mask: { type: 'prompt', prompt: 'a dog' },
      mode: 'DEFAULT',
      seed: 7,
    });
    expect(body.taskType === 'OUTPAINTING' && body.outPaintingParams).toEqual({
      text: 'a forest',
      image: 'SU1H',
      outPaintingMode: 'DEFAULT',
      maskPrompt: 'a dog',
    });
  });
});
