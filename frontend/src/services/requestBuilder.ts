import type {
  GenerationOptions,
  GenerationRequest,
  ImageGenerationConfig,
  InvokeModelBody,
  OutPaintingParams,
} from '@/types';

function generationConfig(options: GenerationOptions): ImageGenerationConfig {
  return {
    numberOfImages: options.numberOfImages,
    quality: options.quality,
    width: options.width,
    height: options.height,
    cfgScale: options.cfgScale,
    seed: options.seed,
  };
}

/** `negativeText` only when there is one */
function negativeTextOf(negativePrompt?: string): { negativeText?: string } {
  const negativeText = negativePrompt?.trim();
  return negativeText ? { negativeText } : {};
}

/**
 * Shape a request into the JSON body the invoke API expects.
 */
export function buildRequestBody(request: GenerationRequest): InvokeModelBody {
  switch (request.kind) {
    case 'textToImage':
      return {
        taskType: 'TEXT_IMAGE',
        textToImageParams: {
          text: request.prompt,
          ...negativeTextOf(request.negativePrompt),
        },
        imageGenerationConfig: generationConfig(request.options),
      };

    case 'conditionedImage':
      return {
        taskType: 'TEXT_IMAGE',
        textToImageParams: {
          text: request.prompt,
          ...negativeTextOf(request.negativePrompt),
          conditionImage: request.conditionImage.base64,
          controlMode: request.controlMode,
          controlStrength: request.controlStrength,
        },
        imageGenerationConfig: generationConfig(request.options),
      };

    case 'removeBackground':
      return {
        taskType: 'BACKGROUND_REMOVAL',
        backgroundRemovalParams: { image: request.image.base64 },
      };

    case 'inpainting':
      return {
        taskType: 'INPAINTING',
        inPaintingParams: {
          text: request.prompt,
          ...negativeTextOf(request.negativePrompt),
          image: request.image.base64,
          maskImage: request.mask.base64,
        },
        imageGenerationConfig: {
          numberOfImages: request.numberOfImages ?? 1,
          seed: request.seed,
        },
      };

    case 'outpainting': {
      const params: OutPaintingParams = {
        text: request.prompt,
        ...negativeTextOf(request.negativePrompt),
        image: request.image.base64,
        outPaintingMode: request.mode,
      };
      if (request.mask.type === 'image') {
        params.maskImage = request.mask.image.base64;
      } else {
        params.maskPrompt = request.mask.prompt;
      }
      return {
        taskType: 'OUTPAINTING',
        outPaintingParams: params,
        imageGenerationConfig: {
          numberOfImages: request.numberOfImages ?? 1,
          seed: request.seed,
        },
      };
    }
  }
}
