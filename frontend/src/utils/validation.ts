import { z } from 'zod';
import type { GenerationRequest } from '@/types';
import { ValidationError } from './errors';

/** Bounds accepted by the image model */
export const LIMITS = {
  promptMaxLength: 1024,
  minImages: 1,
  maxImages: 5,
  minSide: 320,
  maxSide: 4096,
  sideMultiple: 16,
  maxPixels: 4_194_304,
  maxAspectRatio: 4,
  minCfgScale: 1.1,
  maxCfgScale: 10,
  maxSeed: 858_993_459,
} as const;

const promptSchema = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(LIMITS.promptMaxLength, `${label} must be at most ${LIMITS.promptMaxLength} characters`);

// Blank negative prompts are dropped
const negativePromptSchema = z
  .string()
  .trim()
  .max(LIMITS.promptMaxLength, `Negative prompt must be at most ${LIMITS.promptMaxLength} characters`)
  .optional()
  .transform((value) => (value ? value : undefined));

const numberOfImagesSchema = z
  .number({ required_error: 'Number of images is required' })
  .int(`Number of images must be between ${LIMITS.minImages} and ${LIMITS.maxImages}`)
  .min(LIMITS.minImages, `Number of images must be between ${LIMITS.minImages} and ${LIMITS.maxImages}`)
  .max(LIMITS.maxImages, `Number of images must be between ${LIMITS.minImages} and ${LIMITS.maxImages}`);

const seedMessage = `Seed must be an integer between 0 and ${LIMITS.maxSeed}`;
const seedSchema = z
  .number({ required_error: 'Seed is required', invalid_type_error: seedMessage })
  .int(seedMessage)
  .min(0, seedMessage)
  .max(LIMITS.maxSeed, seedMessage);

const sideSchema = (label: string) => {
  const range = `${label} must be between ${LIMITS.minSide} and ${LIMITS.maxSide} pixels`;
  return z
    .number({ required_error: `${label} is required` })
    .int(range)
    .min(LIMITS.minSide, range)
    .max(LIMITS.maxSide, range)
    .multipleOf(LIMITS.sideMultiple, `${label} must be a multiple of ${LIMITS.sideMultiple}`);
};

const sourceImageSchema = (label: string) =>
  z
    .object(
      {
        base64: z.string().min(1, `${label} is required`),
        width: z.number().int(),
        height: z.number().int(),
        mimeType: z.string(),
      },
      { required_error: `${label} is required`, invalid_type_error: `${label} is required` },
    )
    .superRefine((image, ctx) => {
      const inRange = (side: number) => side >= LIMITS.minSide && side <= LIMITS.maxSide;
      if (!inRange(image.width) || !inRange(image.height)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${label}: each side must be between ${LIMITS.minSide} and ${LIMITS.maxSide} pixels (got ${image.width}x${image.height})`,
        });
      }
    });

const generationOptionsSchema = z
  .object(
    {
      numberOfImages: numberOfImagesSchema,
      width: sideSchema('Width'),
      height: sideSchema('Height'),
      quality: z.enum(['standard', 'premium'], {
        errorMap: () => ({ message: 'Quality must be "standard" or "premium"' }),
      }),
      cfgScale: z
        .number({ required_error: 'cfgScale is required' })
        .min(LIMITS.minCfgScale, `cfgScale must be between ${LIMITS.minCfgScale} and ${LIMITS.maxCfgScale}`)
        .max(LIMITS.maxCfgScale, `cfgScale must be between ${LIMITS.minCfgScale} and ${LIMITS.maxCfgScale}`),
      seed: seedSchema,
    },
    { required_error: 'Generation options are required' },
  )
  .superRefine((options, ctx) => {
    if (options.width * options.height > LIMITS.maxPixels) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Image size must not exceed ${LIMITS.maxPixels} pixels`,
      });
    }
    const ratio = options.width / options.height;
    if (ratio > LIMITS.maxAspectRatio || ratio < 1 / LIMITS.maxAspectRatio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Image aspect ratio must be between 1:4 and 4:1',
      });
    }
  });

const controlModeSchema = z.enum(['CANNY_EDGE', 'SEGMENTATION'], {
  errorMap: () => ({ message: 'Control mode must be CANNY_EDGE or SEGMENTATION' }),
});

const textToImageSchema = z.object({
  kind: z.literal('textToImage'),
  prompt: promptSchema('Prompt'),
  negativePrompt: negativePromptSchema,
  options: generationOptionsSchema,
});

const conditionedImageSchema = z.object({
  kind: z.literal('conditionedImage'),
  conditionImage: sourceImageSchema('Reference image'),
  prompt: promptSchema('Prompt'),
  negativePrompt: negativePromptSchema,
  controlMode: controlModeSchema,
  controlStrength: z
    .number({ required_error: 'Control strength is required' })
    .min(0, 'Control strength must be between 0 and 1')
    .max(1, 'Control strength must be between 0 and 1'),
  options: generationOptionsSchema,
});

const removeBackgroundSchema = z.object({
  kind: z.literal('removeBackground'),
  image: sourceImageSchema('Input image'),
});

const inpaintingSchema = z
  .object({
    kind: z.literal('inpainting'),
    image: sourceImageSchema('Input image'),
    mask: sourceImageSchema('Mask image'),
    prompt: promptSchema('Prompt'),
    negativePrompt: negativePromptSchema,
    seed: seedSchema,
    numberOfImages: numberOfImagesSchema.optional(),
  })
  .superRefine((request, ctx) => {
    const { image, mask } = request;
    if (image.width !== mask.width || image.height !== mask.height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mask'],
        message: `Mask image must match the input image size (${image.width}x${image.height})`,
      });
    }
  });

const outpaintingSchema = z
  .object({
    kind: z.literal('outpainting'),
    image: sourceImageSchema('Input image'),
    mask: z.discriminatedUnion(
      'type',
      [
        z.object({ type: z.literal('image'), image: sourceImageSchema('Mask image') }),
        z.object({ type: z.literal('prompt'), prompt: promptSchema('Mask prompt') }),
      ],
      { errorMap: () => ({ message: 'Mask type must be Image or Prompt' }) },
    ),
    prompt: promptSchema('Prompt'),
    negativePrompt: negativePromptSchema,
    mode: z.enum(['DEFAULT', 'PRECISE'], {
      errorMap: () => ({ message: 'Outpainting mode must be DEFAULT or PRECISE' }),
    }),
    seed: seedSchema,
    numberOfImages: numberOfImagesSchema.optional(),
  })
  .superRefine((request, ctx) => {
    const { image, mask } = request;
    if (mask.type === 'image' && (image.width !== mask.image.width || image.height !== mask.image.height)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mask'],
        message: `Mask image must match the input image size (${image.width}x${image.height})`,
      });
    }
  });

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid input');
  }
  return parsed.data;
}

/**
 * Check a request against the model's bounds before anything is sent.
 * Returns a normalized copy (trimmed prompts, blank negative prompt removed)
 * and throws a ValidationError carrying the first failing rule.
 */
export function validateRequest(request: GenerationRequest): GenerationRequest {
  switch (request.kind) {
    case 'textToImage':
      return parseWith(textToImageSchema, request);
    case 'conditionedImage':
      return parseWith(conditionedImageSchema, request);
    case 'removeBackground':
      return parseWith(removeBackgroundSchema, request);
    case 'inpainting':
      return parseWith(inpaintingSchema, request);
    case 'outpainting':
      return parseWith(outpaintingSchema, request);
  }
}

