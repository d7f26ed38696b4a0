/** Task types accepted by the image model's invoke API */
export type TaskType = 'TEXT_IMAGE' | 'BACKGROUND_REMOVAL' | 'INPAINTING' | 'OUTPAINTING';

/** Conditioning mode for guided generation */
export type ControlMode = 'CANNY_EDGE' | 'SEGMENTATION';

/** Outpainting blend mode */
export type OutPaintingMode = 'DEFAULT' | 'PRECISE';

export type ImageQuality = 'standard' | 'premium';

export interface ImageGenerationConfig {
  numberOfImages: number;
  quality?: ImageQuality;
  width?: number;
  height?: number;
  cfgScale?: number;
  seed: number;
}

export interface TextToImageParams {
  text: string;
  negativeText?: string;
  /** base64, edge or segmentation reference */
  conditionImage?: string;
  controlMode?: ControlMode;
  controlStrength?: number;
}

export interface BackgroundRemovalParams {
  image: string;
}

export interface InPaintingParams {
  text: string;
  negativeText?: string;
  image: string;
  maskImage: string;
}

export interface OutPaintingParams {
  text: string;
  negativeText?: string;
  image: string;
  outPaintingMode: OutPaintingMode;
  maskImage?: string;
  maskPrompt?: string;
}

/** Request body for `POST /model/{modelId}/invoke` */
export type InvokeModelBody =
  | {
      taskType: 'TEXT_IMAGE';
      textToImageParams: TextToImageParams;
      imageGenerationConfig: ImageGenerationConfig;
    }
  | {
      taskType: 'BACKGROUND_REMOVAL';
      backgroundRemovalParams: BackgroundRemovalParams;
    }
  | {
      taskType: 'INPAINTING';
      inPaintingParams: InPaintingParams;
      imageGenerationConfig: ImageGenerationConfig;
    }
  | {
      taskType: 'OUTPAINTING';
      outPaintingParams: OutPaintingParams;
      imageGenerationConfig: ImageGenerationConfig;
    };

/** Response body of the invoke API */
export interface InvokeModelResponse {
  images?: string[];
  error?: string | null;
}
