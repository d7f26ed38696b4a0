export type {
  BackgroundRemovalParams,
  ControlMode,
  ImageGenerationConfig,
  ImageQuality,
  InPaintingParams,
  InvokeModelBody,
  InvokeModelResponse,
  OutPaintingMode,
  OutPaintingParams,
  TaskType,
  TextToImageParams,
} from './model';
export type {
  ConditionedImageRequest,
  DecodedImage,
  DecodedMimeType,
  GenerationOptions,
  GenerationRequest,
  GenerationResult,
  InpaintingRequest,
  OutpaintingMask,
  OutpaintingRequest,
  RemoveBackgroundRequest,
  SourceImage,
  TaskKind,
  TextToImageRequest,
} from './generation';
