export {
  createImageTaskStore,
  useConditionedImageStore,
  useInpaintingStore,
  useOutpaintingStore,
  useRemoveBgStore,
  useTextToImageStore,
} from './imageTaskStore';
export type { ImageTaskStore, ImageTaskStoreHook } from './imageTaskStore';
