import { create } from 'zustand';
import type { GenerationRequest, GenerationResult, TaskKind } from '@/types';
import { runImageTask } from '@/services/imageTask';
import { toUserMessage } from '@/utils/errors';

export interface ImageTaskStore {
  /** Which tool this store belongs to */
  kind: TaskKind;
  /** Result of the last call */
  result: GenerationResult | null;
  /** Loading */
  loading: boolean;
  /** Error message */
  error: string | null;

  // Actions
  run: (request: GenerationRequest) => Promise<GenerationResult | null>;
  reset: () => void;
  clearError: () => void;
}

/**
 * One store per tool page; each keeps only the latest call.
 */
export function createImageTaskStore(kind: TaskKind) {
  return create<ImageTaskStore>((set) => ({
    kind,
    result: null,
    loading: false,
    error: null,

    run: async (request) => {
      set({ loading: true, error: null, result: null });
      try {
        const result = await runImageTask(request);
        set({ result, loading: false });
        return result;
      } catch (e) {
        const message = toUserMessage(e);
        console.error(`[ImageTask:${kind}]`, e);
        set({ loading: false, error: message });
        return null;
      }
    },

    reset: () => set({ result: null, loading: false, error: null }),

    clearError: () => set({ error: null }),
  }));
}

export const useTextToImageStore = createImageTaskStore('textToImage');
export const useConditionedImageStore = createImageTaskStore('conditionedImage');
export const useRemoveBgStore = createImageTaskStore('removeBackground');
export const useInpaintingStore = createImageTaskStore('inpainting');
export const useOutpaintingStore = createImageTaskStore('outpainting');

/** Store hook for a tool page */
export type ImageTaskStoreHook = ReturnType<typeof createImageTaskStore>;
