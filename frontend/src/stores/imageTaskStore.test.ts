import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { GenerationRequest, GenerationResult } from '@/types';
import { runImageTask } from '@/services/imageTask';
import { RemoteError, UNEXPECTED_ERROR_MESSAGE, ValidationError } from '@/utils/errors';
import { createImageTaskStore } from './imageTaskStore';

vi.mock('@/services/imageTask', () => ({
  runImageTask: vi.fn(),
}));

const request: GenerationRequest = {
  kind: 'removeBackground',
  image: { base64: 'SU1H', width: 512, height: 512, mimeType: 'image/png' },
};

const result: GenerationResult = {
  images: [{ id: 'image-1', bytes: new Uint8Array([1]), mimeType: 'image/png', dataUrl: 'data:image/png;base64,AQ==' }],
};

describe('createImageTaskStore', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('starts empty', () => {
    const store = createImageTaskStore('removeBackground');
    expect(store.getState()).toMatchObject({ kind: 'removeBackground', result: null, loading: false, error: null });
  });

  it('stores the result of a successful call', async () => {
    vi.mocked(runImageTask).mockResolvedValue(result);
    const store = createImageTaskStore('removeBackground');

    const pending = store.getState().run(request);
    expect(store.getState().loading).toBe(true);

    await expect(pending).resolves.toBe(result);
    expect(store.getState()).toMatchObject({ result, loading: false, error: null });
    expect(runImageTask).toHaveBeenCalledWith(request);
  });

  it('keeps the message of a failed call', async () => {
    vi.mocked(runImageTask).mockRejectedValue(new ValidationError('Input image is required'));
    const store = createImageTaskStore('removeBackground');

    await expect(store.getState().run(request)).resolves.toBeNull();

    expect(store.getState()).toMatchObject({ result: null, loading: false, error: 'Input image is required' });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('clears the previous result when a new call fails', async () => {
    vi.mocked(runImageTask).mockResolvedValueOnce(result).mockRejectedValueOnce(new RemoteError('Throttled', 429));
    const store = createImageTaskStore('removeBackground');

    await store.getState().run(request);
    await store.getState().run(request);

    expect(store.getState().result).toBeNull();
    expect(store.getState().error).toBe('Throttled');
  });

  it('wraps unexpected errors', async () => {
    vi.mocked(runImageTask).mockRejectedValue(new Error('boom'));
    const store = createImageTaskStore('removeBackground');

    await store.getState().run(request);

    expect(store.getState().error).toBe(`${UNEXPECTED_ERROR_MESSAGE} (boom)`);
  });

  it('clears the error and resets', async () => {
    vi.mocked(runImageTask).mockRejectedValue(new RemoteError('Throttled', 429));
    const store = createImageTaskStore('removeBackground');
    await store.getState().run(request);

    store.getState().clearError();
    expect(store.getState().error).toBeNull();

    store.setState({ result });
    store.getState().reset();
    expect(store.getState()).toMatchObject({ result: null, loading: false, error: null });
  });
});
