import type { GenerationRequest, GenerationResult } from '@/types';
import { validateRequest } from '@/utils/validation';
import { buildRequestBody } from './requestBuilder';
import { invokeModel } from './invoke';
import { decodeResponse } from './responseDecoder';

/**
 * validate → build payload → invoke → decode.
 * Validation failures throw before the endpoint is contacted.
 */
export async function runImageTask(request: GenerationRequest): Promise<GenerationResult> {
  const valid = validateRequest(request);
  const body = buildRequestBody(valid);
  const raw = await invokeModel(body);
  return decodeResponse(raw);
}
