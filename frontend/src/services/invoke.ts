import type { InvokeModelBody } from '@/types';
import { getConfig, type AppConfig } from '@/config';
import { ValidationError } from '@/utils/errors';
import api from './api';

/** Call the model once; resolves with the raw JSON body */
export async function invokeModel(
  body: InvokeModelBody,
  config: AppConfig = getConfig(),
): Promise<unknown> {
  if (config.authRequired && !config.apiKey) {
    throw new ValidationError(
      'Authentication is required but no API key is configured (VITE_BEDROCK_API_KEY).',
    );
  }
  const headers = config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : undefined;

  const { data } = await api.post<unknown>(
    `/model/${encodeURIComponent(config.modelId)}/invoke`,
    body,
    { baseURL: config.endpoint, headers },
  );
  return data;
}
