import { z } from 'zod';

const DEFAULT_MODEL_ID = 'amazon.nova-canvas-v1:0';
const DEFAULT_MODEL_NAME = 'Amazon Bedrock - Nova Canvas';
const DEFAULT_REGION = 'us-east-1';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => value === true || (typeof value === 'string' && /^(true|1|yes)$/i.test(value.trim())));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z.object({
  VITE_BEDROCK_MODEL_ID: optionalText,
  VITE_BEDROCK_MODEL_NAME: optionalText,
  VITE_BEDROCK_REGION: optionalText.refine(
    (value) => value === undefined || /^[a-z]{2}(-[a-z]+)+-\d$/.test(value),
    'VITE_BEDROCK_REGION must look like "us-east-1"',
  ),
  VITE_BEDROCK_ENDPOINT: optionalText,
  VITE_AUTH_REQUIRED: booleanFlag,
  VITE_BEDROCK_API_KEY: optionalText,
});

/** Runtime settings for the inference endpoint */
export interface AppConfig {
  modelId: string;
  modelName: string;
  region: string;
  /** Base URL that `/model/{id}/invoke` is appended to */
  endpoint: string;
  authRequired: boolean;
  apiKey?: string;
}

/**
 * Build the settings object from Vite-style env variables.
 * Throws when a variable is present but unusable.
 */
export function loadConfig(env: Record<string, unknown>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue?.message ?? 'unknown error'}`);
  }

  const values = parsed.data;
  const region = values.VITE_BEDROCK_REGION ?? DEFAULT_REGION;

  return {
    modelId: values.VITE_BEDROCK_MODEL_ID ?? DEFAULT_MODEL_ID,
    modelName: values.VITE_BEDROCK_MODEL_NAME ?? DEFAULT_MODEL_NAME,
    region,
    endpoint: (values.VITE_BEDROCK_ENDPOINT ?? `https://bedrock-runtime.${region}.amazonaws.com`).replace(/\/$/, ''),
    authRequired: values.VITE_AUTH_REQUIRED,
    apiKey: values.VITE_BEDROCK_API_KEY,
  };
}

let cached: AppConfig | null = null;

/** Settings for this build, read once from `import.meta.env` */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(import.meta.env);
  }
  return cached;
}
