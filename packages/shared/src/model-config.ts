/**
 * Completion provider configuration.
 *
 * Built from:
 *   1. A JSON file at MODEL_CONFIG_PATH (optional)
 *   2. Environment overrides: MODEL_PROVIDER, MODEL_VERSION, MODEL_API_KEY,
 *      MODEL_BASE_URL, MODEL_MAX_TOKENS
 *   3. Defaults: OpenAI, gpt-4o
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';

const log = logger.child({ module: 'model-config' });

export const PROVIDERS = ['openai', 'anthropic', 'openai-compatible', 'ollama'] as const;
export type ModelProvider = (typeof PROVIDERS)[number];

const DEFAULT_MODELS: Record<ModelProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
  'openai-compatible': 'gpt-4o',
  ollama: 'llama3.1',
};

const DEFAULT_BASE_URLS: Partial<Record<ModelProvider, string>> = {
  ollama: 'http://localhost:11434/v1',
};

const modelConfigSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  maxTokens: z.number().int().positive(),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

const fileSchema = modelConfigSchema.partial();

type Env = Record<string, string | undefined>;

function apiKeyFromEnv(provider: ModelProvider, env: Env): string | undefined {
  if (env.MODEL_API_KEY) return env.MODEL_API_KEY;
  if (provider === 'anthropic') return env.ANTHROPIC_API_KEY;
  if (provider === 'openai' || provider === 'openai-compatible') return env.OPENAI_API_KEY;
  return undefined;
}

async function loadConfigFile(path: string): Promise<Partial<ModelConfig>> {
  const raw = await readFile(path, 'utf-8');
  const parsed = fileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `model-config: invalid config file at '${path}': ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    );
  }
  return parsed.data;
}

/** Resolve the active provider and model. Exactly one provider per process. */
export async function loadModelConfig(env: Env = process.env): Promise<ModelConfig> {
  const fromFile = env.MODEL_CONFIG_PATH ? await loadConfigFile(env.MODEL_CONFIG_PATH) : {};

  const providerResult = z.enum(PROVIDERS).safeParse(
    (env.MODEL_PROVIDER ?? fromFile.provider ?? 'openai').toLowerCase(),
  );
  if (!providerResult.success) {
    throw new Error(`model-config: MODEL_PROVIDER must be one of ${PROVIDERS.join(', ')}`);
  }
  const provider = providerResult.data;

  const candidate = {
    provider,
    model: env.MODEL_VERSION ?? fromFile.model ?? DEFAULT_MODELS[provider],
    apiKey: apiKeyFromEnv(provider, env) ?? fromFile.apiKey,
    baseURL: env.MODEL_BASE_URL ?? fromFile.baseURL ?? DEFAULT_BASE_URLS[provider],
    maxTokens: env.MODEL_MAX_TOKENS ? Number(env.MODEL_MAX_TOKENS) : (fromFile.maxTokens ?? 4096),
  };

  const parsed = modelConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(
      `model-config: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    );
  }

  if ((provider === 'openai' || provider === 'anthropic') && !parsed.data.apiKey) {
    throw new Error(`model-config: MODEL_API_KEY is required when MODEL_PROVIDER=${provider}`);
  }
  if (provider === 'openai-compatible' && !parsed.data.baseURL) {
    throw new Error('model-config: MODEL_BASE_URL is required when MODEL_PROVIDER=openai-compatible');
  }

  log.info({ provider, model: parsed.data.model, baseURL: parsed.data.baseURL }, 'model config resolved');
  return parsed.data;
}
