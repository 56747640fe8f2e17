import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createTogetherAI } from '@ai-sdk/togetherai';

export const MODEL_PROVIDERS = [
  'openai',
  'anthropic',
  'google',
  'together',
] as const;

export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

/**
 * API keys per provider; only the providers actually used need one
 */
export type ProviderCredentials = Partial<Record<ModelProvider, string>>;

const MODEL_FACTORIES: Record<
  ModelProvider,
  (apiKey: string, modelName: string) => LanguageModel
> = {
  openai: (apiKey, modelName) => createOpenAI({ apiKey })(modelName),
  anthropic: (apiKey, modelName) => createAnthropic({ apiKey })(modelName),
  google: (apiKey, modelName) =>
    createGoogleGenerativeAI({ apiKey })(modelName),
  together: (apiKey, modelName) => createTogetherAI({ apiKey })(modelName),
};

function isModelProvider(value: string): value is ModelProvider {
  return (MODEL_PROVIDERS as readonly string[]).includes(value);
}

/**
 * Split a "provider/model-name" id
 *
 * Everything after the first slash is the model name, so
 * "together/Qwen/Qwen3-235B" keeps its nested path.
 *
 * @throws Error for a missing model name or an unknown provider
 */
export function parseModelId(modelId: string): {
  provider: ModelProvider;
  modelName: string;
} {
  const [provider, ...rest] = modelId.split('/');
  const modelName = rest.join('/');

  if (!isModelProvider(provider)) {
    throw new Error(
      `Unknown provider "${provider}" in model id "${modelId}" (expected one of: ${MODEL_PROVIDERS.join(', ')})`,
    );
  }
  if (!modelName) {
    throw new Error(`Model id "${modelId}" has no model name`);
  }

  return { provider, modelName };
}

/**
 * Converts model ID string to LanguageModel instance
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "google/gemini-2.5-pro"
 *   - "openai/gpt-5.2"
 *   - "anthropic/claude-sonnet-4-5"
 *   - "together/Qwen/Qwen3-235B-A22B-Instruct-2507-tput"
 *
 * @throws Error when the id is malformed or the provider has no API key
 */
export function createModel(
  modelId: string,
  credentials: ProviderCredentials,
): LanguageModel {
  const { provider, modelName } = parseModelId(modelId);
  const apiKey = credentials[provider];

  if (!apiKey) {
    throw new Error(`No API key configured for provider "${provider}"`);
  }

  return MODEL_FACTORIES[provider](apiKey, modelName);
}
