// Provider Registry
// Central registry for all LLM providers

import type { Provider } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { PROVIDER_PRESETS, getProviderPreset } from './presets.js';
import { env, isProviderConfigured, providerEnv } from '../env.js';

// Provider instances (lazy initialization), keyed by "name:model"
const providers: Map<string, Provider> = new Map();

function getOrCreateProvider(name: string, model?: string): Provider | null {
  const preset = getProviderPreset(name);
  if (!preset) {
    return null;
  }

  // Check if provider is configured
  if (!isProviderConfigured(preset.name)) {
    return null;
  }

  const settings = providerEnv(preset.name);
  const resolvedModel = model?.trim() || settings.model || preset.defaultModel;
  const cacheKey = `${preset.name}:${resolvedModel}`;

  // Return cached instance if exists
  const cached = providers.get(cacheKey);
  if (cached) {
    return cached;
  }

  const provider = new OpenAICompatibleProvider({
    preset,
    apiKey: settings.apiKey,
    model: resolvedModel,
    baseUrl: settings.baseUrl || undefined,
    timeoutMs: env.PROVIDER_TIMEOUT_MS,
  });
  providers.set(cacheKey, provider);

  return provider;
}

export function getProvider(name: string = env.DEFAULT_PROVIDER, model?: string): Provider {
  const provider = getOrCreateProvider(name, model);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export interface ProviderListing {
  name: string;
  displayName: string;
  description: string;
  defaultModel: string;
  configured: boolean;
}

export function listProviders(): ProviderListing[] {
  return PROVIDER_PRESETS.map(preset => ({
    name: preset.name,
    displayName: preset.displayName,
    description: preset.description,
    defaultModel: providerEnv(preset.name).model || preset.defaultModel,
    configured: isProviderConfigured(preset.name),
  }));
}

// Re-export types
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';
export { getProviderPreset, authRemediationHint } from './presets.js';
